import type { JsonObject } from '../types/index.js';

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(item: JsonObject, field: string): string | undefined {
    const value = item[field];
    return typeof value === 'string' ? value : undefined;
}
