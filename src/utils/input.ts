import { readFile } from 'node:fs/promises';
import { ValidationError, errorMessage } from './errors.js';
import { isJsonObject } from './json.js';
import type { JsonObject } from '../types/index.js';

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf8');
}

/**
 * Read a JSON object from a file, or from stdin when no file is given.
 */
export async function readJsonObject(path?: string): Promise<JsonObject> {
    const source = path ?? 'stdin';
    const text = path ? await readFile(path, 'utf8') : await readStdin();

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new ValidationError(`Input from ${source} is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }
    if (!isJsonObject(json)) {
        throw new ValidationError(`Input from ${source} must be a JSON object`);
    }
    return json;
}
