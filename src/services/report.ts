// Report files shared between a list/prepare step and its execute/update step

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Report } from '../types/index.js';

export function createReport<T>(identifier: string, items: T[], exportedAt: Date = new Date()): Report<T> {
    return {
        identifier,
        exportedAt: exportedAt.toISOString(),
        count: items.length,
        items: [...items],
    };
}

const envelopeSchema = z
    .object({
        identifier: z.string(),
        exportedAt: z.string().datetime({ offset: true }),
        count: z.number().int().nonnegative(),
        items: z.array(z.unknown()),
    })
    .refine((report) => report.count === report.items.length, {
        message: 'count does not match the number of items',
        path: ['count'],
    });

function formatIssues(error: z.ZodError, prefix = ''): string[] {
    return error.issues.map((issue) => {
        const path = [prefix, ...issue.path.map(String)].filter((part) => part !== '').join('.');
        return `${path || '(root)'}: ${issue.message}`;
    });
}

/**
 * Validate an already parsed JSON value as a report whose items match `itemSchema`.
 */
export function parseReport<T>(json: unknown, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>, source = 'report'): Report<T> {
    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
        throw new ValidationError(`${source} is malformed: ${formatIssues(envelope.error).join('; ')}`);
    }

    const items: T[] = [];
    const issues: string[] = [];
    envelope.data.items.forEach((raw, index) => {
        const item = itemSchema.safeParse(raw);
        if (item.success) {
            items.push(item.data);
        } else {
            issues.push(...formatIssues(item.error, `items.${index}`));
        }
    });
    if (issues.length > 0) {
        throw new ValidationError(`${source} is malformed: ${issues.join('; ')}`);
    }

    return {
        identifier: envelope.data.identifier,
        exportedAt: envelope.data.exportedAt,
        count: envelope.data.count,
        items,
    };
}

export async function writeReport<T>(path: string, report: Report<T>): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    logger.info(`Wrote report with ${report.count} items`, { path, identifier: report.identifier });
}

export async function readReport<T>(
    path: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Report<T>> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new NotFoundError(`Report file not found: ${path}`, { cause: error });
        }
        throw error;
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new ValidationError(`Report file ${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
    }

    return parseReport(json, itemSchema, `Report file ${path}`);
}
