// Combine per-account reserved concurrency files into one spreadsheet
import { readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { FunctionConcurrency } from '../types/index.js';

export const CONCURRENCY_FILE_SUFFIX = '_lambda_concurrency.json';

const concurrencyFileSchema = z.array(
    z.object({
        FunctionName: z.string(),
        ReservedConcurrency: z.number().nullable(),
    })
);

export interface EnvironmentConcurrency {
    environment: string;
    entries: FunctionConcurrency[];
}

export type ConcurrencyRow = Record<string, string | number | null>;

export function concurrencyFileName(accountAlias: string): string {
    return `${accountAlias}${CONCURRENCY_FILE_SUFFIX}`;
}

/**
 * Function name without its generated trailing segment,
 * e.g. "api-handler-AB12CD" becomes "api-handler".
 */
export function baseFunctionName(functionName: string): string {
    const index = functionName.lastIndexOf('-');
    return index > 0 ? functionName.slice(0, index) : functionName;
}

/**
 * One row per base function name, one column per environment.
 * Rows are sorted by total reserved concurrency, highest first; a function that
 * is absent or unreserved in an environment counts as -1 towards the total.
 */
export function buildConcurrencyRows(environments: EnvironmentConcurrency[]): ConcurrencyRow[] {
    const values = new Map<string, Map<string, number | null>>();

    for (const { environment, entries } of environments) {
        for (const entry of entries) {
            const name = baseFunctionName(entry.FunctionName);
            let perEnvironment = values.get(name);
            if (!perEnvironment) {
                perEnvironment = new Map();
                values.set(name, perEnvironment);
            }
            if (!perEnvironment.has(environment)) {
                perEnvironment.set(environment, entry.ReservedConcurrency);
            }
        }
    }

    const rows = [...values.entries()].map(([name, perEnvironment]) => {
        let sum = 0;
        const row: ConcurrencyRow = { FunctionName: name };
        for (const { environment } of environments) {
            const value = perEnvironment.get(environment) ?? null;
            row[environment] = value;
            sum += value ?? -1;
        }
        return { row, sum };
    });

    rows.sort((a, b) => b.sum - a.sum);
    return rows.map(({ row }) => row);
}

export async function readConcurrencyFiles(folder: string): Promise<EnvironmentConcurrency[]> {
    const files = (await readdir(folder)).filter((name) => name.endsWith(CONCURRENCY_FILE_SUFFIX)).sort();
    const environments: EnvironmentConcurrency[] = [];

    for (const file of files) {
        const path = join(folder, file);
        let json: unknown;
        try {
            json = JSON.parse(await readFile(path, 'utf8'));
        } catch (error) {
            throw new ValidationError(`${path} is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }
        const parsed = concurrencyFileSchema.safeParse(json);
        if (!parsed.success) {
            logger.warn(`Skipping ${file}: entries need FunctionName and ReservedConcurrency`);
            continue;
        }
        environments.push({
            environment: basename(file, CONCURRENCY_FILE_SUFFIX),
            entries: parsed.data,
        });
    }

    return environments;
}

export function toWorkbookBuffer(rows: ConcurrencyRow[], columns: string[]): Buffer {
    const workbook = XLSX.utils.book_new();
    const worksheet = XLSX.utils.json_to_sheet(rows, { header: columns });
    worksheet['!cols'] = columns.map((column) => ({
        wch: Math.max(column.length, ...rows.map((row) => String(row[column] ?? '').length)) + 2,
    }));
    XLSX.utils.book_append_sheet(workbook, worksheet, 'Sheet1');
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export async function writeConcurrencyReport(inputFolder: string, outputFile: string): Promise<ConcurrencyRow[]> {
    const environments = await readConcurrencyFiles(inputFolder);
    if (environments.length === 0) {
        throw new ValidationError(`No *${CONCURRENCY_FILE_SUFFIX} files found in ${inputFolder}`);
    }

    const rows = buildConcurrencyRows(environments);
    const columns = ['FunctionName', ...environments.map((e) => e.environment)];
    await writeFile(outputFile, toWorkbookBuffer(rows, columns));
    logger.info(`Wrote concurrency report for ${environments.length} environments`, {
        path: outputFile,
        functions: rows.length,
    });
    return rows;
}
