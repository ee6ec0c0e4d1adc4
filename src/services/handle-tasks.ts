// Handle import: tasks are prepared from the resources table into batch reports,
// then executed against the handle API with a log of finished tasks.
import { appendFile, mkdir, readdir, readFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { splitHandle, type HandleApi } from './handle-api.js';
import type { PublicationsTable } from './publications-table.js';
import { createReport, readReport, writeReport } from './report.js';
import { errorMessage, ValidationError } from '../utils/errors.js';
import { isJsonObject, stringField } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type { HandleTask, ItemActionResult, JsonObject } from '../types/index.js';

export const DONE_TASKS_FILE = 'done_tasks.jsonl';
export const COMPLETE_FOLDER = 'complete';
export const DEFAULT_BATCH_SIZE = 700;

export const handleTaskSchema = z.object({
    identifier: z.string().min(1),
    publicationUri: z.string().min(1),
    handle: z.string().min(1),
});

interface FoundHandle {
    value: string;
    sourceName?: string;
}

export interface HandleTaskWriterOptions {
    applicationDomain: string;
    controlledPrefixes: string[];
    ownSourceName: string;
}

export class HandleTaskWriter {
    constructor(private readonly options: HandleTaskWriterOptions) {}

    isControlledHandle(handle: string | undefined): boolean {
        if (!handle) {
            return false;
        }
        return this.options.controlledPrefixes.some((prefix) => handle.includes(`//hdl.handle.net/${prefix}`));
    }

    landingPageUri(identifier: string): string {
        return `https://${this.options.applicationDomain}/registration/${identifier}`;
    }

    private handlesOf(publication: JsonObject): FoundHandle[] {
        const handles: FoundHandle[] = [];
        const top = stringField(publication, 'handle');
        if (top) {
            handles.push({ value: top });
        }
        const additional = publication.additionalIdentifiers;
        if (Array.isArray(additional)) {
            for (const entry of additional) {
                if (!isJsonObject(entry) || entry.type !== 'HandleIdentifier') {
                    continue;
                }
                const value = stringField(entry, 'value');
                if (value) {
                    handles.push({ value, sourceName: stringField(entry, 'sourceName') });
                }
            }
        }
        return handles;
    }

    /**
     * One task per controlled handle not already registered by our own source.
     */
    tasksFor(publication: JsonObject): HandleTask[] {
        const identifier = stringField(publication, 'identifier');
        if (!identifier) {
            return [];
        }
        return this.handlesOf(publication)
            .filter((handle) => this.isControlledHandle(handle.value))
            .filter((handle) => handle.sourceName !== this.options.ownSourceName)
            .map((handle) => ({
                identifier,
                publicationUri: this.landingPageUri(identifier),
                handle: handle.value,
            }));
    }
}

export function batchFileName(index: number): string {
    return `batch_${String(index).padStart(4, '0')}.json`;
}

export interface PrepareOptions {
    customer: string;
    owner: string;
    outputFolder: string;
    batchSize?: number;
}

export interface PrepareSummary {
    resources: number;
    tasks: number;
    batches: string[];
}

/**
 * Query the owner's resources page by page and write one batch report per page
 * that produced tasks.
 */
export async function prepareHandleTasks(
    table: Pick<PublicationsTable, 'resourcesByOwner'>,
    writer: HandleTaskWriter,
    { customer, owner, outputFolder, batchSize = DEFAULT_BATCH_SIZE }: PrepareOptions
): Promise<PrepareSummary> {
    await mkdir(outputFolder, { recursive: true });
    const summary: PrepareSummary = { resources: 0, tasks: 0, batches: [] };

    for await (const resources of table.resourcesByOwner(customer, owner, batchSize)) {
        summary.resources += resources.length;
        const tasks = resources.flatMap((resource) => writer.tasksFor(resource));
        if (tasks.length === 0) {
            continue;
        }
        const path = join(outputFolder, batchFileName(summary.batches.length + 1));
        await writeReport(path, createReport(`${customer}:${owner}`, tasks));
        summary.tasks += tasks.length;
        summary.batches.push(path);
    }

    logger.info(`Prepared ${summary.tasks} handle tasks from ${summary.resources} resources`, {
        customer,
        owner,
        outputFolder,
    });
    return summary;
}

export function taskId(task: HandleTask): string {
    return `${task.identifier}:${task.handle}`;
}

const doneEntrySchema = z.object({ id: z.string(), timestamp: z.string() });

/**
 * Append-only record of executed tasks, one JSON object per line.
 */
export class DoneTaskLog {
    private constructor(
        private readonly path: string,
        private readonly done: Set<string>
    ) {}

    static async open(folder: string): Promise<DoneTaskLog> {
        const path = join(folder, DONE_TASKS_FILE);
        const done = new Set<string>();
        let text = '';
        try {
            text = await readFile(path, 'utf8');
        } catch (error) {
            if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
                throw error;
            }
        }
        for (const line of text.split('\n')) {
            if (line.trim().length === 0) {
                continue;
            }
            let json: unknown;
            try {
                json = JSON.parse(line);
            } catch (error) {
                throw new ValidationError(`Malformed line in ${path}: ${line}`, { cause: error });
            }
            const entry = doneEntrySchema.safeParse(json);
            if (!entry.success) {
                throw new ValidationError(`Malformed line in ${path}: ${line}`);
            }
            done.add(entry.data.id);
        }
        return new DoneTaskLog(path, done);
    }

    has(id: string): boolean {
        return this.done.has(id);
    }

    async markDone(id: string, now: Date = new Date()): Promise<void> {
        await appendFile(this.path, `${JSON.stringify({ id, timestamp: now.toISOString() })}\n`, 'utf8');
        this.done.add(id);
    }
}

export class HandleTaskExecutor {
    constructor(
        private readonly handleApi: Pick<HandleApi, 'createHandle'>,
        private readonly doneLog: DoneTaskLog
    ) {}

    async execute(task: HandleTask, apply: boolean): Promise<ItemActionResult> {
        const id = taskId(task);
        if (this.doneLog.has(id)) {
            return { id, action: 'create-handle', status: 'skipped', detail: 'already done' };
        }

        try {
            const { prefix, suffix } = splitHandle(task.handle);
            if (!apply) {
                return { id, action: 'create-handle', status: 'dry-run', detail: `${prefix}/${suffix}` };
            }
            await this.handleApi.createHandle({ uri: task.publicationUri, prefix, suffix });
            await this.doneLog.markDone(id);
            logger.info(`Created handle ${prefix}/${suffix}`, { identifier: task.identifier });
            return { id, action: 'create-handle', status: 'success', detail: `${prefix}/${suffix}` };
        } catch (error) {
            logger.error(`Failed to create handle for ${task.identifier}`, error);
            return { id, action: 'create-handle', status: 'failed', error: errorMessage(error) };
        }
    }

    /**
     * Run every batch report in `folder`. With `apply`, a batch whose tasks all
     * succeeded or were already done is moved to the complete folder.
     */
    async executeFolder(folder: string, apply: boolean): Promise<ItemActionResult[]> {
        const files = (await readdir(folder, { withFileTypes: true }))
            .filter((entry) => entry.isFile() && /^batch_.*\.json$/.test(entry.name))
            .map((entry) => entry.name)
            .sort();

        const results: ItemActionResult[] = [];
        for (const file of files) {
            const path = join(folder, file);
            const report = await readReport(path, handleTaskSchema);
            const batchResults: ItemActionResult[] = [];
            for (const task of report.items) {
                batchResults.push(await this.execute(task, apply));
            }
            results.push(...batchResults);

            if (apply && batchResults.every((result) => result.status !== 'failed')) {
                const completeFolder = join(folder, COMPLETE_FOLDER);
                await mkdir(completeFolder, { recursive: true });
                await rename(path, join(completeFolder, file));
                logger.debug(`Moved ${file} to ${COMPLETE_FOLDER}/`);
            }
        }
        return results;
    }
}
