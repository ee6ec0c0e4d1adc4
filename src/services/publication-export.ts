// Full export of the resources table as inflated JSONL batches
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PublicationsTable } from './publications-table.js';
import { logger } from '../utils/logger.js';

export const EXPORT_BATCH_SIZE = 700;

export interface ExportSummary {
    files: string[];
    resources: number;
}

export async function exportPublications(
    table: Pick<PublicationsTable, 'allResources'>,
    folder: string,
    batchSize = EXPORT_BATCH_SIZE
): Promise<ExportSummary> {
    await mkdir(folder, { recursive: true });
    const summary: ExportSummary = { files: [], resources: 0 };

    for await (const resources of table.allResources(batchSize)) {
        const path = join(folder, `batch_${summary.files.length}.jsonl`);
        await writeFile(path, resources.map((resource) => `${JSON.stringify(resource)}\n`).join(''), 'utf8');
        summary.files.push(path);
        summary.resources += resources.length;
        logger.info(`Exported ${resources.length} resources to ${path}`, { total: summary.resources });
    }

    return summary;
}
