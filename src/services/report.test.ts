import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { createReport, parseReport, readReport, writeReport } from './report.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

const itemSchema = z.object({ identifier: z.string(), kind: z.enum(['contributor', 'owner']) });

describe('report files', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'report-test-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('round-trips items in order', async () => {
        const items = [
            { identifier: '018b', kind: 'owner' as const },
            { identifier: '0001', kind: 'contributor' as const },
            { identifier: '018b', kind: 'contributor' as const },
        ];
        const path = join(dir, 'nested', 'report.json');

        await writeReport(path, createReport('194.63.10.0', items, new Date('2024-05-01T10:00:00.000Z')));
        const report = await readReport(path, itemSchema);

        expect(report).toEqual({
            identifier: '194.63.10.0',
            exportedAt: '2024-05-01T10:00:00.000Z',
            count: 3,
            items,
        });
    });

    it('raises NotFoundError for a missing file', async () => {
        await expect(readReport(join(dir, 'absent.json'), itemSchema)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('raises ValidationError for malformed JSON', async () => {
        const path = join(dir, 'broken.json');
        await writeFile(path, '{"identifier":', 'utf8');

        await expect(readReport(path, itemSchema)).rejects.toBeInstanceOf(ValidationError);
    });
});

describe('parseReport', () => {
    it('rejects a count that does not match the items', () => {
        const json = { identifier: 'x', exportedAt: '2024-05-01T10:00:00.000Z', count: 2, items: [] };

        expect(() => parseReport(json, itemSchema)).toThrow('report is malformed: count: count does not match the number of items');
    });

    it('names the offending item field', () => {
        const json = {
            identifier: 'x',
            exportedAt: '2024-05-01T10:00:00.000Z',
            count: 1,
            items: [{ identifier: 'a', kind: 'editor' }],
        };

        expect(() => parseReport(json, itemSchema)).toThrow(/items\.0\.kind/);
    });
});
