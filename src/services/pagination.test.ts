import { describe, it, expect, vi } from 'vitest';
import { collectPages, iteratePages } from './pagination.js';
import { RemoteServiceError } from '../utils/errors.js';

describe('collectPages', () => {
    it('follows tokens until none is returned', async () => {
        const pages: Record<string, { items?: number[]; nextToken?: string }> = {
            start: { items: [1, 2], nextToken: 'b' },
            b: { nextToken: 'c' },
            c: { items: [3] },
        };
        const fetchPage = vi.fn(async (token: string | undefined) => {
            const page = pages[token ?? 'start'];
            return { items: page.items, nextToken: page.nextToken };
        });

        const items = await collectPages({ service: 'test', operation: 'List', fetchPage });

        expect(items).toEqual([1, 2, 3]);
        expect(fetchPage.mock.calls.map((call) => call[0])).toEqual([undefined, 'b', 'c']);
    });

    it('surfaces a failing page as RemoteServiceError', async () => {
        const fetchPage = vi.fn(async () => {
            throw new Error('AccessDenied');
        });

        await expect(collectPages({ service: 'sqs', operation: 'ListQueues', fetchPage })).rejects.toThrow(
            new RemoteServiceError('sqs', 'ListQueues', 'AccessDenied')
        );
    });
});

describe('iteratePages', () => {
    it('yields empty pages as empty arrays', async () => {
        const seen: string[][] = [];
        for await (const page of iteratePages<string, string>({
            service: 'test',
            operation: 'List',
            fetchPage: async () => ({ items: undefined, nextToken: undefined }),
        })) {
            seen.push(page);
        }

        expect(seen).toEqual([[]]);
    });
});
