import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SEARCH_API_VERSION, SearchApi, isRetryableSearchError } from './search-api.js';
import { RemoteServiceError } from '../utils/errors.js';
import type { JsonObject } from '../types/index.js';

const mockFetch = vi.fn<typeof fetch>();

function page(identifiers: string[], totalHits: number): Response {
    return new Response(JSON.stringify({ hits: identifiers.map((identifier) => ({ identifier })), totalHits }), {
        status: 200,
    });
}

async function collect(generator: AsyncGenerator<JsonObject>): Promise<JsonObject[]> {
    const items: JsonObject[] = [];
    for await (const item of generator) {
        items.push(item);
    }
    return items;
}

describe('SearchApi.searchResources', () => {
    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('follows offsets until totalHits is reached', async () => {
        mockFetch.mockResolvedValueOnce(page(['a', 'b'], 3)).mockResolvedValueOnce(page(['c'], 3));

        const hits = await collect(new SearchApi('api.example.org').searchResources({ unit: '194.63.10.0' }, { pageSize: 2 }));

        expect(hits.map((hit) => hit.identifier)).toEqual(['a', 'b', 'c']);
        expect(mockFetch.mock.calls.map((call) => call[0])).toEqual([
            'https://api.example.org/search/resources?unit=194.63.10.0&from=0&results=2',
            'https://api.example.org/search/resources?unit=194.63.10.0&from=2&results=2',
        ]);
        expect(mockFetch.mock.calls[0][1]?.headers).toEqual({ Accept: `application/json; version=${SEARCH_API_VERSION}` });
    });

    it('stops on an empty page', async () => {
        mockFetch.mockResolvedValueOnce(page([], 10));

        expect(await collect(new SearchApi('api.example.org').searchResources({ unit: 'x' }))).toEqual([]);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('retries server errors', async () => {
        mockFetch
            .mockResolvedValueOnce(new Response('Bad gateway', { status: 502 }))
            .mockResolvedValueOnce(page(['a'], 1));

        const hits = await collect(new SearchApi('api.example.org').searchResources({ unit: 'x' }, { retryDelayMs: 0 }));

        expect(hits).toEqual([{ identifier: 'a' }]);
        expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('does not retry client errors', async () => {
        mockFetch.mockResolvedValue(new Response('Bad request', { status: 400 }));

        await expect(
            collect(new SearchApi('api.example.org').searchResources({ unit: 'x' }, { retryDelayMs: 0 }))
        ).rejects.toThrow('search-api.SearchResources failed: HTTP 400: Bad request');
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });
});

describe('isRetryableSearchError', () => {
    it('retries network failures and 5xx only', () => {
        expect(isRetryableSearchError(new RemoteServiceError('s', 'o', 'down'))).toBe(true);
        expect(isRetryableSearchError(new RemoteServiceError('s', 'o', 'x', { statusCode: 503 }))).toBe(true);
        expect(isRetryableSearchError(new RemoteServiceError('s', 'o', 'x', { statusCode: 404 }))).toBe(false);
        expect(isRetryableSearchError(new Error('other'))).toBe(false);
    });
});
