// Offset-paginated search over indexed resources
import { z } from 'zod';
import { getParameter } from './account-service.js';
import { requestJson } from './http.js';
import { getConfig } from '../utils/config.js';
import { RemoteServiceError } from '../utils/errors.js';
import { withBackoff } from '../utils/backoff.js';
import type { AwsContext, JsonObject } from '../types/index.js';

export const SEARCH_API_VERSION = '2024-12-01';

const searchPageSchema = z.object({
    hits: z.array(z.record(z.unknown())).default([]),
    totalHits: z.number().default(0),
});

/**
 * Network failures and 5xx responses are worth retrying.
 */
export function isRetryableSearchError(error: unknown): boolean {
    if (!(error instanceof RemoteServiceError)) {
        return false;
    }
    return error.statusCode === undefined || error.statusCode >= 500;
}

export interface SearchOptions {
    pageSize?: number;
    retryDelayMs?: number;
}

export class SearchApi {
    constructor(private readonly apiDomain: string) {}

    static async forAccount(ctx: AwsContext): Promise<SearchApi> {
        return new SearchApi(await getParameter(ctx, getConfig().parameters.apiDomain));
    }

    /**
     * Yield every hit for the query, following `from`/`results` offsets until
     * `totalHits` is reached or a page comes back empty.
     */
    async *searchResources(
        query: Record<string, string>,
        { pageSize = 100, retryDelayMs = 2000 }: SearchOptions = {}
    ): AsyncGenerator<JsonObject, void, undefined> {
        let offset = 0;

        while (true) {
            const params = new URLSearchParams({ ...query, from: String(offset), results: String(pageSize) });
            const url = `https://${this.apiDomain}/search/resources?${params.toString()}`;

            const raw = await withBackoff(
                () =>
                    requestJson('search-api', 'SearchResources', url, {
                        headers: { Accept: `application/json; version=${SEARCH_API_VERSION}` },
                    }),
                { maxRetries: 5, initialDelay: retryDelayMs / 2, maxDelay: 30_000, isRetryable: isRetryableSearchError }
            );
            const page = searchPageSchema.safeParse(raw);
            if (!page.success) {
                throw new RemoteServiceError('search-api', 'SearchResources', 'Unexpected response shape');
            }

            const { hits, totalHits } = page.data;
            if (hits.length === 0) {
                return;
            }
            yield* hits;

            offset += hits.length;
            if (offset >= totalHits) {
                return;
            }
        }
    }
}
