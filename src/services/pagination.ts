// Draining of paginated AWS listings
import { callRemote } from '../utils/errors.js';

export interface Page<TItem, TToken> {
    items: TItem[] | undefined;
    nextToken: TToken | undefined;
}

export interface PageSource<TItem, TToken> {
    service: string;
    operation: string;
    fetchPage: (token: TToken | undefined) => Promise<Page<TItem, TToken>>;
}

/**
 * Yield pages until the continuation token is exhausted.
 * A failing page request surfaces as RemoteServiceError.
 */
export async function* iteratePages<TItem, TToken>(
    source: PageSource<TItem, TToken>
): AsyncGenerator<TItem[], void, undefined> {
    let token: TToken | undefined;
    do {
        const page = await callRemote(source.service, source.operation, () => source.fetchPage(token));
        yield page.items ?? [];
        token = page.nextToken;
    } while (token !== undefined && token !== null);
}

/**
 * Collect every item of a paginated listing in API-returned order.
 */
export async function collectPages<TItem, TToken>(source: PageSource<TItem, TToken>): Promise<TItem[]> {
    const items: TItem[] = [];
    for await (const page of iteratePages(source)) {
        items.push(...page);
    }
    return items;
}
