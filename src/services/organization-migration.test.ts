import { describe, it, expect, vi } from 'vitest';
import { listAffectedPublications, updateAffectedPublications } from './organization-migration.js';
import type { StoredResource } from './publications-table.js';
import type { JsonObject } from '../types/index.js';

const OLD = '194.63.10.0';
const NEW = '194.63.55.0';
const ORG = 'https://api.example.org/cristin/organization/';

function fakeSearch(hitsByParameter: Record<string, string[]>) {
    const queries: Record<string, string>[] = [];
    return {
        queries,
        async *searchResources(query: Record<string, string>) {
            queries.push(query);
            const parameter = 'unit' in query ? 'unit' : 'userAffiliation';
            for (const identifier of hitsByParameter[parameter] ?? []) {
                yield { identifier };
            }
        },
    };
}

function stored(identifier: string, resource: JsonObject): StoredResource {
    return { pk0: `Resource:c:${identifier}`, sk0: `Resource:${identifier}`, resource };
}

describe('listAffectedPublications', () => {
    it('reports contributor hits first, then owner hits, each unique', async () => {
        const search = fakeSearch({ unit: ['a', 'b', 'a'], userAffiliation: ['b'] });

        const report = await listAffectedPublications(search, OLD);

        expect(report.identifier).toBe(OLD);
        expect(report.count).toBe(3);
        expect(report.items).toEqual([
            { identifier: 'a', kind: 'contributor' },
            { identifier: 'b', kind: 'contributor' },
            { identifier: 'b', kind: 'owner' },
        ]);
        expect(search.queries).toEqual([
            { unit: OLD, sort: 'modified_date:asc' },
            { userAffiliation: OLD, sort: 'modified_date:asc' },
        ]);
    });
});

describe('updateAffectedPublications', () => {
    const resources: Record<string, StoredResource> = {
        a: stored('a', {
            identifier: 'a',
            entityDescription: { contributors: [{ affiliations: [{ id: `${ORG}${OLD}` }] }] },
        }),
        b: stored('b', { identifier: 'b', resourceOwner: { ownerAffiliation: `${ORG}185.0.0.0` } }),
    };

    function fakeTable() {
        return {
            fetchResourceByIdentifier: vi.fn(async (identifier: string) => {
                if (identifier === 'broken') {
                    throw new Error('dynamodb.Query failed: throttled');
                }
                return resources[identifier];
            }),
            updateResource: vi.fn(async () => undefined),
        };
    }

    const items = [
        { identifier: 'a', kind: 'contributor' as const },
        { identifier: 'b', kind: 'owner' as const },
        { identifier: 'gone', kind: 'owner' as const },
        { identifier: 'broken', kind: 'contributor' as const },
    ];

    it('describes changes without writing in dry-run mode', async () => {
        const table = fakeTable();

        const results = await updateAffectedPublications(table, items, OLD, NEW, false);

        expect(results).toEqual([
            {
                id: 'a',
                action: 'migrate-contributor',
                status: 'dry-run',
                detail: `entityDescription.contributors[0].affiliations[0].id: ${ORG}${OLD} -> ${ORG}${NEW}`,
            },
            { id: 'b', action: 'migrate-owner', status: 'skipped', detail: 'no matching affiliation' },
            { id: 'gone', action: 'migrate-owner', status: 'failed', error: 'Resource not found' },
            {
                id: 'broken',
                action: 'migrate-contributor',
                status: 'failed',
                error: 'dynamodb.Query failed: throttled',
            },
        ]);
        expect(table.updateResource).not.toHaveBeenCalled();
    });

    it('writes the migrated resource when applied', async () => {
        const table = fakeTable();

        const results = await updateAffectedPublications(table, items.slice(0, 1), OLD, NEW, true);

        expect(results[0].status).toBe('success');
        expect(table.updateResource).toHaveBeenCalledWith(resources.a, {
            identifier: 'a',
            entityDescription: { contributors: [{ affiliations: [{ id: `${ORG}${NEW}` }] }] },
        });
    });
});
