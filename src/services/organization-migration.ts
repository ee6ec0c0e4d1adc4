// Moving publications from one organization identifier to another
import { z } from 'zod';
import type { PublicationsTable } from './publications-table.js';
import { createReport } from './report.js';
import { migrateAffiliations } from './resource.js';
import type { SearchApi } from './search-api.js';
import { errorMessage } from '../utils/errors.js';
import { stringField } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type { AffectedPublication, AffiliationKind, ItemActionResult, Report } from '../types/index.js';

export const affectedPublicationSchema = z.object({
    identifier: z.string().min(1),
    kind: z.enum(['contributor', 'owner']),
});

// Search parameter that finds publications referencing an organization in each role
const SEARCH_PARAMETER: Record<AffiliationKind, string> = {
    contributor: 'unit',
    owner: 'userAffiliation',
};

async function searchIdentifiers(
    search: Pick<SearchApi, 'searchResources'>,
    parameter: string,
    organization: string
): Promise<string[]> {
    const identifiers = new Set<string>();
    for await (const hit of search.searchResources({ [parameter]: organization, sort: 'modified_date:asc' })) {
        const identifier = stringField(hit, 'identifier');
        if (identifier) {
            identifiers.add(identifier);
        }
    }
    return [...identifiers];
}

/**
 * Report of publications referencing `organization` as a contributor affiliation
 * or as the owner affiliation. A publication may appear once per kind.
 */
export async function listAffectedPublications(
    search: Pick<SearchApi, 'searchResources'>,
    organization: string
): Promise<Report<AffectedPublication>> {
    const items: AffectedPublication[] = [];
    for (const kind of ['contributor', 'owner'] as const) {
        const identifiers = await searchIdentifiers(search, SEARCH_PARAMETER[kind], organization);
        logger.info(`Found ${identifiers.length} publications with ${kind} affiliation ${organization}`);
        items.push(...identifiers.map((identifier) => ({ identifier, kind })));
    }
    return createReport(organization, items);
}

/**
 * Rewrite affiliations for every report item. Items are independent; without
 * `apply` the changes are only described.
 */
export async function updateAffectedPublications(
    table: Pick<PublicationsTable, 'fetchResourceByIdentifier' | 'updateResource'>,
    items: AffectedPublication[],
    oldIdentifier: string,
    newIdentifier: string,
    apply: boolean
): Promise<ItemActionResult[]> {
    const results: ItemActionResult[] = [];

    for (const item of items) {
        const action = `migrate-${item.kind}`;
        try {
            const stored = await table.fetchResourceByIdentifier(item.identifier);
            if (!stored) {
                results.push({ id: item.identifier, action, status: 'failed', error: 'Resource not found' });
                continue;
            }

            const { resource, changes } = migrateAffiliations(item.kind, stored.resource, oldIdentifier, newIdentifier);
            const detail = changes.map((change) => `${change.path}: ${change.from} -> ${change.to}`).join('; ');
            if (changes.length === 0) {
                results.push({ id: item.identifier, action, status: 'skipped', detail: 'no matching affiliation' });
                continue;
            }
            if (!apply) {
                results.push({ id: item.identifier, action, status: 'dry-run', detail });
                continue;
            }

            await table.updateResource(stored, resource);
            logger.info(`Updated ${item.identifier}`, { changes: changes.length });
            results.push({ id: item.identifier, action, status: 'success', detail });
        } catch (error) {
            logger.error(`Failed to update ${item.identifier}`, error);
            results.push({ id: item.identifier, action, status: 'failed', error: errorMessage(error) });
        }
    }

    return results;
}
