// Affiliation rewrites on inflated publication resources
import { z } from 'zod';
import type { AffiliationKind, JsonObject } from '../types/index.js';

const affiliationSchema = z.object({ id: z.string().optional() }).passthrough();
const contributorSchema = z.object({ affiliations: z.array(affiliationSchema).optional() }).passthrough();
const resourceSchema = z
    .object({
        identifier: z.string().optional(),
        entityDescription: z
            .object({ contributors: z.array(contributorSchema).optional() })
            .passthrough()
            .optional(),
        resourceOwner: z.object({ ownerAffiliation: z.string().optional() }).passthrough().optional(),
    })
    .passthrough();

export interface AffiliationChange {
    kind: AffiliationKind;
    path: string;
    from: string;
    to: string;
}

export interface MigrationResult {
    resource: JsonObject;
    changes: AffiliationChange[];
}

function replaceSuffix(value: string, oldIdentifier: string, newIdentifier: string): string | undefined {
    if (oldIdentifier.length === 0 || !value.endsWith(oldIdentifier)) {
        return undefined;
    }
    return value.slice(0, value.length - oldIdentifier.length) + newIdentifier;
}

/**
 * Rewrite contributor affiliation ids ending in `oldIdentifier`.
 * The input is never modified; the result holds a copy.
 */
export function migrateContributorAffiliations(
    data: JsonObject,
    oldIdentifier: string,
    newIdentifier: string
): MigrationResult {
    const resource = resourceSchema.parse(structuredClone(data));
    const changes: AffiliationChange[] = [];

    resource.entityDescription?.contributors?.forEach((contributor, c) => {
        contributor.affiliations?.forEach((affiliation, a) => {
            const replaced = affiliation.id && replaceSuffix(affiliation.id, oldIdentifier, newIdentifier);
            if (affiliation.id && replaced) {
                changes.push({
                    kind: 'contributor',
                    path: `entityDescription.contributors[${c}].affiliations[${a}].id`,
                    from: affiliation.id,
                    to: replaced,
                });
                affiliation.id = replaced;
            }
        });
    });

    return { resource, changes };
}

/**
 * Rewrite the owner affiliation when it ends in `oldIdentifier`.
 */
export function migrateOwnerAffiliation(data: JsonObject, oldIdentifier: string, newIdentifier: string): MigrationResult {
    const resource = resourceSchema.parse(structuredClone(data));
    const changes: AffiliationChange[] = [];

    const owner = resource.resourceOwner;
    const replaced = owner?.ownerAffiliation && replaceSuffix(owner.ownerAffiliation, oldIdentifier, newIdentifier);
    if (owner?.ownerAffiliation && replaced) {
        changes.push({
            kind: 'owner',
            path: 'resourceOwner.ownerAffiliation',
            from: owner.ownerAffiliation,
            to: replaced,
        });
        owner.ownerAffiliation = replaced;
    }

    return { resource, changes };
}

export function migrateAffiliations(
    kind: AffiliationKind,
    data: JsonObject,
    oldIdentifier: string,
    newIdentifier: string
): MigrationResult {
    return kind === 'contributor'
        ? migrateContributorAffiliations(data, oldIdentifier, newIdentifier)
        : migrateOwnerAffiliation(data, oldIdentifier, newIdentifier);
}
