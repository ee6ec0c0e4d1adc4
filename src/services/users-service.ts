// Users-and-roles table search and terms acceptance
import { PutCommand } from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { getParameter } from './account-service.js';
import { getDocumentClient } from './aws-clients.js';
import { findTableByPrefix, scanPages } from './dynamodb-service.js';
import { requestJson } from './http.js';
import { matchAllWords } from './reconcile.js';
import { getConfig } from '../utils/config.js';
import { NotFoundError, callRemote } from '../utils/errors.js';
import { serviceTimestamp } from '../utils/time-utils.js';
import type { AwsContext, JsonObject } from '../types/index.js';

const currentTermsSchema = z.object({ termsConditionsUri: z.string().min(1) });

export interface TermsAcceptance {
    id: string;
    type: 'TermsConditions';
    created: string;
    modified: string;
    modifiedBy: string;
    owner: string;
    termsConditionsUri: string;
}

export function itemText(item: JsonObject): string {
    return Object.values(item)
        .map((value) => (typeof value === 'string' ? value : JSON.stringify(value)))
        .join(' ');
}

export function termsAcceptance(
    apiDomain: string,
    personId: string,
    termsConditionsUri: string,
    systemUser: string,
    now: Date = new Date()
): TermsAcceptance {
    const timestamp = serviceTimestamp(now);
    return {
        id: `https://${apiDomain}/cristin/person/${personId}`,
        type: 'TermsConditions',
        created: timestamp,
        modified: timestamp,
        modifiedBy: systemUser,
        owner: systemUser,
        termsConditionsUri,
    };
}

export class UsersService {
    constructor(private readonly ctx: AwsContext) {}

    async search(searchTerm: string): Promise<JsonObject[]> {
        const tableName = await findTableByPrefix(this.ctx, getConfig().tables.usersPrefix);
        const matches: JsonObject[] = [];
        for await (const page of scanPages(this.ctx, { TableName: tableName })) {
            matches.push(...matchAllWords(page, searchTerm, itemText));
        }
        return matches;
    }

    async currentTermsUri(apiDomain: string): Promise<string> {
        const raw = await requestJson(
            'users-roles',
            'GetCurrentTerms',
            `https://${apiDomain}/users-roles/terms-and-conditions/current`
        );
        const parsed = currentTermsSchema.safeParse(raw);
        if (!parsed.success) {
            throw new NotFoundError('Current terms and conditions URI not found');
        }
        return parsed.data.termsConditionsUri;
    }

    /**
     * Record that a person has accepted the current terms and conditions.
     */
    async approveTerms(personId: string): Promise<TermsAcceptance> {
        const config = getConfig();
        const apiDomain = await getParameter(this.ctx, config.parameters.apiDomain);
        const tableName = await findTableByPrefix(this.ctx, config.tables.termsPrefix);
        const termsUri = await this.currentTermsUri(apiDomain);

        const item = termsAcceptance(apiDomain, personId, termsUri, config.systemUser);
        await callRemote('dynamodb', 'PutItem', () =>
            getDocumentClient(this.ctx).send(new PutCommand({ TableName: tableName, Item: { ...item } }))
        );
        return item;
    }
}
