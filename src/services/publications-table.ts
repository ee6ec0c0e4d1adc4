// Publication records stored as deflated JSON in the resources table
import { deflateRawSync, inflateRawSync } from 'node:zlib';
import { QueryCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import { getDocumentClient } from './aws-clients.js';
import { findTableByPattern, queryPages, scanPages } from './dynamodb-service.js';
import { callRemote, ValidationError, errorMessage } from '../utils/errors.js';
import { getConfig } from '../utils/config.js';
import { isJsonObject } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type { AwsContext, JsonObject } from '../types/index.js';

export const RESOURCE_PREFIX = 'Resource:';
export const IDENTIFIER_INDEX = 'ResourcesByIdentifier';

// DynamoDB accepts at most 100 actions per transaction
const MAX_TRANSACTION_ITEMS = 100;

export interface StoredResource {
    pk0: string;
    sk0: string;
    resource: JsonObject;
}

export interface ResourceUpdate {
    TableName: string;
    Key: { PK0: string; SK0: string };
    UpdateExpression: string;
    ExpressionAttributeNames: Record<string, string>;
    ExpressionAttributeValues: Record<string, unknown>;
}

export function inflateResource(data: unknown): JsonObject {
    let buffer: Buffer;
    if (data instanceof Uint8Array) {
        buffer = Buffer.from(data);
    } else if (typeof data === 'string') {
        buffer = Buffer.from(data, 'base64');
    } else {
        throw new ValidationError('Resource data is neither binary nor base64 text');
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(inflateRawSync(buffer).toString('utf8'));
    } catch (error) {
        throw new ValidationError(`Resource data could not be inflated: ${errorMessage(error)}`, { cause: error });
    }
    if (!isJsonObject(parsed)) {
        throw new ValidationError('Resource data is not a JSON object');
    }
    return parsed;
}

export function deflateResource(resource: JsonObject): Uint8Array {
    return new Uint8Array(deflateRawSync(Buffer.from(JSON.stringify(resource), 'utf8')));
}

/**
 * SET update for the given attributes with positional placeholders.
 */
export function prepareUpdate(
    tableName: string,
    pk0: string,
    sk0: string,
    attributes: Record<string, unknown>
): ResourceUpdate {
    const assignments: string[] = [];
    const names: Record<string, string> = {};
    const values: Record<string, unknown> = {};

    Object.entries(attributes).forEach(([name, value], index) => {
        const namePlaceholder = `#attr${index + 1}`;
        const valuePlaceholder = `:val${index + 1}`;
        assignments.push(`${namePlaceholder} = ${valuePlaceholder}`);
        names[namePlaceholder] = name;
        values[valuePlaceholder] = value;
    });

    return {
        TableName: tableName,
        Key: { PK0: pk0, SK0: sk0 },
        UpdateExpression: `SET ${assignments.join(', ')}`,
        ExpressionAttributeNames: names,
        ExpressionAttributeValues: values,
    };
}

export class PublicationsTable {
    private constructor(
        private readonly ctx: AwsContext,
        readonly tableName: string
    ) {}

    static async open(ctx: AwsContext): Promise<PublicationsTable> {
        const tableName = await findTableByPattern(ctx, getConfig().tables.publicationsPattern);
        return new PublicationsTable(ctx, tableName);
    }

    /**
     * Inflated resources of one customer/owner pair, one array per query page.
     */
    async *resourcesByOwner(
        customer: string,
        owner: string,
        batchSize: number
    ): AsyncGenerator<JsonObject[], void, undefined> {
        const pages = queryPages(this.ctx, {
            TableName: this.tableName,
            KeyConditionExpression: 'PK0 = :pk0',
            ExpressionAttributeValues: { ':pk0': `${RESOURCE_PREFIX}${customer}:${owner}` },
            Limit: batchSize,
        });
        for await (const items of pages) {
            if (items.length > 0) {
                yield items.flatMap((item) => ('data' in item ? [inflateResource(item.data)] : []));
            }
        }
    }

    /**
     * Every resource in the table, inflated, one array per scan page.
     */
    async *allResources(batchSize: number): AsyncGenerator<JsonObject[], void, undefined> {
        const pages = scanPages(this.ctx, {
            TableName: this.tableName,
            FilterExpression: 'begins_with(PK0, :prefix) AND begins_with(SK0, :prefix)',
            ExpressionAttributeValues: { ':prefix': RESOURCE_PREFIX },
            Limit: batchSize,
        });
        let total = 0;
        for await (const items of pages) {
            if (items.length === 0) {
                continue;
            }
            total += items.length;
            logger.debug(`Read ${items.length} resources, total ${total}`);
            yield items.flatMap((item) => ('data' in item ? [inflateResource(item.data)] : []));
        }
    }

    async fetchResourceByIdentifier(identifier: string): Promise<StoredResource | undefined> {
        const response = await callRemote('dynamodb', 'Query', () =>
            getDocumentClient(this.ctx).send(
                new QueryCommand({
                    TableName: this.tableName,
                    IndexName: IDENTIFIER_INDEX,
                    KeyConditionExpression: 'PK3 = :pk3',
                    ExpressionAttributeValues: { ':pk3': `${RESOURCE_PREFIX}${identifier}` },
                    Limit: 1,
                })
            )
        );
        const item = response.Items?.[0];
        if (!item) {
            return undefined;
        }
        const { PK0: pk0, SK0: sk0, data } = item;
        if (typeof pk0 !== 'string' || typeof sk0 !== 'string') {
            throw new ValidationError(`Resource ${identifier} has no PK0/SK0 key`);
        }
        return { pk0, sk0, resource: inflateResource(data) };
    }

    /**
     * Update attributes for a stored resource, writing `version` as a fresh uuid.
     */
    prepareResourceUpdate(stored: Pick<StoredResource, 'pk0' | 'sk0'>, resource: JsonObject): ResourceUpdate {
        return prepareUpdate(this.tableName, stored.pk0, stored.sk0, {
            data: deflateResource(resource),
            version: uuidv4(),
        });
    }

    async executeUpdates(updates: ResourceUpdate[]): Promise<void> {
        for (let start = 0; start < updates.length; start += MAX_TRANSACTION_ITEMS) {
            const chunk = updates.slice(start, start + MAX_TRANSACTION_ITEMS);
            await callRemote('dynamodb', 'TransactWriteItems', () =>
                getDocumentClient(this.ctx).send(
                    new TransactWriteCommand({ TransactItems: chunk.map((update) => ({ Update: update })) })
                )
            );
        }
    }

    async updateResource(stored: StoredResource, resource: JsonObject): Promise<void> {
        await this.executeUpdates([this.prepareResourceUpdate(stored, resource)]);
    }
}
