// DynamoDB table discovery and paginated reads
import { ListTablesCommand } from '@aws-sdk/client-dynamodb';
import { QueryCommand, ScanCommand, type QueryCommandInput, type ScanCommandInput } from '@aws-sdk/lib-dynamodb';
import { getDocumentClient, getDynamoDBClient } from './aws-clients.js';
import { collectPages, iteratePages } from './pagination.js';
import { NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AwsContext, JsonObject } from '../types/index.js';

type Key = Record<string, unknown>;

export async function listTableNames(ctx: AwsContext): Promise<string[]> {
    return collectPages({
        service: 'dynamodb',
        operation: 'ListTables',
        fetchPage: async (start: string | undefined) => {
            const response = await getDynamoDBClient(ctx).send(
                new ListTablesCommand({ ExclusiveStartTableName: start })
            );
            return { items: response.TableNames, nextToken: response.LastEvaluatedTableName };
        },
    });
}

/**
 * First table whose name starts with `prefix`.
 */
export async function findTableByPrefix(ctx: AwsContext, prefix: string): Promise<string> {
    const tableName = (await listTableNames(ctx)).find((name) => name.startsWith(prefix));
    if (!tableName) {
        throw new NotFoundError(`No table found with prefix ${prefix}`);
    }
    logger.debug(`Using table ${tableName}`, { prefix });
    return tableName;
}

/**
 * First table whose name matches the regular expression `pattern`.
 */
export async function findTableByPattern(ctx: AwsContext, pattern: string): Promise<string> {
    const regex = new RegExp(pattern);
    const tableName = (await listTableNames(ctx)).find((name) => regex.test(name));
    if (!tableName) {
        throw new NotFoundError(`No table found matching ${pattern}`);
    }
    logger.debug(`Using table ${tableName}`, { pattern });
    return tableName;
}

/**
 * Scan a table page by page; each yielded array is one scan page.
 */
export function scanPages(
    ctx: AwsContext,
    input: ScanCommandInput
): AsyncGenerator<JsonObject[], void, undefined> {
    return iteratePages({
        service: 'dynamodb',
        operation: 'Scan',
        fetchPage: async (startKey: Key | undefined) => {
            const response = await getDocumentClient(ctx).send(
                new ScanCommand({ ...input, ExclusiveStartKey: startKey })
            );
            return { items: response.Items, nextToken: response.LastEvaluatedKey };
        },
    });
}

export async function scanAll(ctx: AwsContext, input: ScanCommandInput): Promise<JsonObject[]> {
    const items: JsonObject[] = [];
    for await (const page of scanPages(ctx, input)) {
        items.push(...page);
    }
    return items;
}

export function queryPages(
    ctx: AwsContext,
    input: QueryCommandInput
): AsyncGenerator<JsonObject[], void, undefined> {
    return iteratePages({
        service: 'dynamodb',
        operation: 'Query',
        fetchPage: async (startKey: Key | undefined) => {
            const response = await getDocumentClient(ctx).send(
                new QueryCommand({ ...input, ExclusiveStartKey: startKey })
            );
            return { items: response.Items, nextToken: response.LastEvaluatedKey };
        },
    });
}
