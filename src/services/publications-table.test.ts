import { describe, it, expect, vi, beforeEach } from 'vitest';
import { deflateRawSync } from 'node:zlib';
import { ListTablesCommand } from '@aws-sdk/client-dynamodb';
import { QueryCommand, TransactWriteCommand } from '@aws-sdk/lib-dynamodb';

const { mockSend } = vi.hoisted(() => ({
    mockSend: vi.fn(),
}));

vi.mock('./aws-clients.js', () => ({
    getDynamoDBClient: vi.fn(() => ({ send: mockSend })),
    getDocumentClient: vi.fn(() => ({ send: mockSend })),
}));

// Import after mocks are established
import {
    IDENTIFIER_INDEX,
    PublicationsTable,
    deflateResource,
    inflateResource,
    prepareUpdate,
} from './publications-table.js';
import { ValidationError } from '../utils/errors.js';

const TABLE = 'nva-resources-master-pipelines-NvaPublicationApiPipeline-ABC-nva-publication-api';

async function openTable(): Promise<PublicationsTable> {
    mockSend.mockResolvedValueOnce({ TableNames: ['nva-customers-x', TABLE] });
    return PublicationsTable.open({ profile: 'dev' });
}

describe('resource codec', () => {
    it('inflates raw-deflated JSON from bytes or base64 text', () => {
        const bytes = deflateRawSync(Buffer.from('{"identifier":"018b"}', 'utf8'));

        expect(inflateResource(new Uint8Array(bytes))).toEqual({ identifier: '018b' });
        expect(inflateResource(bytes.toString('base64'))).toEqual({ identifier: '018b' });
    });

    it('reads back what it deflates', () => {
        const resource = { identifier: '018b', entityDescription: { mainTitle: 'Tittel æøå' } };

        expect(inflateResource(deflateResource(resource))).toEqual(resource);
    });

    it('rejects data that is not a deflated object', () => {
        expect(() => inflateResource(42)).toThrow(ValidationError);
        expect(() => inflateResource(new Uint8Array(deflateRawSync(Buffer.from('[1]'))))).toThrow(
            'Resource data is not a JSON object'
        );
        expect(() => inflateResource(new Uint8Array([1, 2, 3]))).toThrow(/could not be inflated/);
    });
});

describe('prepareUpdate', () => {
    it('builds a SET expression with positional placeholders', () => {
        expect(prepareUpdate('t', 'Resource:c:o', 'Resource:018b', { data: 'x', version: 'v' })).toEqual({
            TableName: 't',
            Key: { PK0: 'Resource:c:o', SK0: 'Resource:018b' },
            UpdateExpression: 'SET #attr1 = :val1, #attr2 = :val2',
            ExpressionAttributeNames: { '#attr1': 'data', '#attr2': 'version' },
            ExpressionAttributeValues: { ':val1': 'x', ':val2': 'v' },
        });
    });
});

describe('PublicationsTable', () => {
    beforeEach(() => {
        mockSend.mockReset();
    });

    it('finds its table by name pattern', async () => {
        const table = await openTable();

        expect(table.tableName).toBe(TABLE);
        expect(mockSend.mock.calls[0][0]).toBeInstanceOf(ListTablesCommand);
    });

    it('looks up a resource through the identifier index', async () => {
        const table = await openTable();
        mockSend.mockResolvedValueOnce({
            Items: [{ PK0: 'Resource:c:o', SK0: 'Resource:018b', data: deflateResource({ identifier: '018b' }) }],
        });

        const stored = await table.fetchResourceByIdentifier('018b');

        expect(stored).toEqual({ pk0: 'Resource:c:o', sk0: 'Resource:018b', resource: { identifier: '018b' } });
        const query = mockSend.mock.calls[1][0];
        expect(query).toBeInstanceOf(QueryCommand);
        expect(query.input).toEqual({
            TableName: TABLE,
            IndexName: IDENTIFIER_INDEX,
            KeyConditionExpression: 'PK3 = :pk3',
            ExpressionAttributeValues: { ':pk3': 'Resource:018b' },
            Limit: 1,
        });
    });

    it('returns undefined for an unknown identifier', async () => {
        const table = await openTable();
        mockSend.mockResolvedValueOnce({ Items: [] });

        await expect(table.fetchResourceByIdentifier('nope')).resolves.toBeUndefined();
    });

    it('writes a fresh version with the deflated data', async () => {
        const table = await openTable();

        const update = table.prepareResourceUpdate({ pk0: 'Resource:c:o', sk0: 'Resource:018b' }, { identifier: '018b' });

        expect(update.UpdateExpression).toBe('SET #attr1 = :val1, #attr2 = :val2');
        expect(inflateResource(update.ExpressionAttributeValues[':val1'])).toEqual({ identifier: '018b' });
        expect(update.ExpressionAttributeValues[':val2']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('splits updates into transactions of at most 100 items', async () => {
        const table = await openTable();
        mockSend.mockResolvedValue({});
        const updates = Array.from({ length: 205 }, (_, i) => prepareUpdate(TABLE, `pk-${i}`, `sk-${i}`, { version: 'v' }));

        await table.executeUpdates(updates);

        const transactions = mockSend.mock.calls.slice(1).map((call) => call[0]);
        expect(transactions.every((command) => command instanceof TransactWriteCommand)).toBe(true);
        expect(transactions.map((command) => command.input.TransactItems.length)).toEqual([100, 100, 5]);
        expect(transactions[2].input.TransactItems[0].Update.Key).toEqual({ PK0: 'pk-200', SK0: 'sk-200' });
    });

    it('inflates each page of an owner query', async () => {
        const table = await openTable();
        mockSend
            .mockResolvedValueOnce({ Items: [{ data: deflateResource({ identifier: 'a' }) }], LastEvaluatedKey: { PK0: 'k' } })
            .mockResolvedValueOnce({ Items: [{ data: deflateResource({ identifier: 'b' }) }, { PK0: 'no-data' }] });

        const pages = [];
        for await (const page of table.resourcesByOwner('cust', 'owner@194', 1)) {
            pages.push(page);
        }

        expect(pages).toEqual([[{ identifier: 'a' }], [{ identifier: 'b' }]]);
        expect(mockSend.mock.calls[1][0].input.ExpressionAttributeValues).toEqual({ ':pk0': 'Resource:cust:owner@194' });
        expect(mockSend.mock.calls[2][0].input.ExclusiveStartKey).toEqual({ PK0: 'k' });
    });
});
