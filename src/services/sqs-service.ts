// SQS queue lookup, receive/delete helpers and draining to JSONL files
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
    ChangeMessageVisibilityCommand,
    DeleteMessageBatchCommand,
    GetQueueAttributesCommand,
    ListQueuesCommand,
    ReceiveMessageCommand,
    type Message,
} from '@aws-sdk/client-sqs';
import { getSQSClient } from './aws-clients.js';
import { collectPages } from './pagination.js';
import { NotFoundError, ValidationError, callRemote } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { fileTimestamp } from '../utils/time-utils.js';
import type { AwsContext, QueueMessage } from '../types/index.js';

// SQS limit for receive and batch delete
export const SQS_BATCH_LIMIT = 10;
const MAX_EMPTY_RECEIVES = 3;

export function queueNameOf(queueUrl: string): string {
    return queueUrl.split('/').pop() ?? queueUrl;
}

function definedValues(record: Partial<Record<string, string>> | undefined): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(record ?? {})) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

export function toQueueMessage(message: Message): QueueMessage {
    const body = message.Body ?? '';
    let parsedBody: unknown = null;
    try {
        parsedBody = JSON.parse(body);
    } catch {
        parsedBody = null;
    }
    return {
        MessageId: message.MessageId ?? '',
        ReceiptHandle: message.ReceiptHandle,
        Body: body,
        Attributes: definedValues(message.Attributes),
        MessageAttributes: Object.fromEntries(
            Object.entries(message.MessageAttributes ?? {}).map(([name, value]) => [
                name,
                { StringValue: value.StringValue, DataType: value.DataType },
            ])
        ),
        MD5OfBody: message.MD5OfBody,
        ParsedBody: parsedBody,
    };
}

export interface DrainOptions {
    outputDir?: string;
    messagesPerFile?: number;
    deleteAfterWrite?: boolean;
    waitTimeSeconds?: number;
}

export interface DrainSummary {
    queue_name: string;
    profile: string;
    total_messages: number;
    files_created: number;
    messages_deleted: boolean;
    timestamp_start: string;
    timestamp_end: string;
    outputDir: string;
}

export class SqsService {
    private readonly log;

    constructor(private readonly ctx: AwsContext) {
        this.log = logger.child({ service: 'sqs', profile: ctx.profile });
    }

    private get client() {
        return getSQSClient(this.ctx);
    }

    async listQueueUrls(filter?: string): Promise<string[]> {
        const urls = await collectPages({
            service: 'sqs',
            operation: 'ListQueues',
            fetchPage: async (token: string | undefined) => {
                const response = await this.client.send(new ListQueuesCommand({ NextToken: token }));
                return { items: response.QueueUrls, nextToken: response.NextToken };
            },
        });
        const needle = filter?.toLowerCase();
        return urls.filter((url) => !needle || url.toLowerCase().includes(needle)).sort();
    }

    /**
     * Resolve a queue URL from a full URL or a case-insensitive part of its name.
     * More than one match is an error listing the candidates.
     */
    async findQueueUrl(queue: string): Promise<string> {
        if (/^https?:\/\//.test(queue)) {
            return queue;
        }
        const needle = queue.toLowerCase();
        const matches = (await this.listQueueUrls()).filter((url) => queueNameOf(url).toLowerCase().includes(needle));
        if (matches.length === 0) {
            throw new NotFoundError(`No queues found matching '${queue}'`);
        }
        const exact = matches.find((url) => queueNameOf(url) === queue);
        if (exact) {
            return exact;
        }
        if (matches.length > 1) {
            throw new ValidationError(
                `Queue name '${queue}' is ambiguous: ${matches.map(queueNameOf).join(', ')}`
            );
        }
        this.log.debug(`Found queue ${queueNameOf(matches[0])}`);
        return matches[0];
    }

    async getQueueAttributes(queueUrl: string): Promise<Record<string, string>> {
        const response = await callRemote('sqs', 'GetQueueAttributes', () =>
            this.client.send(new GetQueueAttributesCommand({ QueueUrl: queueUrl, AttributeNames: ['All'] }))
        );
        return definedValues(response.Attributes);
    }

    async receiveMessages(queueUrl: string, waitTimeSeconds: number, maxMessages = SQS_BATCH_LIMIT): Promise<QueueMessage[]> {
        const response = await callRemote('sqs', 'ReceiveMessage', () =>
            this.client.send(
                new ReceiveMessageCommand({
                    QueueUrl: queueUrl,
                    MaxNumberOfMessages: Math.min(maxMessages, SQS_BATCH_LIMIT),
                    WaitTimeSeconds: waitTimeSeconds,
                    MessageAttributeNames: ['All'],
                    AttributeNames: ['All'],
                })
            )
        );
        return (response.Messages ?? []).map(toQueueMessage);
    }

    async releaseMessage(queueUrl: string, receiptHandle: string): Promise<void> {
        await callRemote('sqs', 'ChangeMessageVisibility', () =>
            this.client.send(
                new ChangeMessageVisibilityCommand({ QueueUrl: queueUrl, ReceiptHandle: receiptHandle, VisibilityTimeout: 0 })
            )
        );
    }

    /**
     * Delete messages in batches of ten; returns how many were deleted.
     */
    async deleteMessages(queueUrl: string, receiptHandles: string[]): Promise<number> {
        let deleted = 0;
        for (let start = 0; start < receiptHandles.length; start += SQS_BATCH_LIMIT) {
            const batch = receiptHandles.slice(start, start + SQS_BATCH_LIMIT);
            const response = await callRemote('sqs', 'DeleteMessageBatch', () =>
                this.client.send(
                    new DeleteMessageBatchCommand({
                        QueueUrl: queueUrl,
                        Entries: batch.map((handle, index) => ({ Id: String(index), ReceiptHandle: handle })),
                    })
                )
            );
            deleted += response.Successful?.length ?? 0;
            for (const failure of response.Failed ?? []) {
                this.log.warn(`Failed to delete message: ${failure.Message ?? failure.Code ?? 'unknown error'}`);
            }
        }
        return deleted;
    }

    /**
     * Receive until the queue stays empty for three receives, writing messages
     * (without receipt handles) to numbered JSONL files. With `deleteAfterWrite`
     * each file's messages are deleted once written.
     */
    async drainQueue(queueUrl: string, options: DrainOptions = {}): Promise<DrainSummary> {
        const { messagesPerFile = 1000, deleteAfterWrite = false, waitTimeSeconds = 20 } = options;
        const queueName = queueNameOf(queueUrl);
        const profile = this.ctx.profile ?? 'default';
        const timestampStart = fileTimestamp();
        const outputDir = options.outputDir ?? `${profile}-${queueName}-${timestampStart}`;

        const attributes = await this.getQueueAttributes(queueUrl);
        this.log.info(`Queue has approximately ${attributes.ApproximateNumberOfMessages ?? 0} messages`);

        await mkdir(outputDir, { recursive: true });
        await writeFile(
            join(outputDir, 'metadata.json'),
            JSON.stringify({ queue_url: queueUrl, queue_name: queueName, profile, timestamp: timestampStart, attributes }, null, 2),
            'utf8'
        );

        let totalMessages = 0;
        let filesCreated = 0;
        let buffer: QueueMessage[] = [];

        const flush = async () => {
            if (buffer.length === 0) {
                return;
            }
            filesCreated += 1;
            const file = `messages_${String(filesCreated).padStart(4, '0')}.jsonl`;
            const lines = buffer.map(({ ReceiptHandle: _receiptHandle, ...saved }) => JSON.stringify(saved));
            await writeFile(join(outputDir, file), `${lines.join('\n')}\n`, 'utf8');
            this.log.info(`Wrote ${buffer.length} messages to ${file}`);

            if (deleteAfterWrite) {
                const handles = buffer.flatMap((message) => (message.ReceiptHandle ? [message.ReceiptHandle] : []));
                const deleted = await this.deleteMessages(queueUrl, handles);
                if (deleted !== handles.length) {
                    this.log.warn(`Only deleted ${deleted}/${handles.length} messages`);
                }
            }
            buffer = [];
        };

        let emptyReceives = 0;
        while (emptyReceives < MAX_EMPTY_RECEIVES) {
            const messages = await this.receiveMessages(queueUrl, waitTimeSeconds);
            if (messages.length === 0) {
                emptyReceives += 1;
                continue;
            }
            emptyReceives = 0;
            for (const message of messages) {
                buffer.push(message);
                totalMessages += 1;
                if (buffer.length >= messagesPerFile) {
                    await flush();
                }
            }
        }
        await flush();

        const summary: DrainSummary = {
            queue_name: queueName,
            profile,
            total_messages: totalMessages,
            files_created: filesCreated,
            messages_deleted: deleteAfterWrite,
            timestamp_start: timestampStart,
            timestamp_end: fileTimestamp(),
            outputDir,
        };
        const { outputDir: _dir, ...persisted } = summary;
        await writeFile(join(outputDir, 'summary.json'), JSON.stringify(persisted, null, 2), 'utf8');
        this.log.info(`Drained ${totalMessages} messages from ${queueName}`, { outputDir, files: filesCreated });
        return summary;
    }
}
