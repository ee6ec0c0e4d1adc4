// Dead-letter queue inspection and selective purging
import type { SqsService } from './sqs-service.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ItemActionResult, MessageSummary, MessageSummaryEntry, QueueMessage } from '../types/index.js';

export const BODY_PREFIX_LENGTH = 50;
const UNKNOWN = 'Unknown';

type QueueAccess = Pick<SqsService, 'receiveMessages' | 'releaseMessage' | 'deleteMessages'>;

/**
 * Read up to `maxCount` distinct messages. Every received message is made
 * visible again at once, and a message received more than once keeps the
 * receipt handle of its latest receive.
 */
export async function readMessages(
    sqs: QueueAccess,
    queueUrl: string,
    maxCount: number,
    waitTimeSeconds = 1
): Promise<QueueMessage[]> {
    const messages = new Map<string, QueueMessage>();

    while (messages.size < maxCount) {
        const received = await sqs.receiveMessages(queueUrl, waitTimeSeconds);
        let added = 0;
        for (const message of received) {
            if (message.ReceiptHandle) {
                await sqs.releaseMessage(queueUrl, message.ReceiptHandle);
            }
            const known = messages.get(message.MessageId);
            if (known) {
                messages.set(message.MessageId, { ...known, ReceiptHandle: message.ReceiptHandle ?? known.ReceiptHandle });
            } else if (messages.size < maxCount) {
                messages.set(message.MessageId, message);
                added += 1;
            }
        }
        logger.debug(`Received ${received.length} messages, ${messages.size} total`);
        if (added === 0) {
            break;
        }
    }

    return [...messages.values()];
}

function addTo(groups: Map<string, MessageSummaryEntry>, key: string, candidate: string): void {
    const entry = groups.get(key) ?? { count: 0, candidates: [] };
    entry.count += 1;
    if (!entry.candidates.includes(candidate)) {
        entry.candidates.push(candidate);
    }
    groups.set(key, entry);
}

/**
 * Counts and candidate identifiers per sender and per body prefix.
 */
export function summarizeMessages(messages: QueueMessage[]): MessageSummary {
    const bySender = new Map<string, MessageSummaryEntry>();
    const byBody = new Map<string, MessageSummaryEntry>();
    for (const message of messages) {
        const sender = message.Attributes.SenderId ?? UNKNOWN;
        const body = message.Body.slice(0, BODY_PREFIX_LENGTH);
        const candidate = message.MessageAttributes.candidateIdentifier?.StringValue ?? UNKNOWN;
        addTo(bySender, sender, candidate);
        addTo(byBody, body, candidate);
    }
    return { bySender: Object.fromEntries(bySender), byBody: Object.fromEntries(byBody) };
}

export function selectByBodyPrefix(messages: QueueMessage[], prefix: string): QueueMessage[] {
    return messages.filter((message) => message.Body.startsWith(prefix));
}

/**
 * Delete the given messages when `apply` is set; one result per message.
 */
export async function purgeMessages(
    sqs: QueueAccess,
    queueUrl: string,
    messages: QueueMessage[],
    apply: boolean
): Promise<ItemActionResult[]> {
    const results: ItemActionResult[] = [];
    for (const message of messages) {
        const id = message.MessageId;
        if (!apply) {
            results.push({ id, action: 'delete-message', status: 'dry-run' });
            continue;
        }
        if (!message.ReceiptHandle) {
            results.push({ id, action: 'delete-message', status: 'failed', error: 'Message has no receipt handle' });
            continue;
        }
        try {
            const deleted = await sqs.deleteMessages(queueUrl, [message.ReceiptHandle]);
            results.push(
                deleted === 1
                    ? { id, action: 'delete-message', status: 'success' }
                    : { id, action: 'delete-message', status: 'failed', error: 'Delete was rejected by SQS' }
            );
        } catch (error) {
            results.push({ id, action: 'delete-message', status: 'failed', error: errorMessage(error) });
        }
    }
    logger.info(`Purge of ${messages.length} messages finished`, { apply });
    return results;
}
