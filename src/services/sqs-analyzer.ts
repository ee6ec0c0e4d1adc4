// Statistics over a folder written by the drain command
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { summarizeMessages } from './dlq-service.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { MessageSummary, QueueMessage } from '../types/index.js';

const MESSAGE_FILE = /^messages_\d+\.jsonl$/;
const EXCEPTION_NAME = /\b(?:[a-z_][\w]*\.)*[A-Z]\w*(?:Exception|Error)\b/g;

const drainedMessageSchema = z.object({
    MessageId: z.string(),
    Body: z.string().default(''),
    Attributes: z.record(z.string()).default({}),
    MessageAttributes: z
        .record(z.object({ StringValue: z.string().optional(), DataType: z.string().optional() }))
        .default({}),
    MD5OfBody: z.string().optional(),
    ParsedBody: z.unknown().optional(),
});

export interface DrainAnalysis {
    files: string[];
    totalMessages: number;
    exceptionTypes: Record<string, number>;
    messageAttributes: Record<string, number>;
    summary: MessageSummary;
}

/**
 * Qualified exception/error class names mentioned in a message body, each once.
 */
export function exceptionNames(body: string): string[] {
    return [...new Set(body.match(EXCEPTION_NAME) ?? [])];
}

function countDescending(counts: Map<string, number>): Record<string, number> {
    return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0])));
}

export function analyzeMessages(messages: QueueMessage[]): Omit<DrainAnalysis, 'files'> {
    const exceptions = new Map<string, number>();
    const attributes = new Map<string, number>();

    for (const message of messages) {
        for (const name of exceptionNames(message.Body)) {
            exceptions.set(name, (exceptions.get(name) ?? 0) + 1);
        }
        for (const name of Object.keys(message.MessageAttributes)) {
            attributes.set(name, (attributes.get(name) ?? 0) + 1);
        }
    }

    return {
        totalMessages: messages.length,
        exceptionTypes: countDescending(exceptions),
        messageAttributes: countDescending(attributes),
        summary: summarizeMessages(messages),
    };
}

export async function readDrainedMessages(folder: string): Promise<{ files: string[]; messages: QueueMessage[] }> {
    let entries: string[];
    try {
        entries = await readdir(folder);
    } catch (error) {
        throw new NotFoundError(`Cannot read folder ${folder}`, { cause: error });
    }
    const files = entries.filter((name) => MESSAGE_FILE.test(name)).sort();
    const messages: QueueMessage[] = [];

    for (const file of files) {
        const lines = (await readFile(join(folder, file), 'utf8')).split('\n');
        lines.forEach((line, index) => {
            if (line.trim().length === 0) {
                return;
            }
            let json: unknown;
            try {
                json = JSON.parse(line);
            } catch (error) {
                throw new ValidationError(`${file}:${index + 1} is not valid JSON`, { cause: error });
            }
            const parsed = drainedMessageSchema.safeParse(json);
            if (!parsed.success) {
                throw new ValidationError(`${file}:${index + 1} is not a drained message`);
            }
            messages.push(parsed.data);
        });
    }

    return { files, messages };
}

export async function analyzeDrainedFolder(folder: string): Promise<DrainAnalysis> {
    const { files, messages } = await readDrainedMessages(folder);
    if (files.length === 0) {
        throw new NotFoundError(`No messages_*.jsonl files in ${folder}`);
    }
    return { files, ...analyzeMessages(messages) };
}
