import { Command } from 'commander';
import { accountContext, parsePositiveInt } from './shared.js';
import { analyzeDrainedFolder } from '../services/sqs-analyzer.js';
import { SqsService, queueNameOf } from '../services/sqs-service.js';
import { logger } from '../utils/logger.js';
import { printJson, printLine } from '../utils/output.js';
import { confirm } from '../utils/prompt.js';

interface DrainCommandOptions {
    outputDir?: string;
    messagesPerFile: number;
    delete: boolean;
    yes: boolean;
}

// Attributes shown by `sqs info`, in display order
const INFO_ATTRIBUTES: Array<[string, string]> = [
    ['ApproximateNumberOfMessages', 'Approximate messages'],
    ['ApproximateNumberOfMessagesNotVisible', 'Messages in flight'],
    ['ApproximateNumberOfMessagesDelayed', 'Delayed messages'],
    ['VisibilityTimeout', 'Visibility timeout (s)'],
    ['MessageRetentionPeriod', 'Message retention (s)'],
    ['MaximumMessageSize', 'Max message size (bytes)'],
    ['ReceiveMessageWaitTimeSeconds', 'Receive wait time (s)'],
    ['RedrivePolicy', 'Redrive policy'],
    ['CreatedTimestamp', 'Created'],
    ['LastModifiedTimestamp', 'Last modified'],
];

export function sqsCommand(): Command {
    const group = new Command('sqs').description('Manage SQS queues and messages');

    group
        .command('list')
        .description('List queues in the account')
        .option('--filter <text>', 'Only queues whose URL contains the text')
        .action(async (options: { filter?: string }, command: Command) => {
            const urls = await new SqsService(accountContext(command)).listQueueUrls(options.filter);
            for (const url of urls) {
                printLine(queueNameOf(url));
            }
            logger.info(`Total: ${urls.length} queue(s)`);
        });

    group
        .command('info')
        .description('Show queue statistics and configuration')
        .argument('<queue>', 'Queue URL or part of its name')
        .action(async (queue: string, _options: unknown, command: Command) => {
            const sqs = new SqsService(accountContext(command));
            const queueUrl = await sqs.findQueueUrl(queue);
            const attributes = await sqs.getQueueAttributes(queueUrl);
            printLine(`Queue: ${queueNameOf(queueUrl)}`);
            printLine(`URL: ${queueUrl}`);
            for (const [name, label] of INFO_ATTRIBUTES) {
                if (attributes[name] !== undefined) {
                    printLine(`  ${label}: ${attributes[name]}`);
                }
            }
        });

    group
        .command('drain')
        .description('Receive every message into JSONL files, optionally deleting them')
        .argument('<queue>', 'Queue URL or part of its name')
        .option('--output-dir <dir>', 'Output folder (default <profile>-<queue>-<timestamp>)')
        .option('--messages-per-file <n>', 'Max messages per JSONL file', parsePositiveInt, 1000)
        .option('--delete', 'Delete messages after they are written', false)
        .option('-y, --yes', 'Skip the confirmation prompt', false)
        .action(async (queue: string, options: DrainCommandOptions, command: Command) => {
            const sqs = new SqsService(accountContext(command));
            const queueUrl = await sqs.findQueueUrl(queue);

            if (!options.yes) {
                const warning = options.delete ? ' Messages will be DELETED after writing.' : '';
                if (!(await confirm(`Drain ${queueNameOf(queueUrl)}?${warning}`))) {
                    logger.warn('Operation cancelled');
                    return;
                }
            }

            const summary = await sqs.drainQueue(queueUrl, {
                outputDir: options.outputDir,
                messagesPerFile: options.messagesPerFile,
                deleteAfterWrite: options.delete,
            });
            printJson(summary);
        });

    group
        .command('analyze')
        .description('Summarize messages in a folder written by drain')
        .argument('<folder>', 'Drain output folder')
        .action(async (folder: string) => {
            printJson(await analyzeDrainedFolder(folder));
        });

    return group;
}
