import { Command } from 'commander';
import { accountContext, parsePositiveInt, reportResults } from './shared.js';
import { purgeMessages, readMessages, selectByBodyPrefix, summarizeMessages } from '../services/dlq-service.js';
import { SqsService } from '../services/sqs-service.js';
import { logger } from '../utils/logger.js';
import { printJson } from '../utils/output.js';
import { confirm } from '../utils/prompt.js';

export function dlqCommand(): Command {
    const group = new Command('dlq').description('Inspect and purge dead-letter queues');

    group
        .command('read')
        .description('Read messages without consuming them and summarize by sender and body')
        .requiredOption('-q, --queue <queue>', 'Queue URL or part of its name')
        .option('-c, --count <n>', 'Max number of messages to read', parsePositiveInt, 100)
        .action(async (options: { queue: string; count: number }, command: Command) => {
            const sqs = new SqsService(accountContext(command));
            const queueUrl = await sqs.findQueueUrl(options.queue);
            const messages = await readMessages(sqs, queueUrl, options.count);
            logger.info(`Read ${messages.length} messages`);
            printJson(summarizeMessages(messages));
        });

    group
        .command('purge')
        .description('Delete messages whose body starts with a prefix (dry run unless --delete)')
        .requiredOption('-q, --queue <queue>', 'Queue URL or part of its name')
        .requiredOption('-p, --prefix <prefix>', 'Body prefix of the messages to delete')
        .option('-c, --count <n>', 'Max number of messages to read', parsePositiveInt, 100)
        .option('--delete', 'Actually delete the matching messages', false)
        .option('-y, --yes', 'Skip the confirmation prompt', false)
        .action(
            async (
                options: { queue: string; prefix: string; count: number; delete: boolean; yes: boolean },
                command: Command
            ) => {
                const sqs = new SqsService(accountContext(command));
                const queueUrl = await sqs.findQueueUrl(options.queue);
                const messages = selectByBodyPrefix(await readMessages(sqs, queueUrl, options.count), options.prefix);
                logger.info(`${messages.length} messages match prefix '${options.prefix}'`, { queueUrl });
                printJson(summarizeMessages(messages));

                if (options.delete && messages.length > 0 && !options.yes) {
                    if (!(await confirm(`Delete ${messages.length} messages from this queue?`))) {
                        logger.warn('Aborted, nothing was deleted');
                        return;
                    }
                }
                reportResults(await purgeMessages(sqs, queueUrl, messages, options.delete));
            }
        );

    return group;
}
