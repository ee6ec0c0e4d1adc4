import { Command } from 'commander';
import { accountContext, reportResults, splitList } from './shared.js';
import { describeAccount } from '../services/account-service.js';
import { BackendSession } from '../services/backend-session.js';
import { HandleApi } from '../services/handle-api.js';
import {
    DEFAULT_BATCH_SIZE,
    DoneTaskLog,
    HandleTaskExecutor,
    HandleTaskWriter,
    prepareHandleTasks,
} from '../services/handle-tasks.js';
import { PublicationsTable } from '../services/publications-table.js';
import { getConfig } from '../utils/config.js';
import { ValidationError } from '../utils/errors.js';
import { printJson } from '../utils/output.js';

interface PrepareCommandOptions {
    customer: string;
    resourceOwner: string;
    prefix: string;
    outputFolder?: string;
    applicationDomain?: string;
}

export function handleCommand(): Command {
    const group = new Command('handle').description('Import externally registered handles');

    group
        .command('prepare')
        .description('Write batch files of handle tasks for one customer and resource owner')
        .requiredOption('-c, --customer <uuid>', 'Customer identifier')
        .requiredOption('-r, --resource-owner <owner>', 'Resource owner, e.g. ntnu@194.0.0.0')
        .requiredOption('--prefix <prefixes>', 'Comma-separated handle prefixes to import')
        .option('-o, --output-folder <dir>', 'Folder for the batch files')
        .option('--application-domain <domain>', 'Domain of the landing pages the handles point to')
        .action(async (options: PrepareCommandOptions, command: Command) => {
            const config = getConfig();
            const applicationDomain = options.applicationDomain ?? config.applicationDomain;
            if (!applicationDomain) {
                throw new ValidationError('Pass --application-domain or set APPLICATION_DOMAIN');
            }
            const controlledPrefixes = splitList(options.prefix);
            if (controlledPrefixes.length === 0) {
                throw new ValidationError('--prefix needs at least one handle prefix');
            }

            const ctx = accountContext(command);
            const outputFolder =
                options.outputFolder ?? `${await describeAccount(ctx)}-resources-${options.resourceOwner}-handle-tasks`;
            const table = await PublicationsTable.open(ctx);
            const writer = new HandleTaskWriter({
                applicationDomain,
                controlledPrefixes,
                ownSourceName: config.handleOwnSourceName,
            });

            const summary = await prepareHandleTasks(table, writer, {
                customer: options.customer,
                owner: options.resourceOwner,
                outputFolder,
                batchSize: DEFAULT_BATCH_SIZE,
            });
            printJson({ outputFolder, ...summary });
        });

    group
        .command('execute')
        .description('Create handles for every prepared task not yet done (dry run unless --apply)')
        .requiredOption('-i, --input-folder <dir>', 'Folder written by handle prepare')
        .option('--apply', 'Actually create the handles', false)
        .action(async (options: { inputFolder: string; apply: boolean }, command: Command) => {
            const session = await BackendSession.forAccount(accountContext(command));
            const executor = new HandleTaskExecutor(new HandleApi(session), await DoneTaskLog.open(options.inputFolder));
            reportResults(await executor.executeFolder(options.inputFolder, options.apply));
        });

    return group;
}
