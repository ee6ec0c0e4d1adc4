import { writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { Command } from 'commander';
import { accountContext, accountContexts, reportResults } from './shared.js';
import { describeAccount } from '../services/account-service.js';
import { concurrencyFileName, writeConcurrencyReport } from '../services/concurrency-report.js';
import { LambdaService, functionVersionSchema } from '../services/lambda-service.js';
import { createReport, readReport, writeReport } from '../services/report.js';
import { logger } from '../utils/logger.js';
import { printJson } from '../utils/output.js';
import type { AwsContext, FunctionVersionRef, ItemActionResult } from '../types/index.js';

// With several accounts each report file is prefixed with the account alias
function reportPath(filename: string, alias: string, multipleAccounts: boolean): string {
    return multipleAccounts ? join(dirname(filename), `${alias}-${basename(filename)}`) : filename;
}

async function listForAccount(ctx: AwsContext): Promise<{ alias: string; versions: FunctionVersionRef[] }> {
    const alias = await describeAccount(ctx);
    logger.info(`Listing old function versions in ${alias}`, { profile: ctx.profile });
    const versions = await new LambdaService(ctx).listOldFunctionVersions();
    logger.info(`${alias}: ${versions.length} removable versions`);
    return { alias, versions };
}

export function awslambdaCommand(): Command {
    const group = new Command('awslambda').description('Lambda version cleanup and concurrency reports');

    group
        .command('list-old-versions')
        .description('List function versions that are neither current nor aliased')
        .option('--filename <file>', 'Write the list as a report file')
        .action(async (options: { filename?: string }, command: Command) => {
            const contexts = accountContexts(command);
            for (const ctx of contexts) {
                const { alias, versions } = await listForAccount(ctx);
                if (options.filename) {
                    const path = reportPath(options.filename, alias, contexts.length > 1);
                    await writeReport(path, createReport(alias, versions));
                } else {
                    printJson({ account: alias, versions });
                }
            }
        });

    group
        .command('delete-old-versions')
        .description('Delete function versions that are neither current nor aliased (dry run unless --delete)')
        .option('--delete', 'Actually delete the versions', false)
        .option('--filename <file>', 'Act on a report written by list-old-versions instead of listing again')
        .action(async (options: { delete: boolean; filename?: string }, command: Command) => {
            const results: ItemActionResult[] = [];
            if (options.filename) {
                const ctx = accountContext(command);
                const report = await readReport(options.filename, functionVersionSchema);
                logger.info(`Loaded ${report.count} versions from report for ${report.identifier}`);
                results.push(...(await new LambdaService(ctx).deleteVersions(report.items, options.delete)));
            } else {
                for (const ctx of accountContexts(command)) {
                    const { versions } = await listForAccount(ctx);
                    results.push(...(await new LambdaService(ctx).deleteVersions(versions, options.delete)));
                }
            }
            reportResults(results);
        });

    group
        .command('concurrency')
        .description('Write reserved concurrency per function to <alias>_lambda_concurrency.json')
        .option('--output-folder <dir>', 'Folder for the concurrency files', '.')
        .action(async (options: { outputFolder: string }, command: Command) => {
            for (const ctx of accountContexts(command)) {
                const alias = await describeAccount(ctx);
                const entries = await new LambdaService(ctx).getConcurrency();
                const path = join(options.outputFolder, concurrencyFileName(alias));
                await writeFile(path, `${JSON.stringify(entries, null, 2)}\n`, 'utf8');
                logger.info(`Wrote concurrency for ${entries.length} functions`, { path });
            }
        });

    group
        .command('concurrency-report')
        .description('Combine concurrency files into one spreadsheet')
        .option('--input-folder <dir>', 'Folder with *_lambda_concurrency.json files', '.')
        .option('--filename <file>', 'Spreadsheet to write', 'combined_data.xlsx')
        .action(async (options: { inputFolder: string; filename: string }) => {
            await writeConcurrencyReport(options.inputFolder, options.filename);
        });

    return group;
}
