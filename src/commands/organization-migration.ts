import { Command } from 'commander';
import { accountContext, reportResults } from './shared.js';
import {
    affectedPublicationSchema,
    listAffectedPublications,
    updateAffectedPublications,
} from '../services/organization-migration.js';
import { PublicationsTable } from '../services/publications-table.js';
import { readReport, writeReport } from '../services/report.js';
import { SearchApi } from '../services/search-api.js';
import { logger } from '../utils/logger.js';
import { printJson } from '../utils/output.js';

export function organizationMigrationCommand(): Command {
    const group = new Command('organization-migration').description(
        'Move publications from one organization identifier to another'
    );

    group
        .command('list-publications')
        .description('Report publications with the organization as contributor or owner affiliation')
        .argument('<organization>', 'Organization identifier, e.g. 194.63.10.0')
        .option('--filename <file>', 'Report file to write; prints the report when empty', 'report.json')
        .action(async (organization: string, options: { filename: string }, command: Command) => {
            const search = await SearchApi.forAccount(accountContext(command));
            const report = await listAffectedPublications(search, organization);
            if (options.filename) {
                await writeReport(options.filename, report);
            } else {
                printJson(report);
            }
        });

    group
        .command('update-publications')
        .description('Rewrite affiliations for every publication in a report (dry run unless --apply)')
        .argument('<old>', 'Organization identifier to replace')
        .argument('<new>', 'Replacement organization identifier')
        .option('--filename <file>', 'Report written by list-publications', 'report.json')
        .option('--apply', 'Actually write the changes', false)
        .action(
            async (oldId: string, newId: string, options: { filename: string; apply: boolean }, command: Command) => {
                const report = await readReport(options.filename, affectedPublicationSchema);
                if (report.identifier !== oldId) {
                    logger.warn(`Report was made for ${report.identifier}, not ${oldId}`);
                }
                const table = await PublicationsTable.open(accountContext(command));
                reportResults(await updateAffectedPublications(table, report.items, oldId, newId, options.apply));
            }
        );

    return group;
}
