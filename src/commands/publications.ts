import { Command } from 'commander';
import { accountContext } from './shared.js';
import { BackendSession } from '../services/backend-session.js';
import { PublicationApi } from '../services/publication-api.js';
import { exportPublications } from '../services/publication-export.js';
import { PublicationsTable } from '../services/publications-table.js';
import { printJson } from '../utils/output.js';

export function publicationsCommand(): Command {
    const group = new Command('publications').description('Publication copy and export');

    group
        .command('copy')
        .description('Copy a publication without its files as a new draft')
        .argument('<identifier>', 'Publication identifier')
        .action(async (identifier: string, _options: unknown, command: Command) => {
            const api = new PublicationApi(await BackendSession.forAccount(accountContext(command)));
            printJson(await api.copyPublication(identifier));
        });

    group
        .command('export')
        .description('Export every publication as inflated JSON lines')
        .requiredOption('--folder <dir>', 'Folder for the batch files')
        .action(async (options: { folder: string }, command: Command) => {
            const table = await PublicationsTable.open(accountContext(command));
            const summary = await exportPublications(table, options.folder);
            printJson({ folder: options.folder, files: summary.files.length, resources: summary.resources });
        });

    return group;
}
