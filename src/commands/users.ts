import { Command } from 'commander';
import { accountContext } from './shared.js';
import { UsersService } from '../services/users-service.js';
import { printJson } from '../utils/output.js';

export function usersCommand(): Command {
    const group = new Command('users').description('Users-and-roles maintenance');

    group
        .command('search')
        .description('Search users-and-roles items containing every term')
        .argument('<terms...>', 'Search words')
        .action(async (terms: string[], _options: unknown, command: Command) => {
            printJson(await new UsersService(accountContext(command)).search(terms.join(' ')));
        });

    group
        .command('approve-terms')
        .description('Record acceptance of the current terms and conditions for a person')
        .argument('<personId>', 'Person identifier')
        .action(async (personId: string, _options: unknown, command: Command) => {
            printJson(await new UsersService(accountContext(command)).approveTerms(personId));
        });

    return group;
}
