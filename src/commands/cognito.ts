import { Command } from 'commander';
import { accountContext } from './shared.js';
import { CognitoService } from '../services/cognito-service.js';
import { printJson } from '../utils/output.js';

export function cognitoCommand(): Command {
    const group = new Command('cognito').description('Cognito user pool lookups');

    group
        .command('search')
        .description('Search users whose attribute values contain every term')
        .argument('<terms...>', 'Search words')
        .action(async (terms: string[], _options: unknown, command: Command) => {
            const users = await new CognitoService(accountContext(command)).search(terms.join(' '));
            printJson(users);
        });

    return group;
}
