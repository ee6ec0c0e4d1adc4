import { Command } from 'commander';
import { accountContext } from './shared.js';
import { CristinService } from '../services/cristin-service.js';
import { readJsonObject } from '../utils/input.js';
import { printJson } from '../utils/output.js';

export function cristinCommand(): Command {
    const group = new Command('cristin').description('Person registry maintenance');

    group
        .command('add-user')
        .description('Create a person from a JSON file, or from stdin')
        .argument('[input-file]', 'JSON file with the person')
        .action(async (inputFile: string | undefined, _options: unknown, command: Command) => {
            const person = await readJsonObject(inputFile);
            const service = await CristinService.forAccount(accountContext(command));
            printJson(await service.addPerson(person));
        });

    group
        .command('update-user')
        .description('Patch a person from a JSON file, or from stdin')
        .argument('<id>', 'Person identifier')
        .argument('[input-file]', 'JSON file with the fields to change')
        .action(async (id: string, inputFile: string | undefined, _options: unknown, command: Command) => {
            const person = await readJsonObject(inputFile);
            const service = await CristinService.forAccount(accountContext(command));
            printJson(await service.updatePerson(id, person));
        });

    return group;
}
