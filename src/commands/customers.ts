import { Command } from 'commander';
import { accountContext } from './shared.js';
import { CustomersService } from '../services/customers-service.js';
import { printJson } from '../utils/output.js';

export function customersCommand(): Command {
    const group = new Command('customers').description('Customer table consistency checks');

    group
        .command('missing-customers')
        .description('Customer references on users that do not exist in the customer table')
        .action(async (_options: unknown, command: Command) => {
            printJson(await new CustomersService(accountContext(command)).searchMissingCustomers());
        });

    group
        .command('duplicate-customers')
        .description('Customers sharing the same organization number')
        .action(async (_options: unknown, command: Command) => {
            printJson(await new CustomersService(accountContext(command)).searchDuplicateCustomers());
        });

    return group;
}
