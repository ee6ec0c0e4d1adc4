// Cross-checks between the users-and-roles table and the customers table
import { findTableByPrefix, scanAll } from './dynamodb-service.js';
import { findDuplicates, findMissing } from './reconcile.js';
import { getConfig } from '../utils/config.js';
import { stringField } from '../utils/json.js';
import { logger } from '../utils/logger.js';
import type { AwsContext, DuplicateCustomer, JsonObject, MissingCustomer } from '../types/index.js';

const CUSTOMER_REFERENCE = /customer\/(.+)$/;
const FIRST_NUMBER = /\d+/;

/**
 * Customer identifier referenced by a user's `institution` URI.
 */
export function customerIdOf(user: JsonObject): string | undefined {
    return stringField(user, 'institution')?.match(CUSTOMER_REFERENCE)?.[1];
}

/**
 * Organization number of a customer: the first number in its `cristinId`.
 */
export function organizationNumberOf(customer: JsonObject): string | undefined {
    return stringField(customer, 'cristinId')?.match(FIRST_NUMBER)?.[0];
}

export function missingCustomers(users: JsonObject[], customers: JsonObject[]): MissingCustomer[] {
    const existing = new Set(customers.flatMap((customer) => stringField(customer, 'identifier') ?? []));
    return findMissing(users, customerIdOf, existing).map(({ key, items }) => ({
        customerId: key,
        referencedBy: items.map((user) => stringField(user, 'PrimaryKeyHashKey') ?? stringField(user, 'username') ?? '?'),
    }));
}

export function duplicateCustomers(customers: JsonObject[]): DuplicateCustomer[] {
    return findDuplicates(customers, organizationNumberOf).map(({ key, items }) => ({
        organizationNumber: key,
        customers: items.map((customer) => ({
            identifier: stringField(customer, 'identifier') ?? '?',
            cristinId: stringField(customer, 'cristinId') ?? '',
            name: stringField(customer, 'name'),
        })),
    }));
}

export class CustomersService {
    constructor(private readonly ctx: AwsContext) {}

    private async scanTable(prefix: string): Promise<JsonObject[]> {
        const tableName = await findTableByPrefix(this.ctx, prefix);
        const items = await scanAll(this.ctx, { TableName: tableName });
        logger.debug(`Scanned ${items.length} items from ${tableName}`);
        return items;
    }

    async searchMissingCustomers(): Promise<MissingCustomer[]> {
        const { tables } = getConfig();
        const customers = await this.scanTable(tables.customersPrefix);
        const users = await this.scanTable(tables.usersPrefix);
        return missingCustomers(users, customers);
    }

    async searchDuplicateCustomers(): Promise<DuplicateCustomer[]> {
        const customers = await this.scanTable(getConfig().tables.customersPrefix);
        return duplicateCustomers(customers);
    }
}
