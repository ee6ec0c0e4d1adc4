// Lambda version cleanup and reserved concurrency reporting
import {
    DeleteFunctionCommand,
    GetFunctionConcurrencyCommand,
    ListAliasesCommand,
    ListFunctionsCommand,
    ListVersionsByFunctionCommand,
    type AliasConfiguration,
    type FunctionConfiguration,
} from '@aws-sdk/client-lambda';
import { z } from 'zod';
import { getLambdaClient } from './aws-clients.js';
import { collectPages } from './pagination.js';
import { callRemote, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { AwsContext, FunctionConcurrency, FunctionVersionRef, ItemActionResult } from '../types/index.js';

export const functionVersionSchema = z.object({
    functionName: z.string().min(1),
    functionArn: z.string().min(1),
    version: z.string().min(1),
});

/**
 * Versions that may be removed: neither the function's current version
 * nor referenced by any alias.
 */
export function selectRemovableVersions(
    versions: readonly string[],
    currentVersion: string,
    aliasVersions: readonly string[]
): string[] {
    const keep = new Set([currentVersion, ...aliasVersions]);
    return versions.filter((version) => !keep.has(version));
}

export class LambdaService {
    private readonly log;

    constructor(private readonly ctx: AwsContext) {
        this.log = logger.child({ service: 'lambda', profile: ctx.profile });
    }

    private get client() {
        return getLambdaClient(this.ctx);
    }

    async listFunctions(): Promise<FunctionConfiguration[]> {
        return collectPages({
            service: 'lambda',
            operation: 'ListFunctions',
            fetchPage: async (marker: string | undefined) => {
                const response = await this.client.send(new ListFunctionsCommand({ Marker: marker }));
                return { items: response.Functions, nextToken: response.NextMarker };
            },
        });
    }

    async listVersions(functionArn: string): Promise<FunctionConfiguration[]> {
        return collectPages({
            service: 'lambda',
            operation: 'ListVersionsByFunction',
            fetchPage: async (marker: string | undefined) => {
                const response = await this.client.send(
                    new ListVersionsByFunctionCommand({ FunctionName: functionArn, Marker: marker })
                );
                return { items: response.Versions, nextToken: response.NextMarker };
            },
        });
    }

    async listAliases(functionArn: string): Promise<AliasConfiguration[]> {
        return collectPages({
            service: 'lambda',
            operation: 'ListAliases',
            fetchPage: async (marker: string | undefined) => {
                const response = await this.client.send(
                    new ListAliasesCommand({ FunctionName: functionArn, Marker: marker })
                );
                return { items: response.Aliases, nextToken: response.NextMarker };
            },
        });
    }

    /**
     * Every version of every function that is neither current nor aliased.
     */
    async listOldFunctionVersions(): Promise<FunctionVersionRef[]> {
        const functions = await this.listFunctions();
        this.log.debug(`Found ${functions.length} functions`);

        const removable: FunctionVersionRef[] = [];
        for (const fn of functions) {
            if (!fn.FunctionArn || !fn.FunctionName) {
                continue;
            }
            const aliases = await this.listAliases(fn.FunctionArn);
            const versions = await this.listVersions(fn.FunctionArn);

            const aliasVersions = aliases.flatMap((alias) => (alias.FunctionVersion ? [alias.FunctionVersion] : []));
            const removableVersions = new Set(
                selectRemovableVersions(
                    versions.flatMap((v) => (v.Version ? [v.Version] : [])),
                    fn.Version ?? '$LATEST',
                    aliasVersions
                )
            );

            for (const version of versions) {
                if (version.Version && version.FunctionArn && removableVersions.has(version.Version)) {
                    removable.push({
                        functionName: fn.FunctionName,
                        functionArn: version.FunctionArn,
                        version: version.Version,
                    });
                }
            }
            this.log.debug(`${fn.FunctionName}: ${removableVersions.size} of ${versions.length} versions removable`, {
                aliasVersions,
            });
        }

        return removable;
    }

    /**
     * Delete the given versions when `apply` is set, otherwise only report them.
     * Each deletion is attempted independently.
     */
    async deleteVersions(versions: FunctionVersionRef[], apply: boolean): Promise<ItemActionResult[]> {
        const results: ItemActionResult[] = [];

        for (const version of versions) {
            if (!apply) {
                results.push({ id: version.functionArn, action: 'delete', status: 'dry-run' });
                continue;
            }
            try {
                await callRemote('lambda', 'DeleteFunction', () =>
                    this.client.send(new DeleteFunctionCommand({ FunctionName: version.functionArn }))
                );
                this.log.info(`Deleted ${version.functionArn}`);
                results.push({ id: version.functionArn, action: 'delete', status: 'success' });
            } catch (error) {
                this.log.error(`Failed to delete ${version.functionArn}`, error);
                results.push({
                    id: version.functionArn,
                    action: 'delete',
                    status: 'failed',
                    error: errorMessage(error),
                });
            }
        }

        return results;
    }

    /**
     * Reserved concurrency per function; null when none is reserved.
     */
    async getConcurrency(): Promise<FunctionConcurrency[]> {
        const functions = await this.listFunctions();
        const entries: FunctionConcurrency[] = [];

        for (const fn of functions) {
            if (!fn.FunctionName) {
                continue;
            }
            const name = fn.FunctionName;
            const response = await callRemote('lambda', 'GetFunctionConcurrency', () =>
                this.client.send(new GetFunctionConcurrencyCommand({ FunctionName: name }))
            );
            entries.push({
                FunctionName: name,
                ReservedConcurrency: response.ReservedConcurrentExecutions ?? null,
            });
        }

        return entries;
    }
}
