// Helpers shared by the command groups
import { InvalidArgumentError, type Command } from 'commander';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { printJson } from '../utils/output.js';
import type { AwsContext, GlobalOptions, ItemActionResult, ItemActionStatus } from '../types/index.js';

/**
 * One context per comma-separated profile. Without a profile the SDK's
 * default credential chain is used.
 */
export function accountContexts(command: Command): AwsContext[] {
    const { profile, region } = command.optsWithGlobals<GlobalOptions>();
    const profiles = (profile ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
    if (profiles.length === 0) {
        return [{ region }];
    }
    return profiles.map((name) => ({ profile: name, region }));
}

/**
 * Context for commands that act on exactly one account.
 */
export function accountContext(command: Command): AwsContext {
    const contexts = accountContexts(command);
    if (contexts.length > 1) {
        throw new ValidationError(`${command.name()} works on one profile at a time, got ${contexts.length}`);
    }
    return contexts[0];
}

export function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

export function splitList(value: string): string[] {
    return value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

export function countByStatus(results: ItemActionResult[]): Record<ItemActionStatus, number> {
    const counts: Record<ItemActionStatus, number> = { success: 0, failed: 0, skipped: 0, 'dry-run': 0 };
    for (const result of results) {
        counts[result.status] += 1;
    }
    return counts;
}

/**
 * Print every per-item result and flag the run as failed when any item failed.
 */
export function reportResults(results: ItemActionResult[]): void {
    printJson(results);
    const counts = countByStatus(results);
    logger.info(
        `Done: ${counts.success} succeeded, ${counts.failed} failed, ${counts.skipped} skipped, ${counts['dry-run']} dry-run`
    );
    if (counts['dry-run'] > 0) {
        logger.warn('Dry run, nothing was changed. Pass the apply flag to make changes.');
    }
    if (counts.failed > 0) {
        process.exitCode = 1;
    }
}
