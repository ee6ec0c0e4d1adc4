import { Command } from 'commander';
import { accountContexts } from './shared.js';
import { describeAccount } from '../services/account-service.js';
import { PipelinesService } from '../services/pipelines-service.js';
import { logger } from '../utils/logger.js';
import { formatTable, printLine } from '../utils/output.js';
import { formatDate } from '../utils/time-utils.js';
import type { PipelineDetails } from '../types/index.js';

export function pipelineRows(pipelines: PipelineDetails[]): string[][] {
    return pipelines.map((pipeline) => [
        pipeline.repository,
        pipeline.branch,
        pipeline.build.status,
        formatDate(pipeline.build.lastChange),
        pipeline.deploy.status,
        formatDate(pipeline.deploy.lastChange),
        pipeline.summary,
    ]);
}

export function pipelinesCommand(): Command {
    const group = new Command('pipelines').description('CodePipeline overview');

    group
        .command('branches')
        .description('Repository, branch, build and deploy status of every pipeline, per account')
        .action(async (_options: unknown, command: Command) => {
            for (const ctx of accountContexts(command)) {
                const alias = await describeAccount(ctx);
                logger.info(`Fetching pipeline details for ${alias}`, { profile: ctx.profile });
                const pipelines = await new PipelinesService(ctx).getPipelineDetails();

                printLine(`Account: ${alias} (${pipelines.length} pipelines)`);
                printLine(
                    formatTable(
                        ['Repository', 'Branch', 'Build status', 'Built at', 'Deploy status', 'Deployed at', 'Summary'],
                        pipelineRows(pipelines)
                    )
                );
                printLine();
            }
        });

    return group;
}
