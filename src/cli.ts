import { Command, Option } from 'commander';
import { awslambdaCommand } from './commands/awslambda.js';
import { cognitoCommand } from './commands/cognito.js';
import { cristinCommand } from './commands/cristin.js';
import { customersCommand } from './commands/customers.js';
import { dlqCommand } from './commands/dlq.js';
import { handleCommand } from './commands/handle.js';
import { organizationMigrationCommand } from './commands/organization-migration.js';
import { pipelinesCommand } from './commands/pipelines.js';
import { publicationsCommand } from './commands/publications.js';
import { sqsCommand } from './commands/sqs.js';
import { usersCommand } from './commands/users.js';
import { getConfig } from './utils/config.js';
import { logger, resolveLogLevel } from './utils/logger.js';
import type { GlobalOptions } from './types/index.js';

export function createProgram(): Command {
    const program = new Command('aws-admin')
        .description('Administrative utilities for AWS accounts')
        .addOption(
            new Option('--profile <profiles>', 'AWS profile; commands that run per account take a comma-separated list').env(
                'AWS_PROFILE'
            )
        )
        .option('--region <region>', 'AWS region')
        .option('--verbose', 'Debug logging', false)
        .option('--quiet', 'Only log errors', false)
        .showHelpAfterError();

    program.hook('preAction', (_thisCommand, actionCommand) => {
        const config = getConfig();
        const options = actionCommand.optsWithGlobals<GlobalOptions>();
        logger.configure({
            level: resolveLogLevel(options, config.logLevel),
            format: config.logFormat,
            file: config.logFile,
        });
        logger.setContext({ command: actionCommand.name(), profile: options.profile });
    });

    program
        .addCommand(awslambdaCommand())
        .addCommand(cognitoCommand())
        .addCommand(cristinCommand())
        .addCommand(customersCommand())
        .addCommand(dlqCommand())
        .addCommand(handleCommand())
        .addCommand(organizationMigrationCommand())
        .addCommand(pipelinesCommand())
        .addCommand(publicationsCommand())
        .addCommand(sqsCommand())
        .addCommand(usersCommand());

    return program;
}
