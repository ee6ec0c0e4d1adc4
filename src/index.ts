#!/usr/bin/env node
import { createProgram } from './cli.js';
import { errorMessage, exitCodeFor } from './utils/errors.js';
import { logger } from './utils/logger.js';

try {
    await createProgram().parseAsync(process.argv);
} catch (error) {
    logger.error(errorMessage(error), error);
    process.exitCode = exitCodeFor(error);
}
