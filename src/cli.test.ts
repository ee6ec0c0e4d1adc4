import { describe, it, expect } from 'vitest';
import { createProgram } from './cli.js';

describe('createProgram', () => {
    const program = createProgram();

    it('registers every command group', () => {
        expect(program.commands.map((command) => command.name())).toEqual([
            'awslambda',
            'cognito',
            'cristin',
            'customers',
            'dlq',
            'handle',
            'organization-migration',
            'pipelines',
            'publications',
            'sqs',
            'users',
        ]);
    });

    it('exposes only long global flags', () => {
        expect(program.options.map((option) => option.flags)).toEqual([
            '--profile <profiles>',
            '--region <region>',
            '--verbose',
            '--quiet',
        ]);
    });

    it('wires the lambda subcommands', () => {
        const lambda = program.commands.find((command) => command.name() === 'awslambda');

        expect(lambda?.commands.map((command) => command.name())).toEqual([
            'list-old-versions',
            'delete-old-versions',
            'concurrency',
            'concurrency-report',
        ]);
    });

    it('requires a queue for dlq read', () => {
        const read = program.commands.find((command) => command.name() === 'dlq')?.commands.find((c) => c.name() === 'read');

        expect(read?.options.find((option) => option.long === '--queue')?.mandatory).toBe(true);
    });
});
