import { describe, it, expect } from 'vitest';
import { Logger, resolveLogLevel } from './logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'info') {
    const lines: string[] = [];
    const log = new Logger({ level, format: 'json', write: (line) => lines.push(line) });
    const entries = (): Array<Record<string, unknown>> => lines.map((line) => JSON.parse(line));
    return { log, entries };
}

describe('Logger', () => {
    it('drops messages below the configured level', () => {
        const { log, entries } = capture('warn');

        log.info('hidden');
        log.warn('shown');

        expect(entries().map((e) => e.message)).toEqual(['shown']);
        expect(entries()[0].level).toBe('WARN');
    });

    it('merges context, child context and per-call fields', () => {
        const { log, entries } = capture();
        log.setContext({ command: 'drain' });

        log.child({ service: 'sqs' }).info('draining', { queue: 'events' });

        expect(entries()[0]).toMatchObject({ command: 'drain', service: 'sqs', queue: 'events', message: 'draining' });
    });

    it('records error name and message', () => {
        const { log, entries } = capture();

        log.error('failed', new TypeError('bad input'));

        expect(entries()[0]).toMatchObject({ errorName: 'TypeError', errorMessage: 'bad input' });
        expect(entries()[0].stack).toBeUndefined();
    });

    it('writes a single readable line in pretty format', () => {
        const lines: string[] = [];
        const log = new Logger({ format: 'pretty', write: (line) => lines.push(line) });

        log.info('hello');

        expect(lines[0]).toMatch(/^\d{2}:\d{2}:\d{2} INFO  hello$/);
    });
});

describe('resolveLogLevel', () => {
    it('prefers verbose, then quiet, then the fallback', () => {
        expect(resolveLogLevel({ verbose: true, quiet: true }, 'warn')).toBe('debug');
        expect(resolveLogLevel({ quiet: true }, 'warn')).toBe('error');
        expect(resolveLogLevel({}, 'warn')).toBe('warn');
    });
});
