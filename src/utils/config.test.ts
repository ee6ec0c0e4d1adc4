import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        const config = loadConfig({});

        expect(config.maxAttempts).toBe(3);
        expect(config.logLevel).toBe('info');
        expect(config.region).toBeUndefined();
        expect(config.tables.customersPrefix).toBe('nva-customers');
        expect(config.parameters.apiDomain).toBe('/NVA/ApiDomain');
        expect(config.applicationDomain).toBeUndefined();
    });

    it('falls back to AWS_DEFAULT_REGION', () => {
        expect(loadConfig({ AWS_DEFAULT_REGION: 'eu-north-1' }).region).toBe('eu-north-1');
        expect(loadConfig({ AWS_REGION: 'eu-west-1', AWS_DEFAULT_REGION: 'eu-north-1' }).region).toBe('eu-west-1');
    });

    it('coerces numeric settings', () => {
        expect(loadConfig({ AWS_MAX_ATTEMPTS: '8' }).maxAttempts).toBe(8);
    });

    it('rejects invalid values with a ValidationError naming the variable', () => {
        expect(() => loadConfig({ AWS_MAX_ATTEMPTS: 'many' })).toThrow(ValidationError);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
