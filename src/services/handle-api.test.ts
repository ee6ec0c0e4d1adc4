import { describe, it, expect } from 'vitest';
import { splitHandle } from './handle-api.js';
import { ValidationError } from '../utils/errors.js';

describe('splitHandle', () => {
    it('takes the last two path segments', () => {
        expect(splitHandle('https://hdl.handle.net/11250.1/39053933')).toEqual({ prefix: '11250.1', suffix: '39053933' });
        expect(splitHandle('https://hdl.handle.net/11250.1/39053933/')).toEqual({ prefix: '11250.1', suffix: '39053933' });
    });

    it('rejects a handle with a single segment', () => {
        expect(() => splitHandle('39053933')).toThrow(ValidationError);
    });
});
