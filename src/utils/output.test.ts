import { describe, it, expect } from 'vitest';
import { formatTable, prettify } from './output.js';

describe('formatTable', () => {
    it('pads columns to the widest cell', () => {
        expect(
            formatTable(
                ['Repository', 'Branch'],
                [
                    ['org/api', 'main'],
                    ['org/long-repository', 'develop'],
                ]
            )
        ).toBe(
            [
                'Repository           Branch',
                '-------------------  -------',
                'org/api              main',
                'org/long-repository  develop',
            ].join('\n')
        );
    });
});

describe('prettify', () => {
    it('renders sets, maps and bytes', () => {
        const value = { ids: new Set(['a']), counts: new Map([['x', 1]]), data: new Uint8Array([104, 105]) };

        expect(JSON.parse(prettify(value))).toEqual({ ids: ['a'], counts: { x: 1 }, data: 'aGk=' });
        expect(prettify(undefined)).toBe('null');
    });
});
