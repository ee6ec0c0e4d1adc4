import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { findDuplicates, findMissing, matchAllWords, setDifference } from './reconcile.js';

describe('setDifference', () => {
    it('keeps first-seen order and drops duplicates', () => {
        expect(setDifference(['c', 'a', 'c', 'b', 'a'], ['b'])).toEqual(['c', 'a']);
    });

    it('equals the mathematical set difference', () => {
        fc.assert(
            fc.property(fc.array(fc.string()), fc.array(fc.string()), (primary, secondary) => {
                const result = setDifference(primary, secondary);
                const expected = new Set(primary.filter((value) => !secondary.includes(value)));

                expect(new Set(result)).toEqual(expected);
                expect(result).toHaveLength(expected.size);
            })
        );
    });
});

describe('findMissing', () => {
    it('groups items per missing key and ignores items without a key', () => {
        const users = [
            { name: 'u1', customer: 'c1' },
            { name: 'u2', customer: 'gone' },
            { name: 'u3' },
            { name: 'u4', customer: 'gone' },
        ];

        const missing = findMissing(users, (user) => user.customer, new Set(['c1']));

        expect(missing).toEqual([{ key: 'gone', items: [users[1], users[3]] }]);
    });
});

describe('findDuplicates', () => {
    it('returns every group of two or more, keyed by the shared key', () => {
        const items = [
            { id: 'a', org: '194' },
            { id: 'b', org: '185' },
            { id: 'c', org: '194' },
            { id: 'd', org: undefined },
            { id: 'e', org: undefined },
        ];

        expect(findDuplicates(items, (item) => item.org)).toEqual([{ key: '194', items: [items[0], items[2]] }]);
    });

    it('covers exactly the keys that occur at least twice', () => {
        fc.assert(
            fc.property(fc.array(fc.constantFrom('a', 'b', 'c', 'd')), (keys) => {
                const groups = findDuplicates(keys, (key) => key);
                const expected = [...new Set(keys)].filter((key) => keys.filter((k) => k === key).length >= 2);

                expect(groups.map((group) => group.key)).toEqual(expected);
                for (const group of groups) {
                    expect(group.items.length).toBe(keys.filter((k) => k === group.key).length);
                }
            })
        );
    });
});

describe('matchAllWords', () => {
    it('requires every word to be present somewhere in the text', () => {
        const people = ['Ola Nordmann ola@example.org', 'Kari Nordmann kari@example.org'];

        expect(matchAllWords(people, 'Nordmann  ola', (p) => p)).toEqual([people[0]]);
        expect(matchAllWords(people, 'Nordmann', (p) => p)).toEqual(people);
    });
});
