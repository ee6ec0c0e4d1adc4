// Set difference and duplicate grouping over keyed collections
// Output order always follows first-seen order in the primary collection

import type { KeyedGroup } from '../types/index.js';

export type KeyOf<T> = (item: T) => string | undefined;

/**
 * Values of `primary` that are absent from `secondary`, without duplicates.
 */
export function setDifference(primary: Iterable<string>, secondary: Iterable<string>): string[] {
    const exclude = new Set(secondary);
    const seen = new Set<string>();
    const result: string[] = [];
    for (const value of primary) {
        if (!exclude.has(value) && !seen.has(value)) {
            seen.add(value);
            result.push(value);
        }
    }
    return result;
}

function groupByKey<T>(items: Iterable<T>, keyOf: KeyOf<T>): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        if (key === undefined) {
            continue;
        }
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

/**
 * Items whose key is not in `existing`, one group per missing key.
 * Items without a key are ignored.
 */
export function findMissing<T>(
    items: Iterable<T>,
    keyOf: KeyOf<T>,
    existing: ReadonlySet<string>
): KeyedGroup<T>[] {
    const result: KeyedGroup<T>[] = [];
    for (const [key, group] of groupByKey(items, keyOf)) {
        if (!existing.has(key)) {
            result.push({ key, items: group });
        }
    }
    return result;
}

/**
 * Every group of two or more items sharing a key.
 */
export function findDuplicates<T>(items: Iterable<T>, keyOf: KeyOf<T>): KeyedGroup<T>[] {
    const result: KeyedGroup<T>[] = [];
    for (const [key, group] of groupByKey(items, keyOf)) {
        if (group.length >= 2) {
            result.push({ key, items: group });
        }
    }
    return result;
}

/**
 * Filter items whose combined text contains every whitespace-separated search word.
 */
export function matchAllWords<T>(items: Iterable<T>, searchTerm: string, textOf: (item: T) => string): T[] {
    const words = searchTerm.split(/\s+/).filter((word) => word.length > 0);
    const matches: T[] = [];
    for (const item of items) {
        const text = textOf(item);
        if (words.every((word) => text.includes(word))) {
            matches.push(item);
        }
    }
    return matches;
}
