// Rendering of command results on stdout

function replacer(_key: string, value: unknown): unknown {
    if (value instanceof Set) {
        return [...value];
    }
    if (value instanceof Map) {
        return Object.fromEntries(value);
    }
    if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('base64');
    }
    return value;
}

export function prettify(value: unknown): string {
    return JSON.stringify(value ?? null, replacer, 2);
}

export function printJson(value: unknown): void {
    process.stdout.write(`${prettify(value)}\n`);
}

export function printLine(line = ''): void {
    process.stdout.write(`${line}\n`);
}

/**
 * Plain text table with left-aligned, space-padded columns.
 */
export function formatTable(headers: string[], rows: string[][]): string {
    const widths = headers.map((header, column) =>
        Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
    );
    const line = (cells: string[]) =>
        cells
            .map((cell, column) => cell.padEnd(widths[column]))
            .join('  ')
            .trimEnd();
    return [line(headers), line(widths.map((width) => '-'.repeat(width))), ...rows.map(line)].join('\n');
}
