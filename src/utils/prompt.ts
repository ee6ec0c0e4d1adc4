import { createInterface } from 'node:readline/promises';

/**
 * Ask a yes/no question on the terminal. Anything but y/yes is a no.
 */
export async function confirm(question: string): Promise<boolean> {
    const rl = createInterface({
        input: process.stdin,
        output: process.stderr,
    });

    try {
        const answer = await rl.question(`${question} [y/N] `);
        return ['y', 'yes'].includes(answer.trim().toLowerCase());
    } finally {
        rl.close();
    }
}
