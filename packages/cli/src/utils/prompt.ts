import { createInterface } from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import { error } from './console.js';

export interface PromptOptions {
    /** --yes: answer every prompt with yes. */
    yes: boolean;
    input?: Readable & { isTTY?: boolean };
    output?: Writable;
}

/**
 * "y" or "yes", any case.
 */
export function isAffirmative(answer: string): boolean {
    return /^y(es)?$/i.test(answer.trim());
}

/**
 * Asks a yes/no question; the default is no.
 * Without a terminal the answer is no unless --yes was given.
 */
export async function promptContinue(message: string, options: PromptOptions): Promise<boolean> {
    if (options.yes) return true;

    const input = options.input ?? process.stdin;
    if (!input.isTTY) {
        error('Non-interactive session. Use --yes to continue past parse errors.');
        return false;
    }

    const rl = createInterface({ input, output: options.output ?? process.stdout });
    try {
        return isAffirmative(await rl.question(`${message} [y/N] `));
    } finally {
        rl.close();
    }
}
