/**
 * @fileoverview Console Prompt
 *
 * Line-oriented console I/O used by the menus. Reading happens here
 * and only here; managers receive already-parsed values.
 *
 * @module console/Prompt
 */

import { createInterface, type Interface } from "readline";

/**
 * Line-based prompt.
 */
export interface Prompt {
    /**
     * Show a prompt and read one line.
     *
     * @returns The line without its newline, or null at end of input
     */
    ask(question: string): Promise<string | null>;

    /** Print one line */
    print(line?: string): void;
}

/**
 * Prompt over stdin/stdout.
 *
 * Lines are pulled from the readline async iterator so piped input
 * and interactive input behave the same.
 *
 * @example
 * ```typescript
 * const prompt = new ReadlinePrompt();
 * const name = await prompt.ask("Enter item name: ");
 * prompt.close();
 * ```
 */
export class ReadlinePrompt implements Prompt {
    private readonly rl: Interface;
    private readonly lines: AsyncIterator<string>;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl    = createInterface({ input, terminal: false });
        this.lines = this.rl[Symbol.asyncIterator]();
    }

    async ask(question: string): Promise<string | null> {
        this.output.write(question);
        const next = await this.lines.next();
        if (next.done) {
            return null;
        }
        return next.value;
    }

    print(line = ""): void {
        this.output.write(`${line}\n`);
    }

    close(): void {
        this.rl.close();
    }
}
