/**
 * Line prompter over readline; resolves null once input ends (Ctrl+D, closed pipe)
 */

import { createInterface, Interface } from 'readline';
import type { Readable, Writable } from 'stream';

export class Prompter {
    private rl: Interface;
    private lines: AsyncIterator<string>;
    private output: Writable;

    constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
        this.output = output;
        this.rl = createInterface({ input, terminal: false });
        this.lines = this.rl[Symbol.asyncIterator]();
    }

    async ask(question: string): Promise<string | null> {
        this.output.write(question);
        const next = await this.lines.next();
        return next.done ? null : next.value.trim();
    }

    print(text = ''): void {
        this.output.write(`${text}\n`);
    }

    close(): void {
        this.rl.close();
    }
}
