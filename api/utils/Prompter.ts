import readline from 'readline/promises';
import { Writable } from 'stream';

export interface Prompter {
    input(question: string, defaultValue?: string): Promise<string>;
    password(question: string): Promise<string>;
    confirm(question: string, defaultValue: boolean): Promise<boolean>;
    /** Resolves with the index of the chosen item. */
    select(question: string, items: readonly string[], defaultIndex?: number): Promise<number>;
    close(): void;
}

// Lets password input be read without echoing it back.
class MutableStdout extends Writable {
    muted = false;

    _write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        if (!this.muted) {
            process.stdout.write(chunk, encoding);
        }
        callback();
    }
}

export class ReadlinePrompter implements Prompter {
    private output = new MutableStdout();
    private rl = readline.createInterface({ input: process.stdin, output: this.output, terminal: true });

    async input(question: string, defaultValue?: string): Promise<string> {
        const suffix = defaultValue !== undefined ? ` [${defaultValue}]` : '';
        for (;;) {
            const answer = (await this.rl.question(`${question}${suffix}: `)).trim();
            if (answer !== '') return answer;
            if (defaultValue !== undefined) return defaultValue;
        }
    }

    async password(question: string): Promise<string> {
        this.output.write(`${question}: `);
        this.output.muted = true;
        try {
            return await this.rl.question('');
        } finally {
            this.output.muted = false;
            this.output.write('\n');
        }
    }

    async confirm(question: string, defaultValue: boolean): Promise<boolean> {
        const hint = defaultValue ? 'Y/n' : 'y/N';
        for (;;) {
            const answer = (await this.rl.question(`${question} (${hint}) `)).trim().toLowerCase();
            if (answer === '') return defaultValue;
            if (answer === 'y' || answer === 'yes') return true;
            if (answer === 'n' || answer === 'no') return false;
        }
    }

    async select(question: string, items: readonly string[], defaultIndex = 0): Promise<number> {
        if (items.length === 0) {
            throw new Error(`Nothing to choose from: ${question}`);
        }
        items.forEach((item, i) => this.output.write(`  ${i + 1}) ${item}\n`));
        for (;;) {
            const answer = (await this.rl.question(`${question} [${defaultIndex + 1}]: `)).trim();
            if (answer === '') return defaultIndex;
            const choice = Number.parseInt(answer, 10);
            if (Number.isInteger(choice) && choice >= 1 && choice <= items.length) {
                return choice - 1;
            }
        }
    }

    close(): void {
        this.rl.close();
    }
}
