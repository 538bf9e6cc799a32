import * as readline from 'readline';

export interface ILinePrompt {
    /**
     * Resolves the typed line, or null once the input stream has ended.
     */
    ask(query: string): Promise<string | null>;
}

export class ConsolePrompt implements ILinePrompt {
    private rl: readline.Interface;
    private closed = false;

    constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.rl = readline.createInterface({ input, output });
        this.rl.once('close', () => {
            this.closed = true;
        });
    }

    public ask(query: string): Promise<string | null> {
        if (this.closed) return Promise.resolve(null);

        return new Promise((resolve) => {
            const onClose = () => resolve(null);
            this.rl.once('close', onClose);
            this.rl.question(query, (answer) => {
                this.rl.off('close', onClose);
                resolve(answer);
            });
        });
    }

    public close(): void {
        if (this.closed) return;
        this.rl.close();
    }
}

const RULE = '='.repeat(50);

export function printBanner(title: string): void {
    console.log('\n' + RULE);
    console.log(title);
    console.log(RULE + '\n');
}

export function printSection(title: string, lines: string[]): void {
    console.log('\n' + RULE);
    console.log(title);
    console.log(RULE);
    lines.forEach(line => console.log(line));
    console.log(RULE + '\n');
}
