import { createInterface } from 'node:readline';
import { createColors, isColorSupported } from 'colorette';
import { printExpr, safeEvaluate, safeParse } from '../../calculator';
import { ReplConfig } from './config';

export interface ReplIO {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    errorOutput: NodeJS.WritableStream;
}

export const BANNER = [
    'Infix calculator REPL',
    "Enter an expression (e.g., 2 + 3 * (4 - 1)) or 'quit' to exit.",
];

export type LineOutcome =
    | { kind: 'quit' }
    | { kind: 'skip' }
    | { kind: 'result'; value: number; tree?: string }
    | { kind: 'error'; message: string };

export function handleLine(line: string, config: Pick<ReplConfig, 'maxDepth' | 'showTree'>): LineOutcome {
    const trimmed = line.trim();
    if (trimmed === 'quit') return { kind: 'quit' };
    if (trimmed === '') return { kind: 'skip' };

    const parsed = safeParse(line, { maxDepth: config.maxDepth });
    if (!parsed.ok) {
        return { kind: 'error', message: parsed.error.message };
    }
    const evaluated = safeEvaluate(parsed.value);
    if (!evaluated.ok) {
        return { kind: 'error', message: evaluated.error.message };
    }
    return {
        kind: 'result',
        value: evaluated.value,
        tree: config.showTree ? printExpr(parsed.value) : undefined,
    };
}

/**
 * Reads expressions line by line until input ends or a line reads `quit`.
 * A failing line is reported on `errorOutput` and the loop goes on.
 */
export async function runRepl(io: ReplIO, config: ReplConfig): Promise<void> {
    const c = createColors({ useColor: config.color ?? isColorSupported });
    const print = (stream: NodeJS.WritableStream, text: string) => stream.write(text + '\n');

    for (const line of BANNER) {
        print(io.output, c.bold(line));
    }

    const prompt = () => io.output.write(config.prompt);
    const rl = createInterface({ input: io.input, terminal: false });
    prompt();

    for await (const line of rl) {
        const outcome = handleLine(line, config);
        switch (outcome.kind) {
            case 'quit':
                return;
            case 'skip':
                break;
            case 'result':
                if (outcome.tree !== undefined) {
                    print(io.output, `${c.dim('Tree:')} ${outcome.tree}`);
                }
                print(io.output, `${c.green('Result:')} ${outcome.value}`);
                break;
            case 'error':
                print(io.errorOutput, `${c.red('Error:')} ${outcome.message}`);
                break;
        }
        prompt();
    }
}
