import { Command, InvalidArgumentError } from 'commander';

export interface ReplConfig {
    prompt: string;
    maxDepth?: number;
    showTree: boolean;
    color?: boolean;
}

type ProgramOptions = {
    prompt: string;
    maxDepth?: number;
    tree: boolean;
    color: boolean;
};

export function parseDepth(raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(value) || value < 0) {
        throw new InvalidArgumentError(`must be a non-negative integer, got '${raw}'`);
    }
    return value;
}

export function createProgram(env: Record<string, string | undefined> = {}): Command {
    return new Command()
        .name('infix-calc')
        .description('Evaluate infix arithmetic expressions line by line')
        .option('-p, --prompt <text>', 'prompt written before each line', env.CALC_PROMPT ?? '> ')
        .option('-d, --max-depth <n>', 'deepest parenthesis nesting accepted (env CALC_MAX_DEPTH)', (raw: string) => parseDepth(raw))
        .option('-t, --tree', 'print the parsed tree before each result', false)
        .option('--no-color', 'disable colored output');
}

/**
 * Reads REPL settings from command-line flags, falling back to
 * CALC_PROMPT and CALC_MAX_DEPTH in the environment. `configure` runs
 * before parsing, e.g. to install `exitOverride`.
 */
export function loadConfig(
    argv: string[],
    env: Record<string, string | undefined> = {},
    configure?: (program: Command) => void,
): ReplConfig {
    const program = createProgram(env);
    configure?.(program);
    program.parse(argv, { from: 'user' });
    const options = program.opts<ProgramOptions>();

    let maxDepth = options.maxDepth;
    if (maxDepth === undefined && env.CALC_MAX_DEPTH !== undefined && env.CALC_MAX_DEPTH !== '') {
        try {
            maxDepth = parseDepth(env.CALC_MAX_DEPTH);
        } catch (e) {
            if (e instanceof InvalidArgumentError) {
                program.error(`error: CALC_MAX_DEPTH ${e.message}`, { code: 'commander.invalidArgument', exitCode: 2 });
            }
            throw e;
        }
    }

    return {
        prompt: options.prompt,
        maxDepth,
        showTree: options.tree,
        color: options.color ? undefined : false,
    };
}
