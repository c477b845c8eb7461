#!/usr/bin/env node
import { loadConfig } from './config';
import { runRepl } from './repl';

async function main(): Promise<void> {
    const config = loadConfig(process.argv.slice(2), process.env);
    await runRepl({ input: process.stdin, output: process.stdout, errorOutput: process.stderr }, config);
}

main().catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
});
