export { ReplConfig, createProgram, loadConfig, parseDepth } from './src/config';
export { BANNER, LineOutcome, ReplIO, handleLine, runRepl } from './src/repl';
