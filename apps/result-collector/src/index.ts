export { collectResults } from './lib/collector.js';
export type { AggregatorTarget } from './lib/collector.js';
export { analyzeLocally } from './lib/localAnalysis.js';
export { parseCliArgs, parseAggregatorTarget } from './lib/args.js';
export type { CliCommand } from './lib/args.js';
export { runCli } from './lib/cli.js';
export { AggregatorQueryError, CliUsageError } from './lib/errors.js';
