import { parseArgs } from 'node:util';
import { workerSchema } from '@doc-analytics/interface';
import type { AggregatorTarget } from './collector.js';
import { CliUsageError } from './errors.js';

export type CliCommand =
  | { command: 'collect'; aggregators: AggregatorTarget[] }
  | { command: 'local'; files: string[]; topics?: string[] };

export const usage = [
  'Usage:',
  '  result-collector collect --aggregator <topic>=<endpoint> [--aggregator ...]',
  '  result-collector local <file...> [--topic <topic> ...]',
].join('\n');

export function parseAggregatorTarget(value: string): AggregatorTarget {
  const separator = value.indexOf('=');
  const topic = separator > 0 ? value.slice(0, separator) : '';
  const endpoint = separator > 0 ? value.slice(separator + 1) : '';

  if (!topic || !workerSchema.shape.endpoint.safeParse(endpoint).success) {
    throw new CliUsageError(`Invalid aggregator "${value}", expected <topic>=<endpoint>`);
  }

  return { topic, endpoint };
}

export function parseCliArgs(argv: string[]): CliCommand {
  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        aggregator: { type: 'string', short: 'a', multiple: true },
        topic: { type: 'string', short: 't', multiple: true },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  const [command, ...rest] = parsed.positionals;
  const { aggregator, topic } = parsed.values;

  switch (command) {
    case 'collect': {
      if (rest.length > 0 || topic) {
        throw new CliUsageError('collect takes only --aggregator options');
      }
      if (!aggregator || aggregator.length === 0) {
        throw new CliUsageError('collect needs at least one --aggregator');
      }
      return { command, aggregators: aggregator.map(parseAggregatorTarget) };
    }
    case 'local': {
      if (aggregator) {
        throw new CliUsageError('local does not take --aggregator');
      }
      if (rest.length === 0) {
        throw new CliUsageError('local needs at least one document');
      }
      return { command, files: rest, topics: topic };
    }
    default:
      throw new CliUsageError(command ? `Unknown command "${command}"` : 'Missing command');
  }
}
