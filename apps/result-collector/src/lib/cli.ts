import type { Requester } from '@doc-analytics/messaging-node';
import type { SF } from '@doc-analytics/service-framework-node';
import { parseCliArgs, usage } from './args.js';
import { collectResults } from './collector.js';
import { CliUsageError } from './errors.js';
import { analyzeLocally } from './localAnalysis.js';

export interface CliDependencies {
  diagnosticContext: SF.DiagnosticContext;
  requester: Requester;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const { diagnosticContext, requester, stdout, stderr } = deps;
  const logger = diagnosticContext.logger;

  let command;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr(`${error.message}\n\n${usage}\n`);
      return 2;
    }
    throw error;
  }

  const results =
    command.command === 'collect'
      ? await collectResults(command.aggregators, requester, logger)
      : await analyzeLocally(command.files, command.topics, logger);

  stdout(`${JSON.stringify(results, null, 2)}\n`);
  return 0;
}
