#!/usr/bin/env node
import { createZmqRequester } from '@doc-analytics/messaging-node';
import { SF } from '@doc-analytics/service-framework-node';
import { resultCollectorEnvSchema } from './environment.js';
import { runCli } from './lib/cli.js';

async function main(): Promise<void> {
  const envContext = SF.createEnvContext(resultCollectorEnvSchema);
  const diagnosticContext = SF.createDiagnosticContextFromEnv(envContext);

  const requester = createZmqRequester({
    diagnosticContext,
    timeoutMs: envContext.config.REQUEST_TIMEOUT_MS,
  });

  process.exitCode = await runCli(process.argv.slice(2), {
    diagnosticContext,
    requester,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
