import { describe, expect, it, vi } from 'vitest';
import { createInMemoryRequester } from '@doc-analytics/messaging-node/test';
import { createMockDiagnosticsContext } from '@doc-analytics/service-framework-node/test';
import { runCli } from './cli.js';

const intro = { topic: 'Intro', lineCount: 3, wordCount: 9, charCount: 34, docCount: 1 };

function setup() {
  const stdout = vi.fn();
  const stderr = vi.fn();
  const requester = createInMemoryRequester({
    'tcp://intro:5567': async () => ({ status: 'success', metrics: intro }),
  });
  const deps = {
    diagnosticContext: createMockDiagnosticsContext(),
    requester,
    stdout,
    stderr,
  };
  return { deps, stdout, stderr, requester };
}

describe('runCli', () => {
  it('should print collected metrics as JSON', async () => {
    const { deps, stdout, stderr } = setup();

    const code = await runCli(['collect', '--aggregator', 'Intro=tcp://intro:5567'], deps);

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${JSON.stringify({ Intro: intro }, null, 2)}\n`);
    expect(stderr).not.toHaveBeenCalled();
  });

  it('should print usage and exit with 2 on bad arguments', async () => {
    const { deps, stdout, stderr, requester } = setup();

    const code = await runCli(['collect'], deps);

    expect(code).toBe(2);
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(
      [
        'collect needs at least one --aggregator',
        '',
        'Usage:',
        '  result-collector collect --aggregator <topic>=<endpoint> [--aggregator ...]',
        '  result-collector local <file...> [--topic <topic> ...]',
        '',
      ].join('\n'),
    );
    expect(requester.calls).toEqual([]);
  });

  it('should print an empty object when no document could be read', async () => {
    const { deps, stdout } = setup();

    const code = await runCli(['local', '/nonexistent/doc-analytics/missing.md'], deps);

    expect(code).toBe(0);
    expect(stdout).toHaveBeenCalledWith('{}\n');
  });
});
