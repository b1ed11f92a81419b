import { describe, expect, it } from 'vitest';
import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockMetricsContext,
  createMockProcessContext,
} from '../test/index.js';
import { createHttpServer } from './httpServer.js';
import type { ServiceContext } from './types.js';

class RejectedInputError extends Error {
  readonly statusCode = 400;
  readonly details = [{ path: 'documents' }];

  constructor(message: string) {
    super(message);
    this.name = 'RejectedInputError';
  }
}

function createTestServiceContext(shuttingDown = false) {
  const processContext = createMockProcessContext({ isShuttingDown: () => shuttingDown });
  const context: ServiceContext<{ PORT: number; NODE_ENV: string }> = {
    envContext: createMockEnvContext({ PORT: 0, NODE_ENV: 'test' }),
    diagnosticContext: createMockDiagnosticsContext(),
    metricsContext: createMockMetricsContext(),
    processContext,
  };
  return { context };
}

describe('createHttpServer', () => {
  it('should attach the service context and a request logger', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    server.get('/probe', async (request) => ({
      sameContext: request.ctx === context,
      hasLogger: typeof request.logger.info === 'function',
    }));

    const response = await server.inject({ method: 'GET', url: '/probe' });

    expect(response.json()).toEqual({ sameContext: true, hasLogger: true });
  });

  it('should use the correlation id header as the request id', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    server.get('/probe', async (request) => ({ correlationId: request.correlationId }));

    const response = await server.inject({
      method: 'GET',
      url: '/probe',
      headers: { 'x-correlation-id': 'req-abc' },
    });

    expect(response.json()).toEqual({ correlationId: 'req-abc' });
    expect(context.diagnosticContext.createChildLogger).toHaveBeenCalledWith('req-abc');
  });

  it('should report healthy without health checks', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'healthy', components: [] });
  });

  it('should report unhealthy components with 503', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context, {
      healthChecks: [
        async () => ({ component: 'reply-socket', isHealthy: true }),
        async () => ({ component: 'publisher', isHealthy: false }),
      ],
    });

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      status: 'unhealthy',
      components: [
        { component: 'reply-socket', isHealthy: true },
        { component: 'publisher', isHealthy: false },
      ],
    });
  });

  it('should report unhealthy while shutting down', async () => {
    const { context } = createTestServiceContext(true);
    const server = createHttpServer(context);

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
  });

  it('should expose metrics text', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    const response = await server.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('# HELP test\ntest_metric 1');
  });

  it('should map errors carrying a status code to an error body', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    server.post('/fail', async () => {
      throw new RejectedInputError('documents must be an array');
    });

    const response = await server.inject({ method: 'POST', url: '/fail' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      status: 'error',
      error: 'RejectedInputError',
      message: 'documents must be an array',
      details: [{ path: 'documents' }],
    });
  });

  it('should answer unexpected errors with 500', async () => {
    const { context } = createTestServiceContext();
    const server = createHttpServer(context);

    server.get('/crash', async () => {
      throw new Error('socket closed');
    });

    const response = await server.inject({ method: 'GET', url: '/crash' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toMatchObject({ status: 'error', message: 'socket closed' });
    expect(context.diagnosticContext.logger.error).toHaveBeenCalled();
  });
});
