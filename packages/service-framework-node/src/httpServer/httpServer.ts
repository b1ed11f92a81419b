import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { httpServerMetrics } from '../componentMetrics/componentMetrics.js';
import type {
  HealthCheckResult,
  HttpErrorBody,
  HttpServerConfig,
  ServiceContext,
} from './types.js';

interface HttpServerEnv {
  PORT: number;
  NODE_ENV: string;
}

function statusCodeOf(error: FastifyError | Error): number {
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode >= 400) {
    return error.statusCode;
  }
  return 500;
}

function detailsOf(error: Error): unknown {
  return 'details' in error ? error.details : undefined;
}

export function createHttpServer<T extends HttpServerEnv, TMetrics>(
  context: ServiceContext<T, TMetrics>,
  config: HttpServerConfig = {},
): FastifyInstance {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'correlationId',
    requestIdHeader: 'x-correlation-id',
  });

  const httpRequestsTotal = context.metricsContext.createCounter(
    httpServerMetrics.httpRequestsTotal,
  );
  const httpRequestDuration = context.metricsContext.createHistogram(
    httpServerMetrics.httpRequestDuration,
  );

  fastify.decorateRequest('ctx');
  fastify.decorateRequest('logger');
  fastify.decorateRequest('correlationId');
  fastify.decorateRequest('startTime');

  fastify.addHook('onRequest', async (request) => {
    const correlationId =
      request.id || context.diagnosticContext.correlationIdGenerator.generateRootId();

    request.ctx = context;
    request.correlationId = correlationId;
    request.logger = context.diagnosticContext.createChildLogger(correlationId);
    request.startTime = Date.now();

    request.logger.info('Request received', {
      method: request.method,
      url: request.url,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = Date.now() - request.startTime;
    const route = request.routeOptions.url ?? request.url;

    request.logger.info('Request completed', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration_ms: duration,
    });

    httpRequestsTotal.inc({
      method: request.method,
      route,
      status_code: String(reply.statusCode),
    });
    httpRequestDuration.observe({ method: request.method, route }, duration / 1000);
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    const statusCode = statusCodeOf(error);

    if (statusCode >= 500) {
      request.logger.error(error, 'Request failed');
    } else {
      request.logger.warn('Request rejected', { statusCode, error: error.message });
    }

    const body: HttpErrorBody = {
      status: 'error',
      error: error.name,
      message: error.message,
      details: detailsOf(error),
    };

    return reply.code(statusCode).send(body);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.type(context.metricsContext.getRegistry().contentType);
    return context.metricsContext.getMetricsAsString();
  });

  fastify.get('/health', async (request, reply) => {
    const components: HealthCheckResult[] = [];
    const health = {
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      components,
    };

    if (context.processContext.isShuttingDown()) {
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    if (!config.healthChecks || config.healthChecks.length === 0) {
      return health;
    }

    try {
      const results = await Promise.all(config.healthChecks.map((check) => check()));
      health.components = results;

      const unhealthyComponents = results
        .filter((result) => !result.isHealthy)
        .map((result) => result.component);

      if (unhealthyComponents.length > 0) {
        request.logger.warn('Health check failed', { unhealthyComponents });
        reply.code(503);
        return { ...health, status: 'unhealthy' };
      }
    } catch (error) {
      request.logger.error(error, 'Health check error');
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    return health;
  });

  context.processContext.onShutdown(async () => {
    await fastify.close();
  });

  fastify.decorate('startServer', async function (this: FastifyInstance) {
    await this.listen({
      port: context.envContext.config.PORT,
      host: '0.0.0.0',
    });

    context.diagnosticContext.logger.info('Server started', {
      port: context.envContext.config.PORT,
      environment: context.envContext.config.NODE_ENV,
    });
  });

  return fastify;
}
