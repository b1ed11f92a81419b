import type { FastifyInstance } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  registerDocumentsBodySchema,
  registerWorkerBodySchema,
  workerIdParamsSchema,
} from '@doc-analytics/interface';
import type { Dispatcher } from './dispatcher.js';
import { InvalidInputError } from './errors.js';

function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid ${what}`, parsed.error.issues);
  }
  return parsed.data;
}

export function registerControlRoutes(server: FastifyInstance, dispatcher: Dispatcher): void {
  server.post('/register_documents', async (request) => {
    const { documents } = parseInput(registerDocumentsBodySchema, request.body, 'documents payload');
    const registered = dispatcher.registerItems(documents);

    return { status: 'success', registered };
  });

  server.post('/register_worker', async (request) => {
    const { worker } = parseInput(registerWorkerBodySchema, request.body, 'worker payload');
    dispatcher.registerWorker(worker);

    return { status: 'success' };
  });

  server.delete('/workers/:id', async (request) => {
    const { id } = parseInput(workerIdParamsSchema, request.params, 'worker id');
    const removed = dispatcher.unregisterWorker(id);

    return { status: 'success', removed };
  });

  server.post('/distribute', async (_request, reply) => {
    const result = await dispatcher.distribute();

    if (result.status === 'no_workers_available') {
      return reply.code(result.error.statusCode).send({
        status: 'error',
        error: result.error.name,
        message: result.error.message,
      });
    }

    return {
      status: 'completed',
      processed: result.outcome.processedCount,
      errors: result.outcome.errorCount,
    };
  });
}
