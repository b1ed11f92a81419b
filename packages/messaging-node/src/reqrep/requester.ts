import * as zmq from 'zeromq';
import type { SF } from '@doc-analytics/service-framework-node';
import { ZmqRequestError } from '../errors.js';
import type { ReplySchema, Requester } from '../types.js';

interface ZmqRequesterOptions {
  diagnosticContext: SF.DiagnosticContext;
  timeoutMs: number;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EAGAIN';
}

/**
 * Request client that opens a fresh REQ socket per call, so a timed out
 * exchange never leaves a socket stuck waiting for its reply. `timeoutMs`
 * bounds the whole call: the reply wait gets whatever the send left over.
 */
export function createZmqRequester(options: ZmqRequesterOptions): Requester {
  const { diagnosticContext, timeoutMs } = options;
  const logger = diagnosticContext.logger;

  async function exchange(endpoint: string, payload: unknown): Promise<string> {
    // one deadline covers the send and the reply together
    const deadline = Date.now() + timeoutMs;
    const socket = new zmq.Request({
      linger: 0,
      sendTimeout: timeoutMs,
      receiveTimeout: timeoutMs,
    });

    try {
      socket.connect(endpoint);
      await socket.send(JSON.stringify(payload));
      socket.receiveTimeout = Math.max(1, deadline - Date.now());
      const [reply] = await socket.receive();

      if (reply === undefined) {
        throw new ZmqRequestError('Empty reply', endpoint, 'decode');
      }
      return reply.toString('utf8');
    } catch (error) {
      if (error instanceof ZmqRequestError) {
        throw error;
      }
      if (isTimeout(error)) {
        throw new ZmqRequestError(
          `No reply from ${endpoint} within ${timeoutMs}ms`,
          endpoint,
          'timeout',
          error,
        );
      }
      throw new ZmqRequestError(
        `Request to ${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`,
        endpoint,
        'transport',
        error,
      );
    } finally {
      socket.close();
    }
  }

  return {
    request: async <T>(endpoint: string, payload: unknown, schema: ReplySchema<T>): Promise<T> => {
      logger.debug('[ZmqRequester] Sending request', { endpoint });

      const raw = await exchange(endpoint, payload);

      let decoded: unknown;
      try {
        decoded = JSON.parse(raw);
      } catch (error) {
        throw new ZmqRequestError(`Reply from ${endpoint} is not JSON`, endpoint, 'decode', error);
      }

      const parsed = schema.safeParse(decoded);
      if (!parsed.success) {
        throw new ZmqRequestError(
          `Reply from ${endpoint} does not match the expected shape`,
          endpoint,
          'decode',
          parsed.error.issues,
        );
      }

      return parsed.data;
    },
  };
}
