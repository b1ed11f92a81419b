import * as zmq from 'zeromq';
import type { SF } from '@doc-analytics/service-framework-node';
import type { Replier, RequestHandler } from '../types.js';

interface ZmqReplierOptions {
  diagnosticContext: SF.DiagnosticContext;
  endpoint: string;
  handler: RequestHandler;
}

export const invalidRequestReply = { status: 'error', message: 'Invalid request' } as const;

function decodeRequest(frame: Buffer | undefined): { ok: true; value: unknown } | { ok: false } {
  if (frame === undefined) {
    return { ok: false };
  }
  try {
    return { ok: true, value: JSON.parse(frame.toString('utf8')) };
  } catch {
    return { ok: false };
  }
}

export function createZmqReplier(options: ZmqReplierOptions): Replier {
  const { diagnosticContext, endpoint, handler } = options;
  const logger = diagnosticContext.logger;

  const socket = new zmq.Reply();
  let isRunning = false;

  async function replyTo(frame: Buffer | undefined): Promise<unknown> {
    const decoded = decodeRequest(frame);
    if (!decoded.ok) {
      logger.warn('[ZmqReplier] Undecodable request', { endpoint });
      return invalidRequestReply;
    }

    try {
      return await handler(decoded.value);
    } catch (error) {
      logger.error(error, '[ZmqReplier] Handler failed', { endpoint });
      return {
        status: 'error',
        message: error instanceof Error ? error.message : String(error),
      };
    }
  }

  async function receiveRequests(): Promise<void> {
    try {
      for await (const [frame] of socket) {
        const reply = await replyTo(frame);
        try {
          await socket.send(JSON.stringify(reply));
        } catch (error) {
          logger.error(error, '[ZmqReplier] Failed to send reply', { endpoint });
        }
      }
    } catch (error) {
      if (isRunning) {
        // the socket no longer receives, so health checks must see it as down
        isRunning = false;
        logger.error(error, '[ZmqReplier] Error receiving requests', { endpoint });
      }
    }
  }

  return {
    endpoint,
    start: async (): Promise<void> => {
      if (isRunning) {
        logger.warn('[ZmqReplier] Already running', { endpoint });
        return;
      }

      await socket.bind(endpoint);
      isRunning = true;
      logger.info('[ZmqReplier] Bound and listening', { endpoint });

      void receiveRequests();
    },
    stop: async (): Promise<void> => {
      if (!isRunning) {
        return;
      }
      isRunning = false;
      socket.close();
      logger.info('[ZmqReplier] Stopped', { endpoint });
    },
    isRunning: () => isRunning,
  };
}
