import { stringifyJSONSafe } from '@doc-analytics/utils';
import { createDiagnosticContextFromEnv } from '../diagnostics/diagnostics.js';
import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import { createEnvContext } from '../environment/environment.js';
import { DefaultEnvSchemaType } from '../environment/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

const RESTART_RETRY_DELAY_MS = 1000;

type LifecycleHandle = Omit<ProcessLifecycleContext, 'restart'> & {
  registerSignalHandlers(): () => void;
  stopProcess(reason: string): Promise<void>;
};

/**
 * Runs `startFn` inside a managed process: signals and fatal process events
 * trigger an ordered shutdown of everything registered through `onShutdown`.
 */
export async function startProcessLifecycle(
  startFn: ProcessStartFn,
  config: ProcessLifecycleConfig = {},
): Promise<ProcessLifecycleContext> {
  const bootstrapEnv = createEnvContext(DefaultEnvSchemaType);
  let diagnosticContext = createDiagnosticContextFromEnv(bootstrapEnv);

  let handle = createLifecycleHandle(() => diagnosticContext, config);
  let unregisterSignalHandlers = handle.registerSignalHandlers();

  const run = async (): Promise<void> => {
    const result = await startFn(lifecycleContext);
    diagnosticContext = result.diagnosticContext;
  };

  const restart = async (): Promise<void> => {
    if (handle.isShuttingDown()) {
      diagnosticContext.logger.warn('Attempted to restart while shutting down');
      return;
    }

    await handle.stopProcess('restart');
    unregisterSignalHandlers();

    handle = createLifecycleHandle(() => diagnosticContext, config);
    unregisterSignalHandlers = handle.registerSignalHandlers();

    await run().catch((error: unknown) => {
      diagnosticContext.logger.error(error, 'Error starting process, retrying');
      setTimeout(() => {
        void restart();
      }, RESTART_RETRY_DELAY_MS);
    });
  };

  const lifecycleContext: ProcessLifecycleContext = {
    onShutdown: (callback) => handle.onShutdown(callback),
    shutdown: () => handle.shutdown(),
    isShuttingDown: () => handle.isShuttingDown(),
    restart,
  };

  await run();
  diagnosticContext.logger.debug('Process lifecycle signal handlers registered');

  return lifecycleContext;
}

function createLifecycleHandle(
  getDiagnosticContext: () => DiagnosticContext,
  config: ProcessLifecycleConfig,
): LifecycleHandle {
  const shutdownConfig = config.shutdownConfiguration ?? defaultShutdownConfiguration;
  const exit = config.exit ?? ((code: number) => process.exit(code));

  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;

  const runCallback = async (callback: ShutdownCallback, logger: Logger): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Shutdown callback timed out')),
            shutdownConfig.callbackTimeout,
          );
        }),
      ]);
    } catch (error) {
      logger.error(error, 'Shutdown callback failed', {
        timeout: shutdownConfig.callbackTimeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const stopProcess = async (reason: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    const { logger } = getDiagnosticContext();
    logger.info('Graceful shutdown initiated', { reason });

    const forceExitTimer = setTimeout(() => {
      logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      exit(1);
    }, shutdownConfig.totalTimeout);

    for (const callback of callbacks) {
      await runCallback(callback, logger);
    }

    clearTimeout(forceExitTimer);
    logger.info('Graceful shutdown completed');
  };

  const initiateShutdown = async (reason: string, code = 0): Promise<void> => {
    await stopProcess(reason);
    exit(code);
  };

  const handleUnhandledRejection = (reason: unknown): void => {
    getDiagnosticContext().logger.fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifyJSONSafe(reason) ?? String(reason),
    });
    void initiateShutdown('unhandledRejection', 1);
  };

  const handleUncaughtException = (error: Error): void => {
    getDiagnosticContext().logger.fatal(error, 'Uncaught exception detected');
    void initiateShutdown('uncaughtException', 1);
  };

  const handleWarning = (warning: Error): void => {
    getDiagnosticContext().logger.warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
    });
  };

  function registerSignalHandlers(): () => void {
    const onSigterm = () => void initiateShutdown('SIGTERM');
    const onSigint = () => void initiateShutdown('SIGINT');

    process.on('SIGTERM', onSigterm);
    process.on('SIGINT', onSigint);
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);

    return () => {
      process.removeListener('SIGTERM', onSigterm);
      process.removeListener('SIGINT', onSigint);
      process.removeListener('unhandledRejection', handleUnhandledRejection);
      process.removeListener('uncaughtException', handleUncaughtException);
      process.removeListener('warning', handleWarning);
    };
  }

  return {
    onShutdown: (callback) => {
      callbacks.push(callback);
    },
    shutdown: () => initiateShutdown('manual'),
    isShuttingDown: () => shuttingDown,
    stopProcess,
    registerSignalHandlers,
  };
}
