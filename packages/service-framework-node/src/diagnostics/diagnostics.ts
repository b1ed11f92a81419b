import { randomUUID } from 'node:crypto';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  LogFields,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const logSeverities: readonly LogSeverity[] = ['debug', 'info', 'warn', 'error', 'fatal'];
const logOutputFormats: readonly LogOutputFormat[] = ['json', 'human', 'structured-text'];

const resetColor = '\x1b[0m';
const valueColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

export function isLogSeverity(value: string): value is LogSeverity {
  return logSeverities.some((severity) => severity === value);
}

export function isLogOutputFormat(value: string): value is LogOutputFormat {
  return logOutputFormats.some((format) => format === value);
}

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `req-${randomUUID()}`;
    },

    createScopedId(parentId: string, scope: string): string {
      return `${parentId}${scopeDelimiter}${scope}`;
    },

    extractRootId(scopedId: string): string {
      const delimiterIndex = scopedId.indexOf(scopeDelimiter);
      return delimiterIndex === -1 ? scopedId : scopedId.substring(0, delimiterIndex);
    },
  };
}

function formatHuman(entry: LogEntry): string {
  const color = severityColors[entry.severity];
  const parts = [
    `${color}${entry.severity}${resetColor}`,
    `process=${valueColor}${entry.serviceName}${resetColor}`,
    `ts=${valueColor}${entry.timestamp}${resetColor}`,
    `msg="${color}${entry.message}${resetColor}"`,
  ];

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    const serialized = typeof value === 'object' ? JSON.stringify(value) : `"${String(value)}"`;
    parts.push(`${key}=${color}${serialized}${resetColor}`);
  }

  return parts.join(' ');
}

function formatStructuredText(entry: LogEntry): string {
  const parts = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.correlationId) {
    parts.push(`correlation_id=${entry.correlationId}`);
  }

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    parts.push(`${key}=${typeof value === 'string' ? `"${value}"` : JSON.stringify(value)}`);
  }

  return parts.join(' ');
}

export function formatLogEntry(entry: LogEntry, outputFormat: LogOutputFormat): string {
  switch (outputFormat) {
    case 'human':
      return formatHuman(entry);
    case 'structured-text':
      return formatStructuredText(entry);
    case 'json':
    default:
      return JSON.stringify(entry);
  }
}

function errorToFields(error: unknown): LogFields {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }

  const plain: LogFields =
    'toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
      ? error.toErrorPlainObject()
      : {};

  return {
    ...(error.name !== 'Error' ? { name: error.name } : {}),
    stack: error.stack,
    ...plain,
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumSeverity = config.minimumSeverity ?? 'info';
  const outputFormat = config.outputFormat ?? 'human';

  function log(severity: LogSeverity, message: string, fields?: LogFields): void {
    if (severityLevels[severity] < severityLevels[minimumSeverity]) {
      return;
    }

    const output = formatLogEntry(
      {
        timestamp: new Date().toISOString(),
        severity,
        message,
        serviceName,
        correlationId,
        fields: { ...config.defaultLoggerArgs, ...fields },
      },
      outputFormat,
    );

    if (severity === 'error' || severity === 'fatal') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | LogFields,
    fields?: LogFields,
  ): void {
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const additionalFields = typeof message === 'object' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? additionalMessage ?? String(error), {
      ...errorToFields(error),
      ...additionalFields,
      ...fields,
      ...(additionalMessage && errorMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (error, message, fields) => logError('error', error, message, fields),
    fatal: (error, message, fields) => logError('fatal', error, message, fields),
    createChild(scopeId: string): Logger {
      const childCorrelationId = correlationId
        ? `${correlationId}${scopeDelimiter}${scopeId}`
        : scopeId;

      return createLogger(serviceName, childCorrelationId, config);
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const correlationIdGenerator = createCorrelationIdGenerator();
  const serviceName = envContext.config.PROCESS_NAME;
  const rootId = config.correlationId ?? correlationIdGenerator.generateRootId();

  return {
    correlationIdGenerator,
    logger: createLogger(serviceName, rootId, config),
    createChildLogger: (correlationId: string) => createLogger(serviceName, correlationId, config),
    getChildDiagnosticContext: (defaultLoggerArgs?: LogFields, scopeId?: string) =>
      createDiagnosticContext(envContext, {
        ...config,
        correlationId: scopeId ? `${scopeId}::${rootId}` : rootId,
        defaultLoggerArgs: { ...config.defaultLoggerArgs, ...defaultLoggerArgs },
      }),
  };
}

/**
 * Builds a diagnostic context from the LOG_LEVEL and LOG_FORMAT variables every
 * app schema carries; unknown values fall back to info and human.
 */
export function createDiagnosticContextFromEnv(
  envContext: DefaultEnvContext & { config: { LOG_LEVEL: string; LOG_FORMAT: string } },
): DiagnosticContext {
  const { LOG_LEVEL, LOG_FORMAT } = envContext.config;

  return createDiagnosticContext(envContext, {
    minimumSeverity: isLogSeverity(LOG_LEVEL) ? LOG_LEVEL : 'info',
    outputFormat: isLogOutputFormat(LOG_FORMAT) ? LOG_FORMAT : 'human',
  });
}
