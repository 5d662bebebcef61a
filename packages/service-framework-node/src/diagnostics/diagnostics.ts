import { randomUUID } from 'node:crypto';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
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

const resetColor = '\x1b[0m';
const msgColor = '\x1b[34m';

const severityColors: Record<LogSeverity, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

export function generateCorrelationId(): string {
  return `trigger-${randomUUID()}`;
}

function formatAsHumanReadable(entry: LogEntry): string {
  const severityColor = severityColors[entry.severity];

  const parts: string[] = [
    `${severityColor}${entry.severity}${resetColor}`,
    `process=${msgColor}${entry.serviceName}${resetColor}`,
    `ts=${msgColor}${entry.timestamp}${resetColor}`,
    `msg="${severityColor}${entry.message}${resetColor}"`,
  ];

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    const serializedValue = typeof value === 'object' ? JSON.stringify(value) : `"${String(value)}"`;
    parts.push(`${key}=${severityColor}${serializedValue}${resetColor}`);
  }

  return parts.join(' ');
}

function formatAsStructuredText(entry: LogEntry): string {
  const parts: string[] = [
    `timestamp=${entry.timestamp}`,
    `service_name=${entry.serviceName}`,
    `severity=${entry.severity}`,
    `message="${entry.message}"`,
  ];

  if (entry.correlationId) {
    parts.push(`correlation_id=${entry.correlationId}`);
  }

  for (const [key, value] of Object.entries(entry.fields ?? {})) {
    const serializedValue = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
    parts.push(`${key}=${serializedValue}`);
  }

  return parts.join(' ');
}

const formatters: Record<LogOutputFormat, (entry: LogEntry) => string> = {
  json: (entry) => JSON.stringify(entry),
  human: formatAsHumanReadable,
  'structured-text': formatAsStructuredText,
};

function formatErrorAsParams(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      ...(error.name !== 'Error' ? { name: error.name } : {}),
      stack: error.stack,
      ...('toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
        ? error.toErrorPlainObject()
        : {}),
    };
  }

  return {
    error: String(error),
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumSeverity = config.minimumSeverity ?? 'info';
  const outputFormat = config.outputFormat ?? 'human';
  const format = formatters[outputFormat];

  function log(severity: LogSeverity, message: string, fields?: Record<string, unknown>): void {
    if (severityLevels[severity] < severityLevels[minimumSeverity]) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      serviceName,
      correlationId,
      fields: {
        ...config.defaultLoggerArgs,
        ...fields,
      },
    };

    // hook output on stdout is captured by the platform, errors go to stderr
    if (severity === 'error' || severity === 'fatal') {
      console.error(format(logEntry));
    } else {
      console.log(format(logEntry));
    }
  }

  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalFields = typeof message === 'string' ? fields : message;
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;

    log(severity, errorMessage ?? additionalMessage ?? String(error), {
      ...formatErrorAsParams(error),
      ...additionalFields,
      ...(additionalMessage && errorMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug(message, fields) {
      log('debug', message, fields);
    },

    info(message, fields) {
      log('info', message, fields);
    },

    warn(message, fields) {
      log('warn', message, fields);
    },

    error(error, message, fields) {
      logError('error', error, message, fields);
    },

    fatal(error, message, fields) {
      logError('fatal', error, message, fields);
    },

    createChild(scopeId, defaultFields) {
      const childCorrelationId = correlationId
        ? `${correlationId}${scopeDelimiter}${scopeId}`
        : scopeId;

      return createLogger(serviceName, childCorrelationId, {
        ...config,
        defaultLoggerArgs: {
          ...config.defaultLoggerArgs,
          ...defaultFields,
        },
      });
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const effectiveConfig: DiagnosticConfig = {
    minimumSeverity: envContext.config.LOG_LEVEL,
    outputFormat: envContext.config.LOG_FORMAT,
    ...config,
  };

  return {
    logger: createLogger(
      envContext.config.PROCESS_NAME,
      config.correlationId ?? generateCorrelationId(),
      effectiveConfig,
    ),
  };
}
