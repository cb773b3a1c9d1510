export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logLexer: boolean;
  logParser: boolean;
  logResolver: boolean;
  logModel: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.ODATA_FILTER_DEBUG_MODE, false);

  // Level and format apply whether or not debug categories are on
  const logLevel = toLogLevel(process.env.ODATA_FILTER_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.ODATA_FILTER_LOG_FORMAT, 'pretty');

  if (!enabled) {
    return {
      enabled: false,
      logLexer: false,
      logParser: false,
      logResolver: false,
      logModel: false,
      logLevel,
      logFormat,
    };
  }

  return {
    enabled: true,
    // Token-level tracing is noisy, so it stays off unless asked for
    logLexer: toBool(process.env.ODATA_FILTER_DEBUG_LEXER, false),
    logParser: toBool(process.env.ODATA_FILTER_DEBUG_PARSER, true),
    logResolver: toBool(process.env.ODATA_FILTER_DEBUG_RESOLVER, true),
    logModel: toBool(process.env.ODATA_FILTER_DEBUG_MODEL, true),
    logLevel,
    logFormat,
  };
}
