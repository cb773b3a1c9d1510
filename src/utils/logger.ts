import { loadDebugConfig, LogLevel } from '../config/debug.js';

const debugConfig = loadDebugConfig();

export type DebugCategory = 'lexer' | 'parser' | 'resolver' | 'model';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'lexer':
      return debugConfig.logLexer;
    case 'parser':
      return debugConfig.logParser;
    case 'resolver':
      return debugConfig.logResolver;
    case 'model':
      return debugConfig.logModel;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

const errorReplacer = (_key: string, val: unknown) => {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
};

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${(error as Error).message}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[odata-filter:${category}]` : '[odata-filter]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  const hasAdditionalData = Object.keys(rest).length > 0;
  if (!hasAdditionalData) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      ...entry,
      _serializationError: `Failed to serialize: ${(error as Error).message}`,
    });
  }
}

// stdout carries rendered trees, so log lines go to stderr
function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function describeError(error: Error): Record<string, unknown> {
  const errorEntry: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    errorEntry.cause = error.cause;
  }
  return errorEntry;
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload !== undefined) {
      if (payload instanceof Error) {
        entry.error = describeError(payload);
      } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
        for (const [key, val] of Object.entries(payload)) {
          entry[key] = val instanceof Error ? describeError(val) : val;
        }
      } else {
        entry.data = payload;
      }
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }
}

// Singleton instance
export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}

export function trackOperation<T>(category: DebugCategory, label: string, meta?: unknown) {
  debugLog(category, `${label} START`, meta);
  const start = Date.now();
  return (result?: T) => {
    debugLog(category, `${label} END`, {
      durationMs: Date.now() - start,
      result,
    });
  };
}
