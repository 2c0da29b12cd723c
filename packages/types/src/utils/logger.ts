export type LogFields = Record<string, unknown>;

/**
 * Minimal logging seam. Components take a Logger in their options instead of
 * writing to the console directly, so hosts decide where output goes and
 * tests can stay quiet.
 *
 * Never pass statement text (lines, details, amounts) in messages or fields.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
}

function safeJsonStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (typeof v === 'bigint') return v.toString();
      if (v instanceof Error) return { name: v.name, message: v.message };
      return v;
    });
  } catch {
    return '"[unserializable]"';
  }
}

function formatLine(level: string, message: string, fields?: LogFields): string {
  if (fields === undefined || Object.keys(fields).length === 0) {
    return `[${level}] ${message}`;
  }
  return `[${level}] ${message} ${safeJsonStringify(fields)}`;
}

/**
 * Console logger writing every level to stderr, keeping stdout free for
 * command output.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    debug(message, fields) {
      if (verbose) console.error(formatLine('DEBUG', message, fields));
    },
    info(message, fields) {
      console.error(formatLine('INFO', message, fields));
    },
    warn(message, fields) {
      console.error(formatLine('WARN', message, fields));
    },
    error(message, fields) {
      console.error(formatLine('ERROR', message, fields));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
