export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface ConsoleSink {
  log(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
}

export function createNoopLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {}
  };
}

function formatLine(
  prefix: string | undefined,
  message: string,
  context?: Record<string, unknown>
): string {
  const parts = prefix ? [prefix, message] : [message];
  if (context && Object.keys(context).length > 0) {
    parts.push(JSON.stringify(context));
  }
  return parts.join(" ");
}

/**
 * Logger for interactive use. Lines go to the given sink unchanged apart from
 * the optional prefix and a trailing JSON rendering of the context.
 */
export function createConsoleLogger(
  prefix?: string,
  sink: ConsoleSink = console
): Logger {
  return {
    info(message: string, context?: Record<string, unknown>) {
      sink.log(formatLine(prefix, message, context));
    },
    warn(message: string, context?: Record<string, unknown>) {
      sink.warn(formatLine(prefix, message, context));
    },
    error(message: string, context?: Record<string, unknown>) {
      sink.error(formatLine(prefix, message, context));
    }
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
