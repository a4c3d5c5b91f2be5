export type LogContext = Record<string, unknown>;
export type LogPayload = unknown;

type LogMethod = (message: string, ...context: LogPayload[]) => void;

export interface ScopedLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

export function formatContext(context?: LogPayload): string | undefined {
  if (context === null || context === undefined) {
    return undefined;
  }
  if (context instanceof Error) {
    const code = 'code' in context ? context.code : undefined;
    return JSON.stringify({ name: context.name, message: context.message, code, stack: context.stack });
  }
  if (typeof context !== 'object') {
    return String(context);
  }
  if (Object.keys(context).length === 0) {
    return undefined;
  }
  try {
    return JSON.stringify(context);
  } catch {
    return '[unserializable-context]';
  }
}

function formatPayloads(context: LogPayload[]): string[] {
  return context.map(formatContext).filter((payload): payload is string => payload !== undefined);
}

function write(sink: (...args: string[]) => void, message: string, context: LogPayload[]): void {
  const payloads = formatPayloads(context);
  if (payloads.length > 0) {
    sink(message, ...payloads);
    return;
  }
  sink(message);
}

export function logDebug(message: string, ...context: LogPayload[]): void {
  if (isProduction()) return;
  write(console.debug, message, context);
}

export function logInfo(message: string, ...context: LogPayload[]): void {
  write(console.info, message, context);
}

export function logWarn(message: string, ...context: LogPayload[]): void {
  write(console.warn, message, context);
}

export function logError(message: string, ...context: LogPayload[]): void {
  write(console.error, message, context);
}

/**
 * Prefix every message with `[scope]`, e.g. `[generateReport] font missing`.
 */
export function createLogger(scope: string): ScopedLogger {
  const tag = (message: string) => `[${scope}] ${message}`;
  return {
    debug: (message, ...context) => logDebug(tag(message), ...context),
    info: (message, ...context) => logInfo(tag(message), ...context),
    warn: (message, ...context) => logWarn(tag(message), ...context),
    error: (message, ...context) => logError(tag(message), ...context),
  };
}
