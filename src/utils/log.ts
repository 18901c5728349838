import pino from 'pino';

const usePretty =
  process.env.NODE_ENV !== 'production' &&
  process.env.NODE_ENV !== 'test' &&
  Boolean(process.stdout.isTTY);

const baseLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true
        }
      }
    : undefined
});

function toBindings(context: unknown): Record<string, unknown> | undefined {
  if (context === undefined) return undefined;
  if (context instanceof Error) return { err: context };
  if (context !== null && typeof context === 'object' && !Array.isArray(context)) {
    const bindings: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      bindings[key === 'error' && value instanceof Error ? 'err' : key] = value;
    }
    return bindings;
  }
  return { detail: context };
}

function emit(level: 'debug' | 'info' | 'warn' | 'error', message: string, context?: unknown) {
  const bindings = toBindings(context);
  if (bindings) {
    baseLogger[level](bindings, message);
  } else {
    baseLogger[level](message);
  }
}

export const log = {
  debug: (message: string, context?: unknown) => emit('debug', message, context),
  info: (message: string, context?: unknown) => emit('info', message, context),
  warn: (message: string, context?: unknown) => emit('warn', message, context),
  error: (message: string, context?: unknown) => emit('error', message, context)
};
