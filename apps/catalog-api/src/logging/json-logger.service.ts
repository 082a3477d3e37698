import { ConsoleLogger, LogLevel } from '@nestjs/common';

/** Threshold names accepted by LOG_LEVEL */
export type JsonLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Map a LOG_LEVEL threshold onto the Nest levels that stay enabled.
 */
export function nestLogLevelsFor(level: JsonLogLevel): LogLevel[] {
  switch (level) {
    case 'debug':
      return ['error', 'warn', 'log', 'debug', 'verbose'];
    case 'info':
      return ['error', 'warn', 'log'];
    case 'warn':
      return ['error', 'warn'];
    case 'error':
      return ['error'];
  }
}

/**
 * JSON logger: one object per line, {ts,level,context,msg,...meta}.
 */
export class JsonLogger extends ConsoleLogger {
  constructor(context?: string, level: JsonLogLevel = 'info') {
    super(context ?? 'catalog-api', { logLevels: nestLogLevelsFor(level) });
  }

  private nowIso() {
    return new Date().toISOString();
  }

  private normalizeError(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack
      };
    }

    if (typeof error === 'object' && error !== null) {
      try {
        return { value: JSON.parse(JSON.stringify(error)) };
      } catch {
        // Circular or otherwise unserializable.
        return { value: String(error) };
      }
    }

    return { value: String(error) };
  }

  private normalizeMessage(message: unknown) {
    if (message instanceof Error) {
      return { msg: message.message, error: this.normalizeError(message) };
    }
    return { msg: message };
  }

  private line(level: string, message: unknown, context: string | undefined, meta?: Record<string, unknown>) {
    const normalizedMeta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(meta ?? {})) {
      normalizedMeta[key] = value instanceof Error ? this.normalizeError(value) : value;
    }
    return JSON.stringify({ ts: this.nowIso(), level, context, ...this.normalizeMessage(message), ...normalizedMeta });
  }

  log(message: unknown, context?: string): void;
  log(message: unknown, meta?: Record<string, unknown>): void;
  log(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : metaOrContext;
    super.log(this.line('info', message, context, meta));
  }

  warn(message: unknown, context?: string): void;
  warn(message: unknown, meta?: Record<string, unknown>): void;
  warn(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : metaOrContext;
    super.warn(this.line('warn', message, context, meta));
  }

  error(message: unknown, stack?: string, context?: string): void;
  error(message: unknown, meta?: Record<string, unknown>): void;
  error(message: unknown, stackOrMeta?: string | Record<string, unknown>, maybeContext?: string) {
    const stack = typeof stackOrMeta === 'string' ? stackOrMeta : undefined;
    const context = typeof maybeContext === 'string' ? maybeContext : this.context;
    const meta = typeof stackOrMeta === 'string' ? {} : stackOrMeta;
    super.error(this.line('error', message, context, { ...(stack ? { stack } : {}), ...(meta ?? {}) }));
  }

  debug(message: unknown, context?: string): void;
  debug(message: unknown, meta?: Record<string, unknown>): void;
  debug(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : metaOrContext;
    super.debug(this.line('debug', message, context, meta));
  }

  verbose(message: unknown, context?: string): void;
  verbose(message: unknown, meta?: Record<string, unknown>): void;
  verbose(message: unknown, metaOrContext?: string | Record<string, unknown>) {
    const context = typeof metaOrContext === 'string' ? metaOrContext : this.context;
    const meta = typeof metaOrContext === 'string' ? {} : metaOrContext;
    super.verbose(this.line('verbose', message, context, meta));
  }
}
