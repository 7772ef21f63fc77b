/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CSXDIF Logger - component-prefixed logging shared by every package
 *
 * Levels, most severe first:
 * - error: fatal conversion failures
 * - warn: recoverable input anomalies (dropped faces, unbound path nodes)
 * - info: phase timings, unit counts
 * - debug: per-brush / per-node detail
 *
 * error and warn are always emitted. info and debug need CSXDIF_DEBUG=true,
 * or CSXDIF_LOG_LEVEL set to one of the level names.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface LogContext {
  /** Component/module name (e.g., 'Ingestor', 'BSP', 'Converter') */
  component: string;
  /** Operation being performed (e.g., 'fitPlane', 'splitByCapacity') */
  operation?: string;
  brushId?: number;
  entityId?: number;
  /** Output unit (interior) index */
  unit?: number;
  data?: Record<string, unknown>;
}

/** Where formatted records go; console by default */
export type LogSink = (level: LogLevel, line: string, extra: readonly unknown[]) => void;

const consoleSink: LogSink = (level, line, extra) => {
  switch (level) {
    case 'error':
      console.error(line, ...extra);
      break;
    case 'warn':
      console.warn(line, ...extra);
      break;
    case 'info':
      console.log(line, ...extra);
      break;
    case 'debug':
      console.debug(line, ...extra);
      break;
  }
};

let sink: LogSink = consoleSink;

/**
 * Redirect all loggers. Returns the previous sink so callers can restore it.
 */
export function setLogSink(next: LogSink | undefined): LogSink {
  const previous = sink;
  sink = next ?? consoleSink;
  return previous;
}

/**
 * Hand an already formatted record to the current sink, e.g. one relayed
 * from a worker thread that applied its own level filter
 */
export function forwardLogRecord(level: LogLevel, line: string, extra: readonly unknown[]): void {
  sink(level, line, extra);
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function threshold(): number {
  const env = typeof process !== 'undefined' ? process.env : {};
  const level = env.CSXDIF_LOG_LEVEL?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    return Math.max(LEVEL_RANK[level], LEVEL_RANK.warn);
  }
  return env.CSXDIF_DEBUG === 'true' ? LEVEL_RANK.debug : LEVEL_RANK.warn;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.unit !== undefined) {
    prefix += ` unit ${ctx.unit}`;
  }
  if (ctx.brushId !== undefined) {
    prefix += ` brush #${ctx.brushId}`;
  }
  if (ctx.entityId !== undefined) {
    prefix += ` entity #${ctx.entityId}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  function emit(level: LogLevel, message: string, ctx: Partial<LogContext> | undefined, extra: unknown[]): void {
    if (LEVEL_RANK[level] > threshold()) return;
    const line = `${formatContext({ component, ...ctx })} ${message}`;
    if (ctx?.data !== undefined) {
      extra.push(ctx.data);
    }
    sink(level, line, extra);
  }

  return {
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      emit('error', error === undefined ? message : `${message}:`, ctx, error === undefined ? [] : [formatError(error)]);
    },

    warn(message: string, ctx?: Partial<LogContext>) {
      emit('warn', message, ctx, []);
    },

    info(message: string, ctx?: Partial<LogContext>) {
      emit('info', message, ctx, []);
    },

    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      emit('debug', message, ctx, data === undefined ? [] : [data]);
    },

    /**
     * A handled error, at debug level
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      emit('debug', `${message} (recovered):`, ctx, [formatError(error)]);
    },
  };
}
