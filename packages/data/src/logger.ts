/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * luxray logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that abort a parse or a render
 * - warn: Always logged - skipped input, degraded output
 * - info: Logged when LUXRAY_DEBUG=true - frame start/finish, pool sizing
 * - debug: Logged when LUXRAY_DEBUG=true - per-task detail
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component/module name (e.g., 'NffParser', 'SceneCompiler', 'Renderer') */
  component: string;
  /** Operation being performed (e.g., 'parseDirective', 'renderFrame') */
  operation?: string;
  /** Shape id if applicable */
  shapeId?: number;
  /** Source line number if applicable */
  line?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  return process.env.LUXRAY_DEBUG === 'true';
}

export function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.shapeId !== undefined) {
    prefix += ` #${ctx.shapeId}`;
  }
  if (ctx.line !== undefined) {
    prefix += ` (line ${ctx.line})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const args: unknown[] = [error !== undefined ? `${prefix} ${message}:` : `${prefix} ${message}`];
      if (error !== undefined) args.push(formatError(error));
      if (ctx?.data !== undefined) args.push(ctx.data);
      console.error(...args);
    },

    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error that was handled - visible when LUXRAY_DEBUG=true
     */
    caught(message, error, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}
