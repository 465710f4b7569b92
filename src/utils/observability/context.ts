import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const storage = new AsyncLocalStorage<LogContext>();

/** Run `fn` with `context` merged over any enclosing log context. */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run({ ...getLogContext(), ...context }, fn);
}

export function getLogContext(): LogContext {
  return storage.getStore() ?? {};
}

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/** Correlates log lines of one HTTP request. */
export function createRequestId(prefix = 'req'): string {
  return shortId(prefix);
}

/** Correlates log lines of one scheduler tick or worker job. */
export function createRunId(prefix = 'run'): string {
  return shortId(prefix);
}
