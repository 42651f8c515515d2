// Path: web/src/lib/logger.ts
// Quiz and explorer debug output; silent unless FEATURE_EXPLORER_DEBUG=1.

type LogLevel = 'log' | 'warn' | 'error';

export function isDebugEnabled(source: Record<string, string | undefined> = process.env): boolean {
  return source.FEATURE_EXPLORER_DEBUG === '1';
}

function write(level: LogLevel, args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console[level](`[explorer] ${new Date().toISOString()}`, ...args);
}

export function dlog(...args: unknown[]) { write('log', args); }
export function dwarn(...args: unknown[]) { write('warn', args); }
export function derr(...args: unknown[]) { write('error', args); }
