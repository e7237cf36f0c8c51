import { Logger } from '@nestjs/common';

const perfLogger = new Logger('PERF');

/**
 * HTTP requests, DB queries, reminder scans and DM batches each get their
 * own tag so a single grep isolates one of them.
 */
export type PerfCategory = 'HTTP' | 'DB' | 'REMINDER' | 'DISPATCH';

export type PerfMeta = Record<string, string | number | null | undefined>;

/** Gated behind DEBUG=true; callers check it to skip building meta */
export function isPerfEnabled(): boolean {
  return process.env.DEBUG === 'true';
}

/**
 * Emit one line in the form
 * `[PERF] <CATEGORY> | <operation> | <duration>ms | key=value key=value`
 */
export function perfLog(
  category: PerfCategory,
  operation: string,
  durationMs: number,
  meta?: PerfMeta,
): void {
  if (!isPerfEnabled()) return;
  perfLogger.debug(formatPerfLine(category, operation, durationMs, meta));
}

/**
 * Start timing an operation. The returned function logs the elapsed time
 * with whatever meta is known once the operation finishes.
 */
export function startPerfTimer(
  category: PerfCategory,
  operation: string,
): (meta?: PerfMeta) => void {
  const start = performance.now();
  return (meta) => perfLog(category, operation, performance.now() - start, meta);
}

export function formatPerfLine(
  category: PerfCategory,
  operation: string,
  durationMs: number,
  meta?: PerfMeta,
): string {
  const head = `[PERF] ${category} | ${operation} | ${Math.round(durationMs)}ms`;
  const pairs = Object.entries(meta ?? {})
    .filter((entry): entry is [string, string | number] => entry[1] != null)
    .map(([key, value]) => `${key}=${formatMetaValue(value)}`);
  return pairs.length > 0 ? `${head} | ${pairs.join(' ')}` : head;
}

// Quote values with whitespace so key=value pairs stay splittable
function formatMetaValue(value: string | number): string {
  return typeof value === 'string' && /\s/.test(value)
    ? JSON.stringify(value)
    : String(value);
}
