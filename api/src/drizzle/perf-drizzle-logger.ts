import type { Logger as DrizzleLogger } from 'drizzle-orm';
import { perfLog } from '../common/perf-logger';

/**
 * Drizzle ORM Logger implementation that emits [PERF] DB lines.
 *
 * Drizzle calls `logQuery(query, params)` for every executed query but does
 * not report execution time, so the duration is always 0ms. The query text
 * and its target table are what the lines are grepped for.
 */
export class PerfDrizzleLogger implements DrizzleLogger {
  logQuery(query: string): void {
    perfLog('DB', 'query', 0, {
      table: extractTable(query),
      query: query.length > 200 ? query.slice(0, 200) + '...' : query,
    });
  }
}

/** First table named after FROM, INTO, UPDATE or JOIN */
export function extractTable(query: string): string {
  const match = /(?:from|into|update|join)\s+"?(\w+)"?/i.exec(query);
  return match?.[1] ?? 'unknown';
}
