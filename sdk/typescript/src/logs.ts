/**
 * Portal SDK - Structured Logs
 *
 * Log methods on PortalClient:
 *   - newLog(activityLabel, columns): Promise<ServerMessage>
 *   - newLogEntry(activityLabel, values): Promise<ServerMessage>
 *   - getLog(activityLabel, date?): Promise<LogEntry[]>
 *   - deleteLog(activityLabel): Promise<ServerMessage>
 */

import { ProtocolError } from './errors.js';
import { logRowsSchema } from './schemas.js';
import type { Column, LogEntry } from './types.js';

export type { Column, LogEntry } from './types.js';

export function encodeColumns(columns: Column[]): string {
  return JSON.stringify(columns.map(({ name, label }) => ({ name, label })));
}

/**
 * The log read endpoint wraps its rows in a JSON string under `message`.
 * Each row is `{ columns: {...} }`; only the columns are returned.
 */
export function parseLogEntries(message: string, operation: string = 'log read'): LogEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(message);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'invalid JSON';
    throw new ProtocolError(operation, reason, message);
  }

  const rows = logRowsSchema.safeParse(parsed);
  if (!rows.success) {
    throw new ProtocolError(operation, rows.error.message, message);
  }
  return rows.data.map((row) => row.columns);
}
