import { HistoryEntry } from '@nudgeline/shared';

/**
 * Parse a history timestamp (ISO string or epoch ms).
 * Returns null for anything unparseable.
 */
export function parseHistoryTimestamp(value: HistoryEntry['timestamp']): number | null {
  const ms = typeof value === 'number' ? value : Date.parse(value);
  return Number.isFinite(ms) ? ms : null;
}
