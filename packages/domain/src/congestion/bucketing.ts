import type { CellId, TimeBucket } from '../entities/cell.js';

/** Width of one time bucket. */
export const WINDOW_SECONDS = 300;

const WINDOW_MS = WINDOW_SECONDS * 1_000;

const HAS_ZONE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Map a point in time to its fixed 5-minute window. */
export function bucketOf(ts: Date | number): TimeBucket {
  const ms = typeof ts === 'number' ? ts : ts.getTime();
  return Math.floor(ms / WINDOW_MS);
}

/** Inclusive start of a bucket. */
export function bucketStart(bucket: TimeBucket): Date {
  return new Date(bucket * WINDOW_MS);
}

/**
 * Parse an ISO-8601 timestamp. Strings without a zone designator are read as
 * UTC rather than local time. Returns undefined when unparseable.
 */
export function parseUtcTimestamp(raw: string): Date | undefined {
  let text = raw.trim();
  if (text.length === 0) return undefined;
  const hasTime = /\d[T ]\d/.test(text);
  if (hasTime) {
    text = text.replace(' ', 'T');
    if (!HAS_ZONE.test(text)) text += 'Z';
  }
  const ts = new Date(text);
  return Number.isNaN(ts.getTime()) ? undefined : ts;
}

/** UTC hour (0-23) and ISO weekday with Monday = 0 … Sunday = 6. */
export function timeParts(ts: Date): { hourOfDay: number; dayOfWeek: number } {
  return {
    hourOfDay: ts.getUTCHours(),
    dayOfWeek: (ts.getUTCDay() + 6) % 7,
  };
}

// ─── Ephemeral store key layout ────────────────────────────────────────────────

export function countKey(cellId: CellId, bucket: TimeBucket): string {
  return `cell:${cellId}:bucket:${bucket}`;
}

export function speedKey(cellId: CellId, bucket: TimeBucket): string {
  return `cell:${cellId}:bucket:${bucket}:speeds`;
}

export function flushMarkerKey(cellId: CellId, bucket: TimeBucket): string {
  return `cell:${cellId}:bucket:${bucket}:flushed`;
}
