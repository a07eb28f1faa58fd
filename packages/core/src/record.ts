import { z } from 'zod';
import type { BinaryState, OccupancyRecord } from '@occupancy-meter/types';

export const RECORD_VERSION = 1;
export const DEFAULT_KEY_PREFIX = 'occupancy:';

/**
 * Persisted layout. Missing fields fall back to their zero values and
 * unknown fields are stripped, so older and newer writers can share a store.
 */
const persistedRecordSchema = z.object({
  totalDuration: z.number().finite().nonnegative().default(0),
  activationCount: z.number().int().nonnegative().default(0),
  state: z.enum(['off', 'on']).default('off'),
  intervalStart: z.number().finite().nullable().default(null),
  lastTrigger: z.number().finite().nullable().default(null),
  lastPosition: z.string().min(1).nullable().default(null),
});

export type PersistedRecord = z.infer<typeof persistedRecordSchema>;

export function recordKey(sourceId: string, prefix = DEFAULT_KEY_PREFIX): string {
  return `${prefix}${sourceId}`;
}

export function emptyRecord(sourceId: string): OccupancyRecord {
  return {
    sourceId,
    totalDuration: 0,
    activationCount: 0,
    state: 'off',
    intervalStart: null,
    lastTrigger: null,
    lastPosition: null,
  };
}

export function encodeRecord(record: OccupancyRecord): string {
  return JSON.stringify({
    v: RECORD_VERSION,
    totalDuration: record.totalDuration,
    activationCount: record.activationCount,
    state: record.state,
    intervalStart: record.intervalStart,
    lastTrigger: record.lastTrigger,
    lastPosition: record.lastPosition,
  });
}

/**
 * Decode a stored record. Returns null when the payload is not JSON or does
 * not match the layout.
 *
 * An ON record without an interval start reopens at its last trigger, or at
 * `restoredAt` when that is missing too. An OFF record never keeps one.
 */
export function decodeRecord(
  sourceId: string,
  raw: string,
  restoredAt: number
): OccupancyRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = persistedRecordSchema.safeParse(parsed);
  if (!result.success) return null;

  const data = result.data;
  let intervalStart: number | null = null;
  if (data.state === 'on') {
    intervalStart = data.intervalStart ?? data.lastTrigger ?? restoredAt;
  }

  return {
    sourceId,
    totalDuration: data.totalDuration,
    activationCount: data.activationCount,
    state: data.state,
    intervalStart,
    lastTrigger: data.lastTrigger,
    lastPosition: data.lastPosition,
  };
}

const STREAM_ID = /^(\d+)-(\d+)$/;

/**
 * Order two delivery positions. Redis stream ids (`<ms>-<seq>`) compare
 * numerically; any other pair compares as strings.
 */
export function comparePositions(a: string, b: string): number {
  const left = STREAM_ID.exec(a);
  const right = STREAM_ID.exec(b);
  if (left && right) {
    const ms = BigInt(left[1]) - BigInt(right[1]);
    if (ms !== 0n) return ms < 0n ? -1 : 1;
    const seq = BigInt(left[2]) - BigInt(right[2]);
    return seq === 0n ? 0 : seq < 0n ? -1 : 1;
  }
  return a === b ? 0 : a < b ? -1 : 1;
}

const ON_VALUES = new Set(['on', '1', 'true']);
const OFF_VALUES = new Set(['off', '0', 'false']);

/**
 * Map a host state string onto a binary state.
 * Anything else ('unavailable', 'unknown', ...) yields null.
 */
export function normalizeState(value: string): BinaryState | null {
  const lowered = value.trim().toLowerCase();
  if (ON_VALUES.has(lowered)) return 'on';
  if (OFF_VALUES.has(lowered)) return 'off';
  return null;
}
