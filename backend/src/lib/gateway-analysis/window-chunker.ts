/**
 * Window Chunker
 *
 * CloudWatch rejects overly long ranges in a single GetMetricStatistics call,
 * so a lookback window is fetched as contiguous sub-windows of bounded length.
 */

import { UsageError, type TimeWindow } from '../../types/gateway.js';
import { DAY_MS, MAX_CHUNK_DAYS } from './metric-catalog.js';

export const DEFAULT_MAX_CHUNK_MS = MAX_CHUNK_DAYS * DAY_MS;

function assertValidDate(value: Date, label: string): void {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
    throw new UsageError(`Invalid ${label} date`, { [label]: String(value) });
  }
}

/**
 * Split [start, end) into sub-windows of at most `maxChunkMs`.
 *
 * The returned iterable is lazy and can be iterated any number of times.
 * Sub-windows share boundaries: each one starts where the previous ended and
 * the last one ends exactly at `end`. An empty window yields nothing.
 */
export function chunkWindow(window: TimeWindow, maxChunkMs: number = DEFAULT_MAX_CHUNK_MS): Iterable<TimeWindow> {
  assertValidDate(window.start, 'start');
  assertValidDate(window.end, 'end');

  if (!Number.isFinite(maxChunkMs) || maxChunkMs <= 0) {
    throw new UsageError('Chunk duration must be a positive number of milliseconds', { maxChunkMs });
  }

  const startMs = window.start.getTime();
  const endMs = window.end.getTime();

  if (endMs < startMs) {
    throw new UsageError('Window end precedes its start', {
      start: window.start.toISOString(),
      end: window.end.toISOString(),
    });
  }

  return {
    *[Symbol.iterator]() {
      let chunkStart = startMs;
      while (chunkStart < endMs) {
        const chunkEnd = Math.min(chunkStart + maxChunkMs, endMs);
        yield { start: new Date(chunkStart), end: new Date(chunkEnd) };
        chunkStart = chunkEnd;
      }
    },
  };
}
