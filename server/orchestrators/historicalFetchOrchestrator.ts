import { HISTORICAL_CHUNK_DAYS, HISTORICAL_CHUNK_DELAY_MS } from '../config.js';
import { MS_PER_DAY, addUtcDays, formatDateUTC, isValidDate } from '../lib/dateUtils.js';
import { FetchAbortedError, InvalidRangeError } from '../lib/errors.js';
import { sleepWithAbort, type SleepFn } from '../lib/sleep.js';
import logger, { type Logger } from '../logger.js';
import type { GenerationRecord } from '../services/generationParser.js';

export interface FetchWindowRange {
  start: Date;
  end: Date;
}

function floorToSecond(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}

/**
 * Splits `[start, end)` into consecutive windows of at most `chunkDays` days.
 * Each window's end is the next window's start; the last one may be shorter.
 * Boundaries are truncated to whole seconds, the precision of the API query.
 */
export function planHistoricalChunks(start: Date, end: Date, chunkDays: number = HISTORICAL_CHUNK_DAYS): FetchWindowRange[] {
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new InvalidRangeError(start, end, 'start and end must be valid dates');
  }
  const startMs = floorToSecond(start.getTime());
  const endMs = floorToSecond(end.getTime());
  if (startMs >= endMs) {
    throw new InvalidRangeError(start, end);
  }
  const chunkMs = Math.max(1000, floorToSecond(Math.max(1, Number(chunkDays) || HISTORICAL_CHUNK_DAYS) * MS_PER_DAY));
  const windows: FetchWindowRange[] = [];
  let cursorMs = startMs;
  while (cursorMs < endMs) {
    const nextMs = Math.min(cursorMs + chunkMs, endMs);
    windows.push({ start: new Date(cursorMs), end: new Date(nextMs) });
    cursorMs = nextMs;
  }
  return windows;
}

export interface HistoricalFetchOptions {
  start: Date;
  end: Date;
  fetchWindow: (start: Date, end: Date) => Promise<GenerationRecord[]>;
  chunkDays?: number;
  chunkDelayMs?: number;
  /** Checked before each window and during the inter-window wait. */
  signal?: AbortSignal | null;
  logger?: Logger;
  _deps?: { sleep?: SleepFn };
}

/**
 * Fetches `[start, end)` window by window, strictly in sequence, waiting
 * `chunkDelayMs` between calls. Any failure rejects the whole run; partial
 * results are never returned.
 */
export async function runHistoricalFetch(options: HistoricalFetchOptions): Promise<GenerationRecord[]> {
  const windows = planHistoricalChunks(options.start, options.end, options.chunkDays);
  const chunkDelayMs = Math.max(0, options.chunkDelayMs ?? HISTORICAL_CHUNK_DELAY_MS);
  const sleep = options._deps?.sleep ?? sleepWithAbort;
  const signal = options.signal ?? null;
  const log = options.logger ?? logger.child({ module: 'historical-fetch' });

  const collected: GenerationRecord[] = [];
  for (let index = 0; index < windows.length; index += 1) {
    if (signal?.aborted) {
      throw new FetchAbortedError(`Historical fetch aborted before window ${index + 1}/${windows.length}`);
    }
    const window = windows[index];
    log.info(
      { chunk: index + 1, chunks: windows.length },
      `Fetching chunk: ${formatDateUTC(window.start)} to ${formatDateUTC(window.end)}`,
    );
    const records = await options.fetchWindow(window.start, window.end);
    collected.push(...records);

    if (index < windows.length - 1 && chunkDelayMs > 0) {
      await sleep(chunkDelayMs, signal);
    }
  }

  log.info({ records: collected.length, chunks: windows.length }, `Fetched ${collected.length} total records`);
  return collected;
}

/** `[now − days, now)` through runHistoricalFetch. */
export function fetchHistoricalDays(
  days: number,
  options: Omit<HistoricalFetchOptions, 'start' | 'end'> & { now?: Date },
): Promise<GenerationRecord[]> {
  const end = options.now ?? new Date();
  const start = addUtcDays(end, -Math.max(0, Number(days) || 0));
  return runHistoricalFetch({ ...options, start, end });
}
