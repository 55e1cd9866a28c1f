/**
 * Elexon BMRS HTTP client: request building, a keep-alive session, timeout,
 * retry with exponential backoff, and latency reporting.
 *
 * A successful response goes through the parser and the quality filter
 * before it is returned, so callers only ever see cleaned records.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import {
  CURRENT_WINDOW_HOURS,
  ELEXON_API_BASE_URL,
  ELEXON_USER_AGENT,
  FETCH_RETRY_ATTEMPTS,
  FETCH_TIMEOUT_MS,
  MIN_TOTAL_GENERATION_MW,
} from '../config.js';
import { addUtcHours, formatUtcSeconds, isValidDate } from '../lib/dateUtils.js';
import { FetchExhaustedError, InvalidRangeError, TransportError, isAbortError, isRetryableFetchError } from '../lib/errors.js';
import { sleepWithAbort, type SleepFn } from '../lib/sleep.js';
import logger, { errorMessage, type Logger } from '../logger.js';
import { parseGenerationBody, type GenerationRecord } from './generationParser.js';
import { noopMetricsTracker, type GenerationMetricsTracker } from './metricsService.js';
import { applyQualityFilter } from './qualityFilter.js';

export const GENERATION_PER_TYPE_PATH = '/generation/actual/per-type';

// ---------------------------------------------------------------------------
// Request building
// ---------------------------------------------------------------------------

export interface GenerationQuery {
  from: string;
  to: string;
}

/** Query bounds for a window; both ends are formatted `YYYY-MM-DDTHH:MM:SSZ`. */
export function buildGenerationQuery(start: Date, end: Date): GenerationQuery {
  if (!isValidDate(start) || !isValidDate(end)) {
    throw new InvalidRangeError(start, end, 'start and end must be valid dates');
  }
  if (Math.floor(start.getTime() / 1000) >= Math.floor(end.getTime() / 1000)) {
    throw new InvalidRangeError(start, end);
  }
  return { from: formatUtcSeconds(start), to: formatUtcSeconds(end) };
}

export function buildElexonUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | undefined | null> = {},
): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

/** Delay after failed attempt `attempt` (0-indexed): 1s, 2s, 4s, … with no cap. */
export function getRetryBackoffMs(attempt: number): number {
  return 1000 * 2 ** Math.max(0, Math.floor(attempt));
}

// ---------------------------------------------------------------------------
// HTTP session
// ---------------------------------------------------------------------------

export interface HttpResponseLike {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type HttpGet = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSession {
  get: HttpGet;
  close(): Promise<void>;
}

/** One keep-alive connection pool shared by every request of a client. */
export function createHttpSession(): HttpSession {
  const agent = new Agent({ keepAliveTimeout: 10_000, keepAliveMaxTimeout: 60_000 });
  return {
    get: (url, init) => undiciFetch(url, { ...init, dispatcher: agent }),
    close: () => agent.close(),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ElexonClientOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  minTotalGenerationMw?: number;
  logger?: Logger;
  metricsTracker?: GenerationMetricsTracker;
  _deps?: {
    session?: HttpSession;
    sleep?: SleepFn;
    now?: () => number;
  };
}

export class ElexonGenerationClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly minTotalGenerationMw: number;
  private readonly log: Logger;
  private readonly metricsTracker: GenerationMetricsTracker;
  private readonly session: HttpSession;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(options: ElexonClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? ELEXON_API_BASE_URL;
    this.headers = {
      'User-Agent': options.userAgent ?? ELEXON_USER_AGENT,
      Accept: 'application/json',
    };
    this.timeoutMs = Math.max(1, Number(options.timeoutMs) || FETCH_TIMEOUT_MS);
    this.maxAttempts = Math.max(1, Math.floor(Number(options.maxAttempts) || FETCH_RETRY_ATTEMPTS));
    this.minTotalGenerationMw = options.minTotalGenerationMw ?? MIN_TOTAL_GENERATION_MW;
    this.log = options.logger ?? logger.child({ module: 'elexon-api' });
    this.metricsTracker = options.metricsTracker ?? noopMetricsTracker;
    this.session = options._deps?.session ?? createHttpSession();
    this.sleep = options._deps?.sleep ?? sleepWithAbort;
    this.now = options._deps?.now ?? (() => performance.now());
  }

  /**
   * Fetches, parses and quality-filters one window.
   *
   * Transport failures and non-2xx statuses are retried up to `maxAttempts`
   * times in total, then surface as FetchExhaustedError. A malformed 2xx body
   * throws MalformedRecordError at once without using up attempts.
   */
  async fetchWindow(start: Date, end: Date, maxAttempts: number = this.maxAttempts): Promise<GenerationRecord[]> {
    const query = buildGenerationQuery(start, end);
    const attempts = Math.max(1, Math.floor(Number(maxAttempts) || 1));
    const url = buildElexonUrl(this.baseUrl, GENERATION_PER_TYPE_PATH, { from: query.from, to: query.to });
    const label = `generation ${query.from} → ${query.to}`;
    this.log.info({ from: query.from, to: query.to }, `Fetching generation data from ${query.from} to ${query.to}`);

    let lastError: unknown = null;
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      let body: string;
      try {
        body = await this.requestOnce(url, label, attempt + 1);
      } catch (err: unknown) {
        if (!isRetryableFetchError(err)) throw err;
        lastError = err;
        this.log.warn({ attempt: attempt + 1, attempts, httpStatus: err.httpStatus }, `Attempt ${attempt + 1} failed: ${err.message}`);
        if (attempt < attempts - 1) {
          await this.sleep(getRetryBackoffMs(attempt));
        }
        continue;
      }

      const records = parseGenerationBody(body);
      this.log.info({ records: records.length }, `Successfully fetched ${records.length} records`);
      return applyQualityFilter(records, {
        minTotalGenerationMw: this.minTotalGenerationMw,
        logger: this.log,
        metricsTracker: this.metricsTracker,
      });
    }

    throw new FetchExhaustedError(label, attempts, lastError);
  }

  /** The most recent `CURRENT_WINDOW_HOURS` (24h by default) ending at `now`. */
  fetchCurrentGeneration(now: Date = new Date(), windowHours: number = CURRENT_WINDOW_HOURS): Promise<GenerationRecord[]> {
    return this.fetchWindow(addUtcHours(now, -windowHours), now);
  }

  close(): Promise<void> {
    return this.session.close();
  }

  private async requestOnce(url: string, label: string, attempt: number): Promise<string> {
    const controller = new AbortController();
    let timedOut: boolean = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const startedAt = this.now();
    let httpStatus: number | null = null;
    let ok: boolean = false;

    try {
      const resp = await this.session.get(url, { headers: this.headers, signal: controller.signal });
      httpStatus = resp.status;
      const text = await resp.text();
      if (!resp.ok) {
        const details = text.trim().slice(0, 180) || `HTTP ${resp.status}`;
        throw new TransportError(`${label} request failed (${resp.status}): ${details}`, { httpStatus: resp.status });
      }
      ok = true;
      return text;
    } catch (err: unknown) {
      if (err instanceof TransportError) throw err;
      if (timedOut) {
        throw new TransportError(`${label} request timed out after ${this.timeoutMs}ms`, {
          httpStatus,
          timedOut: true,
          cause: err,
        });
      }
      if (isAbortError(err)) {
        throw new TransportError(`${label} request aborted: ${errorMessage(err)}`, { httpStatus, cause: err });
      }
      throw new TransportError(`${label} request failed: ${errorMessage(err)}`, { httpStatus, cause: err });
    } finally {
      clearTimeout(timeout);
      const latencyMs = this.now() - startedAt;
      this.log.info(
        { attempt, latencyMs: Math.round(latencyMs * 100) / 100, status: httpStatus },
        `API request completed in ${latencyMs.toFixed(2)}ms - Status: ${httpStatus ?? 'no response'}`,
      );
      this.metricsTracker.recordApiCall({ label, attempt, latencyMs, ok, httpStatus, timedOut });
    }
  }
}
