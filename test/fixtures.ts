import type { GenerationRecord } from '../server/services/generationParser.js';
import type { HttpResponseLike, HttpSession } from '../server/services/elexonApi.js';

export function period(startTime: string, entries: Array<[string, number]>) {
  return {
    startTime,
    settlementPeriod: 1,
    data: entries.map(([psrType, quantity]) => ({ psrType, quantity })),
  };
}

/** One complete period (30000 MW over 3 fuel types) and one partial one (10000 MW over 2). */
export function mixedQualityPayload() {
  return {
    data: [
      period('2024-03-01T00:00:00Z', [
        ['Fossil Gas', 15000],
        ['Wind Onshore', 10000],
        ['Nuclear', 5000],
      ]),
      period('2024-03-01T00:30:00Z', [
        ['Wind Onshore', 6000],
        ['Solar', 4000],
      ]),
    ],
  };
}

export function record(timestamp: string, fuelType: string, generationMw: number): GenerationRecord {
  return { timestamp: new Date(timestamp), fuelType, generationMw };
}

export function jsonResponse(body: unknown, status = 200): HttpResponseLike {
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

export interface FakeSession extends HttpSession {
  calls: Array<{ url: string; headers: Record<string, string> }>;
}

/** Replays `responses` in order, repeating the last one; an Error entry is thrown as a transport failure. */
export function fakeSession(responses: Array<HttpResponseLike | Error>): FakeSession {
  const calls: FakeSession['calls'] = [];
  return {
    calls,
    get: async (url, init) => {
      calls.push({ url, headers: init.headers });
      const next = responses[Math.min(calls.length - 1, responses.length - 1)];
      if (next instanceof Error) throw next;
      return next;
    },
    close: async () => {},
  };
}

/** pino-compatible destination that keeps each JSON line. */
export function captureStream() {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    write(msg: string) {
      lines.push(JSON.parse(msg) as Record<string, unknown>);
    },
  };
}
