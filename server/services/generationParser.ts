/**
 * Flattens the nested per-period / per-fuel-type payload of
 * `generation/actual/per-type` into GenerationRecord rows.
 */

import { GenerationPerTypeResponseSchema, checkApiResponse } from '../lib/apiSchemas.js';
import { MalformedRecordError } from '../lib/errors.js';

export interface GenerationRecord {
  /** Settlement-period start, UTC. */
  timestamp: Date;
  fuelType: string;
  generationMw: number;
}

/** Parses raw response text; an empty or non-JSON body is malformed. */
export function parseGenerationBody(text: string): GenerationRecord[] {
  if (!text.trim()) {
    throw new MalformedRecordError('Generation response body is empty');
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err: unknown) {
    throw new MalformedRecordError('Generation response body is not valid JSON', [], { cause: err });
  }
  return parseGenerationPayload(payload);
}

/**
 * Validates the whole payload first, then flattens it. Output is ordered by
 * timestamp ascending; records of one period keep their payload order.
 */
export function parseGenerationPayload(payload: unknown): GenerationRecord[] {
  const checked = checkApiResponse(GenerationPerTypeResponseSchema, payload);
  if (!checked.ok) {
    throw new MalformedRecordError('Generation response failed validation', checked.issues);
  }

  const records: GenerationRecord[] = [];
  for (const period of checked.data.data) {
    const timestamp = new Date(Date.parse(period.startTime));
    for (const entry of period.data) {
      records.push({ timestamp, fuelType: entry.psrType, generationMw: entry.quantity });
    }
  }

  // Array.prototype.sort is stable, so same-timestamp records keep entry order.
  return records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}
