/**
 * Trace and span identifiers.
 *
 * Trace ids are 128-bit and span ids 64-bit, both carried as lowercase hex.
 * An all-zero id is invalid.
 */

import { randomBytes } from 'node:crypto';
import { INVALID_SPANID, INVALID_TRACEID, isValidSpanId, isValidTraceId } from '@opentelemetry/api';

export const TRACE_ID_BYTES = 16;
export const SPAN_ID_BYTES = 8;

export const INVALID_TRACE_ID = INVALID_TRACEID;
export const INVALID_SPAN_ID = INVALID_SPANID;

export { isValidTraceId, isValidSpanId };

function randomHex(size: number, invalid: string): string {
  let id = invalid;
  while (id === invalid) {
    id = randomBytes(size).toString('hex');
  }
  return id;
}

export function generateTraceId(): string {
  return randomHex(TRACE_ID_BYTES, INVALID_TRACE_ID);
}

export function generateSpanId(): string {
  return randomHex(SPAN_ID_BYTES, INVALID_SPAN_ID);
}
