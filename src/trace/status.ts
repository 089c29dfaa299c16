/**
 * Canonical status codes
 *
 * The code set shared by RPC systems: 0 is success, 1-16 are failure kinds.
 */

export enum StatusCode {
  OK = 0,
  CANCELLED = 1,
  UNKNOWN = 2,
  INVALID_ARGUMENT = 3,
  DEADLINE_EXCEEDED = 4,
  NOT_FOUND = 5,
  ALREADY_EXISTS = 6,
  PERMISSION_DENIED = 7,
  RESOURCE_EXHAUSTED = 8,
  FAILED_PRECONDITION = 9,
  ABORTED = 10,
  OUT_OF_RANGE = 11,
  UNIMPLEMENTED = 12,
  INTERNAL = 13,
  UNAVAILABLE = 14,
  DATA_LOSS = 15,
  UNAUTHENTICATED = 16,
}

export interface Status {
  readonly code: StatusCode;
  readonly message: string;
}

export const OK_STATUS: Status = Object.freeze({ code: StatusCode.OK, message: '' });

/**
 * Name of a status code, e.g. `NOT_FOUND`. Unknown numbers map to `UNKNOWN`.
 */
export function statusCodeName(code: StatusCode): string {
  return StatusCode[code] ?? 'UNKNOWN';
}

export function isOk(status: Status): boolean {
  return status.code === StatusCode.OK;
}
