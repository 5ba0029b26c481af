/**
 * Status Types
 *
 * The server answers failed calls, and calls that are still running, with a
 * `Status` object instead of the requested resource.
 */

/**
 * Outcome reported by a status object.
 *
 * - `Success`: the action finished
 * - `Failure`: the action failed; see `reason` and `message`
 * - `Working`: the action is still running as an operation named in `details.id`
 */
export type StatusValue = 'Success' | 'Failure' | 'Working';

export interface StatusDetails {
  /** Operation identifier, or the name of the affected resource */
  id?: string;
  /** Kind of the affected resource */
  kind?: string;
}

export interface Status {
  kind: 'Status';
  apiVersion?: string;
  status: StatusValue;
  /** Human-readable description */
  message?: string;
  /** Machine-readable reason, e.g. `NotFound` or `AlreadyExists` */
  reason?: string;
  /** Suggested HTTP status code */
  code?: number;
  details?: StatusDetails;
}

/**
 * Outcome of `Request.do()`.
 *
 * An `in-progress` result means the server reported a running operation and
 * polling was not performed or was stopped; `status` is the last one received.
 */
export type RequestResult<T> =
  | { state: 'complete'; object: T; created: boolean }
  | { state: 'in-progress'; status: Status };

const STATUS_VALUES: readonly string[] = ['Success', 'Failure', 'Working'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a decoded payload to a status object.
 *
 * Only objects with `kind: 'Status'` and a known `status` value qualify.
 */
export function isStatus(value: unknown): value is Status {
  if (!isRecord(value)) return false;
  if (value.kind !== 'Status') return false;
  return typeof value.status === 'string' && STATUS_VALUES.includes(value.status);
}

/**
 * Operation name carried by a `Working` status, if any.
 */
export function operationIdOf(status: Status): string | undefined {
  const id = status.details?.id;
  return id ? id : undefined;
}
