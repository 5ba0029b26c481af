/**
 * Type Exports
 */

export type { QueryValue, RequestBody } from './common';
export type { Status, StatusDetails, StatusValue, RequestResult } from './status';
export { isStatus, operationIdOf } from './status';
