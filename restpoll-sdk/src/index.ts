/**
 * restpoll SDK
 *
 * REST client with verb-based request building and polling of long-running
 * server operations.
 *
 * @packageDocumentation
 */

// Main client
export { RESTClient, DEFAULT_POLL_PERIOD_MS } from './client';

// Request building
export { Request } from './request';
export type { PollFunc, PollDecision, RequestSettings } from './request';

// Configuration
export {
  restClientFor,
  parseRestConfig,
  baseUrlFor,
  isLegacyVersion,
  restConfigSchema,
  LEGACY_VERSIONS,
  DEFAULT_PREFIX,
  DEFAULT_VERSION,
} from './config';
export type { RestConfig, RestConfigInput, RestClientOptions } from './config';

// HTTP layer
export { createTransport } from './http';
export type { TransportConfig } from './http';

// Codec
export { jsonCodec } from './codec';
export type { Codec } from './codec';

// Logging
export { consoleLogger, silentLogger } from './logger';
export type { Logger, LogMeta } from './logger';

// Errors
export {
  RestClientError,
  ConfigurationError,
  RequestBuildError,
  TransportError,
  DecodeError,
  UnexpectedStatusError,
  StatusError,
  isStatusError,
  hasReason,
} from './errors';

// Types
export { isStatus, operationIdOf } from './types';
export type {
  QueryValue,
  RequestBody,
  Status,
  StatusDetails,
  StatusValue,
  RequestResult,
} from './types';
