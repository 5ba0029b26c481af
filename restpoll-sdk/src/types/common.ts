/**
 * Common Types
 *
 * Shared types used across the SDK.
 */

/**
 * Values accepted as query parameters.
 */
export type QueryValue = string | number | boolean;

/**
 * Request payloads accepted by `Request.body()`.
 *
 * Strings and byte arrays are sent as-is; anything else goes through the codec.
 */
export type RequestBody = string | Uint8Array | Record<string, unknown> | unknown[];
