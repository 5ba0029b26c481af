/**
 * HTTP Transport
 *
 * Builds the axios instance requests are sent through, with authentication
 * and default headers applied.
 */

import axios, { type AxiosInstance } from 'axios';
import { ConfigurationError } from './errors';

export interface TransportConfig {
  /** Bearer token sent as `Authorization: Bearer <token>` */
  bearerToken?: string;
  /** Basic auth credentials; takes precedence over the bearer token */
  username?: string;
  password?: string;
  /** Transport-wide timeout in milliseconds (0 = none). Request timeouts override it. */
  timeout?: number;
  /** Custom headers to include in all requests */
  headers?: Record<string, string>;
}

/**
 * Create an axios instance for a REST client.
 *
 * The instance carries no base URL: requests always send absolute URLs built
 * from the client's base address.
 */
export function createTransport(config: TransportConfig = {}): AxiosInstance {
  const hasUser = config.username !== undefined;
  const hasPassword = config.password !== undefined;
  if (hasUser !== hasPassword) {
    throw new ConfigurationError('Basic auth requires both username and password');
  }

  const headers: Record<string, string> = { ...config.headers };
  if (config.bearerToken && !hasUser) {
    headers.Authorization = `Bearer ${config.bearerToken}`;
  }

  return axios.create({
    timeout: config.timeout ?? 0,
    headers,
    auth:
      config.username !== undefined && config.password !== undefined
        ? { username: config.username, password: config.password }
        : undefined,
  });
}
