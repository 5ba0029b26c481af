/**
 * Client Configuration
 *
 * Zod schema for REST client settings and a factory that turns validated
 * settings into a ready `RESTClient`.
 */

import { z } from 'zod';
import { RESTClient, DEFAULT_POLL_PERIOD_MS } from './client';
import type { Codec } from './codec';
import { ConfigurationError } from './errors';
import { createTransport } from './http';
import type { Logger } from './logger';
import type { PollFunc } from './request';

/** API versions that use the legacy URL conventions */
export const LEGACY_VERSIONS = ['v1beta1', 'v1beta2'] as const;

export const DEFAULT_PREFIX = '/api';
export const DEFAULT_VERSION = 'v1beta1';

const durationMs = z.number().int().nonnegative();

export const restConfigSchema = z
  .object({
    host: z.string().url(),
    prefix: z.string().default(DEFAULT_PREFIX),
    version: z.string().min(1).default(DEFAULT_VERSION),
    legacyBehavior: z.boolean().optional(),
    sync: z.boolean().default(false),
    pollPeriod: durationMs.default(DEFAULT_POLL_PERIOD_MS),
    timeout: durationMs.default(0),
    bearerToken: z.string().min(1).optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    headers: z.record(z.string()).optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if ((config.username === undefined) !== (config.password === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['username'],
        message: 'username and password must be set together',
      });
    }
  });

/** Settings as callers write them */
export type RestConfigInput = z.input<typeof restConfigSchema>;

/** Settings with defaults applied */
export type RestConfig = z.output<typeof restConfigSchema>;

export interface RestClientOptions {
  codec?: Codec;
  logger?: Logger;
  poller?: PollFunc;
}

/**
 * Whether an API version uses the legacy URL conventions
 */
export function isLegacyVersion(version: string): boolean {
  return LEGACY_VERSIONS.some((legacy) => legacy === version);
}

/**
 * Validate settings and apply defaults. Throws `ConfigurationError` listing
 * every problem found.
 */
export function parseRestConfig(input: unknown): RestConfig {
  const result = restConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid REST client configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Base URL of the API: `<host><prefix>/<version>/`
 */
export function baseUrlFor(config: Pick<RestConfig, 'host' | 'prefix' | 'version'>): URL {
  const url = new URL(config.host);
  const hostPath = url.pathname.replace(/\/+$/, '');
  const prefix = config.prefix.replace(/^\/+|\/+$/g, '');
  const parts = [hostPath, prefix, config.version].filter((part) => part.length > 0);
  url.pathname = `${parts.join('/').replace(/^\/*/, '/')}/`;
  url.search = '';
  url.hash = '';
  return url;
}

/**
 * Create a `RESTClient` from settings.
 *
 * @example
 * ```typescript
 * const client = restClientFor({
 *   host: 'https://cluster.example.test',
 *   version: 'v1beta3',
 *   bearerToken: process.env.API_TOKEN,
 *   pollPeriod: 500,
 * });
 * ```
 */
export function restClientFor(input: RestConfigInput, options: RestClientOptions = {}): RESTClient {
  const config = parseRestConfig(input);
  const legacyBehavior = config.legacyBehavior ?? isLegacyVersion(config.version);

  const client = new RESTClient(baseUrlFor(config), config.version, options.codec, legacyBehavior);
  client.transport = createTransport({
    bearerToken: config.bearerToken,
    username: config.username,
    password: config.password,
    headers: config.headers,
  });
  client.sync = config.sync;
  client.pollPeriod = config.pollPeriod;
  client.timeout = config.timeout;
  if (options.logger) client.logger = options.logger;
  if (options.poller) client.poller = options.poller;
  return client;
}
