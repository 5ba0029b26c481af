/**
 * REST Client
 *
 * Imposes common API conventions on a set of resource paths. The base URL
 * points at an HTTP or HTTPS path that is the parent of one or more resources.
 * The server answers with a decodable resource, or with a `Status` object
 * describing a failure or an operation that is still running.
 */

import type { AxiosInstance } from 'axios';
import { jsonCodec, type Codec } from './codec';
import { ConfigurationError } from './errors';
import { createTransport } from './http';
import { consoleLogger, type Logger } from './logger';
import { Request, type PollFunc, type PollDecision } from './request';

/** Default delay between checks on a running operation */
export const DEFAULT_POLL_PERIOD_MS = 2000;

/**
 * REST client
 *
 * Hands out one `Request` per call, seeded with the client's configuration.
 * The public fields may be changed between calls; changing them while calls
 * are in flight is not supported.
 *
 * @example
 * ```typescript
 * const client = new RESTClient('https://api.example.test/api/v1', 'v1');
 *
 * const result = await client.post().resource('jobs').body({ name: 'nightly' }).do<Job>();
 * if (result.state === 'in-progress') {
 *   console.log('still running:', result.status.details?.id);
 * }
 * ```
 */
export class RESTClient {
  private readonly base: URL;
  private readonly version: string;

  /**
   * Send namespaces as a query parameter and keep resource case, for older
   * API versions. Newer clients leave this false.
   */
  legacyBehavior: boolean;

  /** Encoding and decoding scheme for request and response bodies */
  codec: Codec;

  /** axios instance requests are sent through */
  transport: AxiosInstance;

  /** Poller override; `defaultPoll` is used when unset */
  poller?: PollFunc;

  /** Ask the server to finish work before answering instead of returning an operation */
  sync: boolean;

  /** Delay between operation checks in milliseconds; 0 (or any non-positive value) disables polling */
  pollPeriod: number;

  /** Request timeout in milliseconds; 0 leaves the transport's default in place */
  timeout: number;

  /** Receives poll waits at info level and per-request traces at debug level */
  logger: Logger;

  /**
   * Create a client for the resources under `baseUrl`.
   *
   * The address is copied, given a trailing slash and stripped of query and
   * fragment. Throws `ConfigurationError` when it is not an absolute HTTP(S) URL.
   */
  constructor(baseUrl: string | URL, apiVersion: string, codec: Codec = jsonCodec, legacyBehavior = false) {
    this.base = normalizeBaseUrl(baseUrl);
    this.version = apiVersion;

    this.codec = codec;
    this.legacyBehavior = legacyBehavior;
    this.transport = createTransport();
    this.logger = consoleLogger;

    // Make asynchronous requests by default
    this.sync = false;
    this.pollPeriod = DEFAULT_POLL_PERIOD_MS;
    this.timeout = 0;
  }

  /**
   * Begin a request with a verb (GET, POST, PUT, DELETE)
   */
  verb(verb: string): Request {
    return new Request({
      transport: this.transport,
      verb,
      baseUrl: this.base,
      codec: this.codec,
      namespaceInQuery: this.legacyBehavior,
      preserveResourceCase: this.legacyBehavior,
      logger: this.logger,
    })
      .poller(this.poller ?? this.defaultPoll)
      .sync(this.sync)
      .timeout(this.timeout);
  }

  post(): Request {
    return this.verb('POST');
  }

  put(): Request {
    return this.verb('PUT');
  }

  get(): Request {
    return this.verb('GET');
  }

  delete(): Request {
    return this.verb('DELETE');
  }

  /**
   * A single check on the given operation. It never waits on the server and
   * never polls by itself.
   */
  operation(name: string): Request {
    return this.get().resource('operations').name(name).sync(false).noPoll();
  }

  /**
   * Built-in poller: waits `pollPeriod` and then checks the operation again,
   * installing itself as the poller of that check.
   */
  readonly defaultPoll: PollFunc = async (name: string): Promise<PollDecision> => {
    if (!(this.pollPeriod > 0)) {
      return { request: null, poll: false };
    }
    this.logger.info(`Waiting for completion of operation ${name}`);
    await sleep(this.pollPeriod);
    return { request: this.operation(name).poller(this.defaultPoll), poll: true };
  };

  /**
   * The API version this client is expected to use
   */
  apiVersion(): string {
    return this.version;
  }

  /**
   * A copy of the normalized base URL
   */
  baseURL(): URL {
    return new URL(this.base.href);
  }
}

function normalizeBaseUrl(raw: string | URL): URL {
  let base: URL;
  try {
    base = new URL(typeof raw === 'string' ? raw : raw.href);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid base URL "${String(raw)}"`, [reason]);
  }
  if (base.protocol !== 'http:' && base.protocol !== 'https:') {
    throw new ConfigurationError(`Invalid base URL "${base.href}": scheme must be http or https`);
  }
  if (!base.pathname.endsWith('/')) {
    base.pathname += '/';
  }
  base.search = '';
  base.hash = '';
  return base;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
