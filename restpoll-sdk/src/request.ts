/**
 * Request Builder
 *
 * A fluent builder for one REST call. Configuration methods return `this`;
 * `do()` performs the exchange and, when the server reports a running
 * operation, polls it to completion through the installed poller.
 *
 * @example
 * ```typescript
 * const result = await client
 *   .get()
 *   .namespace('staging')
 *   .resource('pods')
 *   .selectorParam('labels', 'area=staging')
 *   .timeout(10_000)
 *   .do<PodList>();
 *
 * if (result.state === 'complete') {
 *   console.log(result.object.items);
 * }
 * ```
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Codec } from './codec';
import {
  DecodeError,
  RequestBuildError,
  StatusError,
  TransportError,
  UnexpectedStatusError,
} from './errors';
import { silentLogger, type Logger } from './logger';
import { isStatus, operationIdOf } from './types';
import type { QueryValue, RequestBody, RequestResult, Status } from './types';

/**
 * What a poller decided for an operation.
 *
 * `request` is the next status check to issue; it is only used when `poll` is true.
 */
export interface PollDecision {
  request: Request | null;
  poll: boolean;
}

/**
 * Decides, given an operation name, whether and how to check on it again.
 */
export type PollFunc = (name: string) => Promise<PollDecision>;

/**
 * Values a client seeds every request with
 */
export interface RequestSettings {
  transport: AxiosInstance;
  verb: string;
  baseUrl: URL;
  codec: Codec;
  /** Send the namespace as a `namespace` query parameter instead of a path segment */
  namespaceInQuery: boolean;
  /** Keep resource names as given instead of lower-casing them */
  preserveResourceCase: boolean;
  logger?: Logger;
}

export class Request {
  private readonly transport: AxiosInstance;
  private readonly verb: string;
  private readonly baseUrl: URL;
  private readonly codec: Codec;
  private readonly namespaceInQuery: boolean;
  private readonly preserveResourceCase: boolean;
  private readonly logger: Logger;

  private _namespace?: string;
  private _resource?: string;
  private _name?: string;
  private readonly _suffix: string[] = [];
  private readonly _path: string[] = [];
  private readonly _params: Array<[string, string]> = [];
  private _body?: string | Uint8Array;
  private _poller?: PollFunc;
  private _sync = false;
  private _timeout = 0;

  private err?: RequestBuildError;
  private consumed = false;

  constructor(settings: RequestSettings) {
    this.transport = settings.transport;
    this.verb = settings.verb;
    this.baseUrl = new URL(settings.baseUrl.href);
    this.codec = settings.codec;
    this.namespaceInQuery = settings.namespaceInQuery;
    this.preserveResourceCase = settings.preserveResourceCase;
    this.logger = settings.logger ?? silentLogger;
  }

  // -- Configuration -------------------------------------------------------

  /**
   * Scope the request to a namespace. An empty namespace means "all namespaces"
   * and adds nothing to the URL.
   */
  namespace(namespace: string): this {
    if (this.err) return this;
    if (this._namespace !== undefined) {
      return this.fail(`namespace already set to "${this._namespace}", cannot change to "${namespace}"`);
    }
    if (namespace.includes('/')) {
      return this.fail(`invalid namespace "${namespace}": may not contain "/"`);
    }
    this._namespace = namespace;
    if (this.namespaceInQuery && namespace) {
      this._params.push(['namespace', namespace]);
    }
    return this;
  }

  resource(resource: string): this {
    if (this.err) return this;
    if (this._resource !== undefined) {
      return this.fail(`resource already set to "${this._resource}", cannot change to "${resource}"`);
    }
    const problem = segmentProblem(resource);
    if (problem) return this.fail(`invalid resource "${resource}": ${problem}`);
    this._resource = this.preserveResourceCase ? resource : resource.toLowerCase();
    return this;
  }

  name(name: string): this {
    if (this.err) return this;
    if (this._name !== undefined) {
      return this.fail(`name already set to "${this._name}", cannot change to "${name}"`);
    }
    const problem = segmentProblem(name);
    if (problem) return this.fail(`invalid name "${name}": ${problem}`);
    this._name = name;
    return this;
  }

  /** Append sub-resource segments after the name, e.g. `suffix('status')` */
  suffix(...segments: string[]): this {
    if (this.err) return this;
    this._suffix.push(...splitSegments(segments));
    return this;
  }

  /** Append raw path segments after everything else */
  path(...segments: string[]): this {
    if (this.err) return this;
    this._path.push(...splitSegments(segments));
    return this;
  }

  param(key: string, value: QueryValue): this {
    if (this.err) return this;
    this._params.push([key, String(value)]);
    return this;
  }

  /** Add a label selector, e.g. `selectorParam('labels', 'area=staging')`. Empty selectors are skipped. */
  selectorParam(key: string, selector: string): this {
    if (this.err) return this;
    const trimmed = selector.trim();
    if (!trimmed) return this;
    this._params.push([key, trimmed]);
    return this;
  }

  body(body: RequestBody): this {
    if (this.err) return this;
    if (typeof body === 'string') {
      this._body = body;
      return this;
    }
    if (body instanceof Uint8Array) {
      // axios sends a view's whole backing buffer; copy to the view's own bytes
      this._body = body.slice();
      return this;
    }
    try {
      this._body = this.codec.encode(body);
    } catch (error) {
      return this.fail(`unable to encode request body: ${messageOf(error)}`);
    }
    return this;
  }

  poller(poller: PollFunc): this {
    this._poller = poller;
    return this;
  }

  /** Never poll, even when the server reports a running operation */
  noPoll(): this {
    this._poller = undefined;
    return this;
  }

  /** Ask the server to wait for completion before answering */
  sync(sync: boolean): this {
    this._sync = sync;
    return this;
  }

  /** Request timeout in milliseconds; 0 leaves the transport's default in place */
  timeout(timeout: number): this {
    this._timeout = timeout;
    return this;
  }

  // -- Inspection ----------------------------------------------------------

  get method(): string {
    return this.verb;
  }

  get isSync(): boolean {
    return this._sync;
  }

  get timeoutMs(): number {
    return this._timeout;
  }

  get pollFunc(): PollFunc | undefined {
    return this._poller;
  }

  /**
   * Final URL of the request
   */
  url(): string {
    const segments: string[] = [];
    if (this._namespace && !this.namespaceInQuery) {
      segments.push('ns', this._namespace);
    }
    if (this._resource) segments.push(this._resource);
    if (this._name) segments.push(this._name);
    segments.push(...this._suffix, ...this._path);

    const target = new URL(this.baseUrl.href);
    target.pathname = target.pathname + segments.map(encodeURIComponent).join('/');

    const params: Array<[string, string]> = [...this._params];
    if (this._sync) {
      params.push(['sync', 'true']);
      if (this._timeout > 0) {
        params.push(['timeout', `${this._timeout}ms`]);
      }
    }
    for (const [key, value] of params) {
      target.searchParams.append(key, value);
    }
    return target.toString();
  }

  // -- Execution -----------------------------------------------------------

  /**
   * Send the request and follow the operation it starts, if any.
   *
   * Resolves with the decoded object, or with the last `Working` status when
   * sync mode is on or polling stops. Rejects with the first error any
   * request in the chain produced.
   */
  async do<T = unknown>(): Promise<RequestResult<T>> {
    let current: Request = this;
    for (;;) {
      const result = await current.execute<T>();
      if (result.state === 'complete') {
        return result;
      }
      const next = await current.nextPoll(result.status);
      if (!next) {
        return result;
      }
      current = next;
    }
  }

  private async execute<T>(): Promise<RequestResult<T>> {
    if (this.err) throw this.err;
    if (this.consumed) {
      throw new RequestBuildError('request has already been sent; build a new one');
    }
    this.consumed = true;

    const url = this.url();
    this.logger.debug(`${this.verb} ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.transport.request<unknown>({
        method: this.verb,
        url,
        data: this._body,
        headers: this._body === undefined ? undefined : { 'Content-Type': this.codec.contentType },
        timeout: this._timeout > 0 ? this._timeout : undefined,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TransportError(`${this.verb} ${url} failed: ${error.message}`, error);
      }
      throw error;
    }

    this.logger.debug(`${this.verb} ${url} -> ${response.status}`);
    return this.transformResponse<T>(response.status, bodyText(response.data));
  }

  private transformResponse<T>(statusCode: number, body: string): RequestResult<T> {
    let decoded: unknown;
    let decodeFailed = false;
    let decodeMessage = '';
    if (body.length > 0) {
      try {
        decoded = this.codec.decode(body);
      } catch (error) {
        decodeFailed = true;
        decodeMessage = messageOf(error);
      }
    }
    const status = isStatus(decoded) ? decoded : undefined;

    if (statusCode < 200 || statusCode > 206) {
      if (status?.status === 'Working') {
        return { state: 'in-progress', status };
      }
      if (status) {
        throw new StatusError(status, statusCode);
      }
      throw new UnexpectedStatusError(statusCode, body);
    }

    if (decodeFailed) {
      throw new DecodeError(`unable to decode response body: ${decodeMessage}`, body, statusCode);
    }
    if (status?.status === 'Working') {
      return { state: 'in-progress', status };
    }
    if (status?.status === 'Failure') {
      throw new StatusError(status, statusCode);
    }
    return { state: 'complete', object: decoded as T, created: statusCode === 201 };
  }

  private async nextPoll(status: Status): Promise<Request | null> {
    if (this._sync || !this._poller) return null;
    const id = operationIdOf(status);
    if (!id) return null;
    const decision = await this._poller(id);
    if (!decision.poll || !decision.request) return null;
    return decision.request;
  }

  private fail(message: string): this {
    this.err = new RequestBuildError(message);
    return this;
  }
}

function segmentProblem(segment: string): string | undefined {
  if (!segment) return 'may not be empty';
  if (segment.includes('/')) return 'may not contain "/"';
  return undefined;
}

function splitSegments(segments: string[]): string[] {
  return segments.flatMap((segment) => segment.split('/')).filter((part) => part.length > 0);
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data instanceof Uint8Array) return new TextDecoder().decode(data);
  return '';
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
