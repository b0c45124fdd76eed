/**
 * REST JSON HTTP client.
 *
 * One client owns one transport handle and runs one request on it at a time.
 * Every verb resolves to an {@link HttpResponse}; transport failures come back
 * as `code === -1` with a diagnostic body instead of being thrown.
 *
 * @module client
 */

import {
  resolveConfig,
  type HttpClientConfig,
  type HttpClientOptions,
} from '../config/index.js';
import { ClientBusyError, ClientClosedError, JsonDecodeError } from '../errors/index.js';
import { defaultLogger, type Logger } from '../observability/index.js';
import { createUploadStream, ResponseBodySink, toBodyBytes, UploadCursor } from '../transport/body.js';
import { describeTransportFailure, TRANSPORT_FAILURE_CODE } from '../transport/diagnostics.js';
import { TransportHandle } from '../transport/handle.js';
import { HeaderAccumulator } from '../transport/headers.js';
import type {
  HeaderMap,
  HttpMethod,
  HttpResponse,
  PreparedRequest,
  RequestBody,
} from '../transport/types.js';
import { checkDjangoError } from '../tree/inspect.js';
import { PropertyTree } from '../tree/property-tree.js';

/** Content type used by {@link HttpClient.postPropertyTree}. */
export const FORM_URLENCODED = 'application/x-www-form-urlencoded';

const NO_HEADERS: Readonly<HeaderMap> = Object.freeze({});

/**
 * Request body accepted by POST and PUT. Strings are sent as UTF-8.
 */
export type BodyData = string | Uint8Array;

/**
 * HTTP client for a remote JSON API.
 *
 * @example
 * ```typescript
 * const client = new HttpClient({ userAgent: 'catalog-sync/2.3' });
 * client.setAuth('sync', 'test-secret');
 *
 * const tree = await client.getPropertyTree('https://api.example.com/items/');
 * if (!checkDjangoError(tree)) {
 *   console.log(tree.get('name'));
 * }
 *
 * await client.close();
 * ```
 */
export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly handle: TransportHandle;
  private readonly logger: Logger;
  private userPass = '';
  private inFlight?: string;

  /**
   * @throws {ConfigurationError} If the options are invalid.
   * @throws {TransportInitializationError} If the transport handle cannot be created.
   */
  constructor(options: HttpClientOptions = {}) {
    this.config = resolveConfig(options);
    this.logger = (this.config.logger ?? defaultLogger).child({ component: 'HttpClient' });
    this.handle = new TransportHandle({
      connectTimeoutMs: this.config.connectTimeoutMs,
      headersTimeoutMs: this.config.headersTimeoutMs,
      bodyTimeoutMs: this.config.bodyTimeoutMs,
      dispatcher: this.config.dispatcher,
    });

    if (this.config.credentials) {
      this.setAuth(this.config.credentials.username, this.config.credentials.password.expose());
    }
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  /**
   * Sends no credentials from the next request on.
   */
  clearAuth(): void {
    this.userPass = '';
  }

  /**
   * Sends `user:password` as basic auth with every request until changed.
   */
  setAuth(user: string, password: string): void {
    this.userPass = `${user}:${password}`;
  }

  get hasAuth(): boolean {
    return this.userPass.length > 0;
  }

  // ==========================================================================
  // Verbs
  // ==========================================================================

  async get(url: string): Promise<HttpResponse> {
    return this.execute('GET', url);
  }

  /**
   * POSTs exactly the bytes of `data`, embedded NULs included.
   */
  async post(url: string, contentType: string, data: BodyData): Promise<HttpResponse> {
    const bytes = toBodyBytes(data);
    return this.execute('POST', url, bytes, {
      'Content-Type': contentType,
      'Content-Length': String(bytes.byteLength),
    });
  }

  /**
   * PUTs `data`, streamed to the transport as it asks for it.
   */
  async put(url: string, contentType: string, data: BodyData): Promise<HttpResponse> {
    const cursor = new UploadCursor(toBodyBytes(data));
    return this.execute('PUT', url, createUploadStream(cursor), {
      'Content-Type': contentType,
      'Content-Length': String(cursor.size),
    });
  }

  async del(url: string): Promise<HttpResponse> {
    return this.execute('DELETE', url);
  }

  // ==========================================================================
  // JSON
  // ==========================================================================

  /**
   * GETs `url` and decodes the JSON body.
   *
   * A non-200 status is logged and comes back as a tree holding only
   * `error: "Status <code> when getting <url>"`; check the result with
   * {@link checkDjangoError}.
   *
   * @throws {JsonDecodeError} If a 200 body is not valid JSON.
   */
  async getPropertyTree(url: string): Promise<PropertyTree> {
    const response = await this.get(url);
    return this.parsePropertyTree(response, url);
  }

  /**
   * POSTs form-encoded `data` and decodes the JSON body, as
   * {@link getPropertyTree} does.
   */
  async postPropertyTree(url: string, data: BodyData): Promise<PropertyTree> {
    const response = await this.post(url, FORM_URLENCODED, data);
    return this.parsePropertyTree(response, url);
  }

  async putPropertyTree(url: string, contentType: string, data: BodyData): Promise<PropertyTree> {
    const response = await this.put(url, contentType, data);
    return this.parsePropertyTree(response, url);
  }

  async deletePropertyTree(url: string): Promise<PropertyTree> {
    const response = await this.del(url);
    return this.parsePropertyTree(response, url);
  }

  /**
   * {@link checkDjangoError} logging through this client's logger.
   */
  checkDjangoError(tree: PropertyTree | null | undefined): boolean {
    return checkDjangoError(tree, this.logger);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get isClosed(): boolean {
    return this.handle.isClosed;
  }

  get isBusy(): boolean {
    return this.inFlight !== undefined;
  }

  getConfig(): Readonly<HttpClientConfig> {
    return { ...this.config };
  }

  /**
   * Releases the transport handle. Idempotent.
   */
  async close(): Promise<void> {
    await this.handle.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async execute(
    method: HttpMethod,
    url: string,
    body?: RequestBody,
    extraHeaders: Record<string, string> = {}
  ): Promise<HttpResponse> {
    if (this.handle.isClosed) {
      throw new ClientClosedError(method, url);
    }
    if (this.inFlight !== undefined) {
      throw new ClientBusyError(method, url, this.inFlight);
    }
    this.inFlight = `${method} ${url}`;

    const request: PreparedRequest = {
      method,
      url,
      headers: { ...this.buildHeaders(), ...extraHeaders },
      body,
    };
    const headers = new HeaderAccumulator();
    const sink = new ResponseBodySink();

    this.logger.debug('Sending request', { method, url });

    try {
      const code = await this.handle.perform(request, {
        onHeaderLine: (line) => headers.push(line),
        onBodyChunk: (chunk) => sink.write(chunk),
      });

      this.logger.debug('Request completed', { method, url, code, bytes: sink.byteLength });

      return Object.freeze({
        code,
        body: sink.toString(),
        headers: Object.freeze(headers.toMap()),
      });
    } catch (error) {
      const diagnostic = describeTransportFailure(error);
      this.logger.warn('Request failed', { method, url, error: diagnostic });

      return Object.freeze({
        code: TRANSPORT_FAILURE_CODE,
        body: diagnostic,
        headers: NO_HEADERS,
      });
    } finally {
      this.inFlight = undefined;
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
    };
    if (this.userPass.length > 0) {
      headers['Authorization'] = `Basic ${Buffer.from(this.userPass, 'utf8').toString('base64')}`;
    }
    return headers;
  }

  private parsePropertyTree(response: HttpResponse, url: string): PropertyTree {
    if (response.code !== 200) {
      this.logger.error(`When trying url [${url}], received non-OK code ${response.code}`);
      const tree = new PropertyTree();
      tree.put('error', `Status ${response.code} when getting ${url}`);
      return tree;
    }

    try {
      return PropertyTree.fromJson(response.body);
    } catch (error) {
      this.logger.error(`error reading result of URL: ${url}`);
      this.logger.error(`response is: ${response.body}`);
      throw new JsonDecodeError(url, response.body, error);
    }
  }
}
