/**
 * The transport handle: one undici dispatcher driving one exchange at a time.
 *
 * @module transport/handle
 */

import { Agent, type Dispatcher } from 'undici';
import { TransportInitializationError } from '../errors/index.js';
import { UnsupportedProtocolError } from './diagnostics.js';
import type { ExchangeSink, PreparedRequest, RequestDispatcher } from './types.js';

/**
 * Options for creating a transport handle.
 */
export interface TransportHandleOptions {
  connectTimeoutMs: number;
  headersTimeoutMs: number;
  bodyTimeoutMs: number;
  /** Borrowed dispatcher; when absent the handle creates and owns an Agent */
  dispatcher?: RequestDispatcher;
}

/**
 * Wraps a dispatcher and runs exchanges through raw dispatch callbacks, so
 * header lines and body chunks reach the sink as the transport delivers them.
 *
 * The handle keeps no per-request state: everything an exchange needs lives
 * in the `perform` call, and is gone when it settles.
 */
export class TransportHandle {
  private readonly dispatcher: RequestDispatcher;
  private readonly owned?: Agent;
  private closed = false;

  /**
   * @throws {TransportInitializationError} If the agent cannot be created.
   */
  constructor(options: TransportHandleOptions) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      return;
    }

    try {
      this.owned = new Agent({
        connections: 1,
        connect: { timeout: options.connectTimeoutMs },
        headersTimeout: options.headersTimeoutMs,
        bodyTimeout: options.bodyTimeoutMs,
      });
    } catch (error) {
      throw new TransportInitializationError(error);
    }
    this.dispatcher = this.owned;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Runs one exchange.
   *
   * The status line is delivered to the sink first as `HTTP/1.1 <code> <text>`,
   * followed by one `Name: value` line per received header, then the body
   * chunks in order.
   *
   * @returns The HTTP status code.
   * @throws The transport's error when no complete exchange took place.
   */
  perform(request: PreparedRequest, sink: ExchangeSink): Promise<number> {
    let target: URL;
    try {
      target = new URL(request.url);
    } catch (error) {
      return Promise.reject(error);
    }
    if (target.protocol !== 'http:' && target.protocol !== 'https:') {
      return Promise.reject(new UnsupportedProtocolError(target.protocol));
    }

    return new Promise<number>((resolve, reject) => {
      let statusCode = 0;
      let settled = false;

      const fail = (error: Error): void => {
        if (!settled) {
          settled = true;
          reject(error);
        }
      };

      const handler: Dispatcher.DispatchHandlers = {
        onConnect: () => undefined,
        onError: fail,
        onHeaders: (status, rawHeaders, _resume, statusText) => {
          statusCode = status;
          sink.onHeaderLine(`HTTP/1.1 ${status} ${statusText}`);
          for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
            sink.onHeaderLine(`${decodeHeaderPart(rawHeaders[i])}: ${decodeHeaderPart(rawHeaders[i + 1])}`);
          }
          return true;
        },
        onData: (chunk) => {
          sink.onBodyChunk(chunk);
          return true;
        },
        onComplete: () => {
          if (!settled) {
            settled = true;
            resolve(statusCode);
          }
        },
      };

      try {
        this.dispatcher.dispatch(
          {
            origin: target.origin,
            path: `${target.pathname}${target.search}`,
            method: request.method,
            headers: request.headers,
            body: request.body,
          },
          handler
        );
      } catch (error) {
        fail(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  /**
   * Releases the handle. Idempotent; a borrowed dispatcher is left open.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.owned) {
      await this.owned.close();
    }
  }
}

function decodeHeaderPart(part: Buffer | string): string {
  return typeof part === 'string' ? part : part.toString('latin1');
}
