/**
 * Transport-level types.
 *
 * @module transport/types
 */

import type { Readable } from 'stream';
import type { Dispatcher } from 'undici';

/**
 * HTTP methods issued by the client.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Header name to value, names kept exactly as received.
 */
export type HeaderMap = Record<string, string>;

/**
 * Uniform response record returned by every verb call.
 *
 * A transport failure (no HTTP exchange took place) is reported with
 * `code === -1` and a diagnostic `body`; it is never thrown.
 *
 * @example
 * ```typescript
 * const response: HttpResponse = {
 *   code: 200,
 *   body: '{"id":42}',
 *   headers: { 'HTTP/1.1 200 OK': 'present', 'Content-Type': 'application/json' },
 * };
 * ```
 */
export interface HttpResponse {
  /** HTTP status code, or -1 on transport failure */
  readonly code: number;
  /** Response body decoded as UTF-8, or the failure diagnostic */
  readonly body: string;
  /** Response headers */
  readonly headers: Readonly<HeaderMap>;
}

/**
 * The part of an undici dispatcher the client needs. `Agent`, `Pool` and
 * `MockAgent` all satisfy it.
 */
export type RequestDispatcher = Pick<Dispatcher, 'dispatch'>;

/**
 * Request body handed to the transport.
 */
export type RequestBody = Buffer | Readable;

/**
 * A fully prepared request for one exchange.
 */
export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: RequestBody;
}

/**
 * Receives what the transport delivers during one exchange.
 */
export interface ExchangeSink {
  /** Called once per raw header line, status line first */
  onHeaderLine(line: string): number;
  /** Called once per body chunk, in arrival order */
  onBodyChunk(chunk: Uint8Array): number;
}
