/**
 * Scripted in-process dispatcher for client tests.
 *
 * Records every dispatched request (draining streamed bodies the way the
 * transport would) and answers with the next scripted reply through the same
 * handler callbacks undici uses.
 */

import { Readable } from 'stream';
import type { Dispatcher } from 'undici';
import type { RequestDispatcher } from '../../transport/types.js';

export interface ScriptedReply {
  status?: number;
  statusText?: string;
  /** Raw header pairs, in wire order */
  headers?: Array<[string, string]>;
  /** Body chunks, delivered one onData call each */
  chunks?: Array<string | Uint8Array>;
  /** Fail the exchange instead of answering */
  error?: Error;
  /** Hold the reply until this settles */
  gate?: Promise<void>;
}

export interface RecordedRequest {
  origin: string;
  path: string;
  method: string;
  headers: Record<string, string>;
  body?: Buffer;
  /** Sizes of the chunks a streamed body arrived in */
  bodyChunkSizes: number[];
}

export class FakeDispatcher implements RequestDispatcher {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[] = [];

  reply(reply: ScriptedReply): this {
    this.replies.push(reply);
    return this;
  }

  get lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  dispatch(options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    this.run(options, handler).catch((error: unknown) => {
      handler.onError?.(error instanceof Error ? error : new Error(String(error)));
    });
    return true;
  }

  private async run(options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): Promise<void> {
    const bodyChunkSizes: number[] = [];
    const body = await readBody(options.body, bodyChunkSizes);
    this.requests.push({
      origin: String(options.origin),
      path: options.path,
      method: options.method,
      headers: recordHeaders(options.headers),
      body,
      bodyChunkSizes,
    });

    const reply = this.replies.shift() ?? { status: 200 };
    if (reply.gate) {
      await reply.gate;
    }

    handler.onConnect?.(() => undefined);
    if (reply.error) {
      handler.onError?.(reply.error);
      return;
    }

    const rawHeaders: Buffer[] = [];
    for (const [name, value] of reply.headers ?? []) {
      rawHeaders.push(Buffer.from(name, 'latin1'), Buffer.from(value, 'latin1'));
    }
    handler.onHeaders?.(reply.status ?? 200, rawHeaders, () => undefined, reply.statusText ?? 'OK');
    for (const chunk of reply.chunks ?? []) {
      handler.onData?.(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    }
    handler.onComplete?.(null);
  }
}

async function readBody(
  body: Dispatcher.DispatchOptions['body'],
  chunkSizes: number[]
): Promise<Buffer | undefined> {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }
  if (body instanceof Readable) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      const bytes = Buffer.from(chunk);
      chunkSizes.push(bytes.byteLength);
      chunks.push(bytes);
    }
    return Buffer.concat(chunks);
  }
  throw new Error('Unsupported body type');
}

function recordHeaders(headers: Dispatcher.DispatchOptions['headers']): Record<string, string> {
  const recorded: Record<string, string> = {};
  if (headers) {
    for (const [name, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        recorded[name] = value;
      }
    }
  }
  return recorded;
}
