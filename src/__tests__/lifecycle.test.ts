/**
 * Tests for transport handle creation failures.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpClient } from '../client/index.js';
import { HttpClientErrorCode, TransportInitializationError } from '../errors/index.js';
import { FakeDispatcher } from './support/fake-dispatcher.js';

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return {
    ...actual,
    Agent: class FailingAgent {
      constructor() {
        throw new Error('no sockets available');
      }
    },
  };
});

describe('transport initialization', () => {
  it('should throw when the agent cannot be created', () => {
    expect(() => new HttpClient()).toThrow(TransportInitializationError);
    expect(() => new HttpClient()).toThrow('Failed to initialize transport handle: no sockets available');
  });

  it('should carry the initialization code and cause', () => {
    try {
      new HttpClient();
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: HttpClientErrorCode.TransportInitialization });
      expect(error).toHaveProperty('cause.message', 'no sockets available');
    }
  });

  it('should not need an agent when a dispatcher is given', () => {
    const client = new HttpClient({ dispatcher: new FakeDispatcher() });

    expect(client.isClosed).toBe(false);
  });
});
