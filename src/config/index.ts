/**
 * Client configuration, builder and environment loading.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { ConsoleLogger, parseLogLevel, type Logger } from '../observability/index.js';
import type { RequestDispatcher } from '../transport/types.js';

/** Default User-Agent header, sent with every request. */
export const DEFAULT_USER_AGENT = 'rest-json-client/0.1.0';

/** Default TCP/TLS connect timeout in milliseconds (10 seconds). */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/** Default time to wait for response headers in milliseconds (5 minutes). */
export const DEFAULT_HEADERS_TIMEOUT_MS = 300_000;

/** Default idle time between body chunks in milliseconds (5 minutes). */
export const DEFAULT_BODY_TIMEOUT_MS = 300_000;

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Basic authentication credentials.
 */
export interface BasicAuthCredentials {
  username: string;
  password: SecretString;
}

/**
 * HTTP client configuration.
 */
export interface HttpClientConfig {
  /** User-Agent header value */
  userAgent: string;
  /** Connect timeout in milliseconds */
  connectTimeoutMs: number;
  /** Time to wait for response headers in milliseconds */
  headersTimeoutMs: number;
  /** Idle time allowed between body chunks in milliseconds */
  bodyTimeoutMs: number;
  /** Log sink; a warn-level console logger when absent */
  logger?: Logger;
  /**
   * Transport to issue requests through. When set, the client borrows it and
   * never closes it; otherwise the client creates and owns its own handle.
   */
  dispatcher?: RequestDispatcher;
  /** Initial basic-auth credentials */
  credentials?: BasicAuthCredentials;
}

/**
 * Options accepted by the client constructor; missing fields take defaults.
 */
export type HttpClientOptions = Partial<HttpClientConfig>;

/**
 * Creates a default configuration.
 */
export function createDefaultConfig(): HttpClientConfig {
  return {
    userAgent: DEFAULT_USER_AGENT,
    connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
    headersTimeoutMs: DEFAULT_HEADERS_TIMEOUT_MS,
    bodyTimeoutMs: DEFAULT_BODY_TIMEOUT_MS,
  };
}

/**
 * Merges options over the defaults and validates the result.
 * @throws {ConfigurationError} If the merged configuration is invalid.
 */
export function resolveConfig(options: HttpClientOptions = {}): HttpClientConfig {
  const config = createDefaultConfig();
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }
  validateConfig(config);
  return config;
}

/**
 * Validates a configuration.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: HttpClientConfig): void {
  if (!config.userAgent || config.userAgent.trim() === '') {
    throw new ConfigurationError('User-Agent cannot be empty');
  }

  const timeouts = {
    connectTimeoutMs: config.connectTimeoutMs,
    headersTimeoutMs: config.headersTimeoutMs,
    bodyTimeoutMs: config.bodyTimeoutMs,
  };
  for (const [name, value] of Object.entries(timeouts)) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be greater than 0`, { [name]: value });
    }
  }

  if (config.credentials && config.credentials.username.length === 0) {
    throw new ConfigurationError('Username cannot be empty');
  }
}

/**
 * Builder for HttpClientConfig.
 */
export class HttpClientConfigBuilder {
  private config: HttpClientConfig = createDefaultConfig();

  /**
   * Sets the User-Agent header value.
   */
  withUserAgent(userAgent: string): this {
    this.config.userAgent = userAgent.trim();
    return this;
  }

  /**
   * Sets any of the transport timeouts.
   */
  withTimeouts(timeouts: {
    connectTimeoutMs?: number;
    headersTimeoutMs?: number;
    bodyTimeoutMs?: number;
  }): this {
    this.config.connectTimeoutMs = timeouts.connectTimeoutMs ?? this.config.connectTimeoutMs;
    this.config.headersTimeoutMs = timeouts.headersTimeoutMs ?? this.config.headersTimeoutMs;
    this.config.bodyTimeoutMs = timeouts.bodyTimeoutMs ?? this.config.bodyTimeoutMs;
    return this;
  }

  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  withDispatcher(dispatcher: RequestDispatcher): this {
    this.config.dispatcher = dispatcher;
    return this;
  }

  /**
   * Sets the initial basic-auth credentials.
   */
  withBasicAuth(username: string, password: string): this {
    this.config.credentials = { username, password: new SecretString(password) };
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): HttpClientConfig {
    const config = { ...this.config };
    validateConfig(config);
    return config;
  }
}

const positiveMs = z.coerce.number().int().positive();

const envSchema = z.object({
  HTTP_CLIENT_USER_AGENT: z.string().trim().min(1).optional(),
  HTTP_CLIENT_CONNECT_TIMEOUT_MS: positiveMs.optional(),
  HTTP_CLIENT_HEADERS_TIMEOUT_MS: positiveMs.optional(),
  HTTP_CLIENT_BODY_TIMEOUT_MS: positiveMs.optional(),
  HTTP_CLIENT_USERNAME: z.string().min(1).optional(),
  HTTP_CLIENT_PASSWORD: z.string().optional(),
  HTTP_CLIENT_LOG_LEVEL: z
    .string()
    .transform((value, ctx) => {
      const level = parseLogLevel(value);
      if (level === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level "${value}"` });
        return z.NEVER;
      }
      return level;
    })
    .optional(),
});

/**
 * Loads configuration from environment variables.
 *
 * Environment variables:
 * - HTTP_CLIENT_USER_AGENT: User-Agent header (optional)
 * - HTTP_CLIENT_CONNECT_TIMEOUT_MS, HTTP_CLIENT_HEADERS_TIMEOUT_MS,
 *   HTTP_CLIENT_BODY_TIMEOUT_MS: timeouts in milliseconds (optional)
 * - HTTP_CLIENT_USERNAME / HTTP_CLIENT_PASSWORD: basic-auth credentials (optional)
 * - HTTP_CLIENT_LOG_LEVEL: debug, warn or error (optional)
 *
 * @throws {ConfigurationError} If a variable is present but invalid.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HttpClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigurationError(
      `Invalid environment configuration: ${keys.join(', ')}`,
      { keys }
    );
  }

  const vars = parsed.data;
  const builder = new HttpClientConfigBuilder().withTimeouts({
    connectTimeoutMs: vars.HTTP_CLIENT_CONNECT_TIMEOUT_MS,
    headersTimeoutMs: vars.HTTP_CLIENT_HEADERS_TIMEOUT_MS,
    bodyTimeoutMs: vars.HTTP_CLIENT_BODY_TIMEOUT_MS,
  });

  if (vars.HTTP_CLIENT_USER_AGENT) {
    builder.withUserAgent(vars.HTTP_CLIENT_USER_AGENT);
  }
  if (vars.HTTP_CLIENT_USERNAME) {
    builder.withBasicAuth(vars.HTTP_CLIENT_USERNAME, vars.HTTP_CLIENT_PASSWORD ?? '');
  }
  if (vars.HTTP_CLIENT_LOG_LEVEL !== undefined) {
    builder.withLogger(new ConsoleLogger({ level: vars.HTTP_CLIENT_LOG_LEVEL }));
  }

  return builder.build();
}
