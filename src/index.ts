/**
 * REST JSON client
 *
 * Small HTTP client for talking to a remote JSON API: GET/POST/PUT/DELETE over
 * one reusable transport handle, a uniform response record, and decoding of
 * JSON bodies into an ordered property tree.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { HttpClient, checkDjangoError, ptreeVector, TreeValue } from 'rest-json-client';
 *
 * const client = new HttpClient();
 * client.setAuth('reader', 'test-secret');
 *
 * const response = await client.get('https://api.example.com/health');
 * if (response.code === -1) {
 *   console.error(response.body); // "Failed to query. CURL error: ..."
 * }
 *
 * const tree = await client.getPropertyTree('https://api.example.com/stacks/4/ids');
 * if (!checkDjangoError(tree)) {
 *   const ids: number[] = [];
 *   ptreeVector(tree, ids, TreeValue.integer);
 * }
 *
 * await client.close();
 * ```
 *
 * @module rest-json-client
 */

// Client
export { HttpClient, FORM_URLENCODED, type BodyData } from './client/index.js';

// Configuration
export {
  HttpClientConfigBuilder,
  SecretString,
  configFromEnv,
  createDefaultConfig,
  resolveConfig,
  validateConfig,
  DEFAULT_USER_AGENT,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEADERS_TIMEOUT_MS,
  DEFAULT_BODY_TIMEOUT_MS,
  type HttpClientConfig,
  type HttpClientOptions,
  type BasicAuthCredentials,
} from './config/index.js';

// Errors
export {
  HttpClientError,
  HttpClientErrorCode,
  ConfigurationError,
  TransportInitializationError,
  ClientClosedError,
  ClientBusyError,
  JsonDecodeError,
  TreePathError,
  TreeCoercionError,
  isHttpClientError,
} from './errors/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  parseLogLevel,
  type Logger,
  type LogEntry,
} from './observability/index.js';

// Transport
export {
  HEADER_PRESENT,
  TRANSPORT_FAILURE_CODE,
  TRANSPORT_FAILURE_PREFIX,
  TransportFailureKind,
  type HttpResponse,
  type HeaderMap,
  type HttpMethod,
  type RequestDispatcher,
} from './transport/index.js';

// Property trees
export {
  PropertyTree,
  TreeValue,
  ptreeHasChild,
  checkDjangoError,
  ptreeVector,
  type TreeEntry,
  type TreeJson,
} from './tree/index.js';
