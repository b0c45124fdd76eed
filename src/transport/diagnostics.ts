/**
 * Transport failure diagnostics.
 *
 * A failed exchange is reported to callers as a response with code -1 and a
 * body built here. The prefix and the stock descriptions are matched on by
 * existing consumers, so they are fixed strings.
 *
 * @module transport/diagnostics
 */

/** Status code reported when no HTTP exchange took place. */
export const TRANSPORT_FAILURE_CODE = -1;

/** Leading text of every transport failure body. */
export const TRANSPORT_FAILURE_PREFIX = 'Failed to query. CURL error: ';

/**
 * Failure classes, each with a stock description.
 */
export enum TransportFailureKind {
  UnsupportedProtocol = 'Unsupported protocol',
  MalformedUrl = 'URL using bad/illegal format or missing URL',
  ResolveHost = "Couldn't resolve host name",
  Connect = "Couldn't connect to server",
  Timeout = 'Timeout was reached',
  TlsConnect = 'SSL connect error',
  PeerCertificate = 'SSL peer certificate or SSH remote key was not OK',
  SendError = 'Failed sending data to the peer',
  ReceiveError = 'Failure when receiving data from the peer',
  Aborted = 'Operation was aborted by an application callback',
  Unknown = 'Unknown error',
}

/**
 * Raised before dispatch when a URL names a scheme other than http or https.
 */
export class UnsupportedProtocolError extends Error {
  constructor(protocol: string) {
    super(`Protocol "${protocol.replace(/:$/, '')}" not supported`);
    this.name = 'UnsupportedProtocolError';
  }
}

const KIND_BY_CODE = new Map<string, TransportFailureKind>([
  ['ERR_INVALID_URL', TransportFailureKind.MalformedUrl],
  ['ENOTFOUND', TransportFailureKind.ResolveHost],
  ['EAI_AGAIN', TransportFailureKind.ResolveHost],
  ['ECONNREFUSED', TransportFailureKind.Connect],
  ['EHOSTUNREACH', TransportFailureKind.Connect],
  ['ENETUNREACH', TransportFailureKind.Connect],
  ['ETIMEDOUT', TransportFailureKind.Timeout],
  ['UND_ERR_CONNECT_TIMEOUT', TransportFailureKind.Timeout],
  ['UND_ERR_HEADERS_TIMEOUT', TransportFailureKind.Timeout],
  ['UND_ERR_BODY_TIMEOUT', TransportFailureKind.Timeout],
  ['EPROTO', TransportFailureKind.TlsConnect],
  ['ERR_SSL_WRONG_VERSION_NUMBER', TransportFailureKind.TlsConnect],
  ['ERR_TLS_CERT_ALTNAME_INVALID', TransportFailureKind.PeerCertificate],
  ['CERT_HAS_EXPIRED', TransportFailureKind.PeerCertificate],
  ['DEPTH_ZERO_SELF_SIGNED_CERT', TransportFailureKind.PeerCertificate],
  ['SELF_SIGNED_CERT_IN_CHAIN', TransportFailureKind.PeerCertificate],
  ['UNABLE_TO_VERIFY_LEAF_SIGNATURE', TransportFailureKind.PeerCertificate],
  ['UNABLE_TO_GET_ISSUER_CERT_LOCALLY', TransportFailureKind.PeerCertificate],
  ['EPIPE', TransportFailureKind.SendError],
  ['UND_ERR_REQ_CONTENT_LENGTH_MISMATCH', TransportFailureKind.SendError],
  ['ECONNRESET', TransportFailureKind.ReceiveError],
  ['UND_ERR_SOCKET', TransportFailureKind.ReceiveError],
  ['UND_ERR_RES_CONTENT_LENGTH_MISMATCH', TransportFailureKind.ReceiveError],
  ['UND_ERR_ABORTED', TransportFailureKind.Aborted],
  ['ABORT_ERR', TransportFailureKind.Aborted],
]);

/**
 * Reads the `code` property of an error, or of its cause.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error && error.cause !== error) {
    return errorCode(error.cause);
  }
  return undefined;
}

/**
 * Classifies a transport error.
 */
export function classifyTransportError(error: unknown): TransportFailureKind {
  if (error instanceof UnsupportedProtocolError) {
    return TransportFailureKind.UnsupportedProtocol;
  }
  const code = errorCode(error);
  return (code !== undefined ? KIND_BY_CODE.get(code) : undefined) ?? TransportFailureKind.Unknown;
}

/**
 * Builds the response body reported for a transport failure:
 * prefix, stock description, then the transport's own detail text.
 *
 * @example
 * ```typescript
 * describeTransportFailure(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' }));
 * // "Failed to query. CURL error: Couldn't connect to server DETAIL: connect ECONNREFUSED 127.0.0.1:9"
 * ```
 */
export function describeTransportFailure(error: unknown): string {
  const detail = error instanceof Error ? error.message : String(error);
  return `${TRANSPORT_FAILURE_PREFIX}${classifyTransportError(error)} DETAIL: ${detail}`;
}
