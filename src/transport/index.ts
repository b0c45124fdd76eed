/**
 * HTTP transport layer.
 *
 * @module transport
 */

export * from './types.js';
export { HEADER_PRESENT, HeaderAccumulator, parseHeaderLine, type HeaderField } from './headers.js';
export { ResponseBodySink, UploadCursor, createUploadStream, toBodyBytes } from './body.js';
export {
  TRANSPORT_FAILURE_CODE,
  TRANSPORT_FAILURE_PREFIX,
  TransportFailureKind,
  UnsupportedProtocolError,
  classifyTransportError,
  describeTransportFailure,
  errorCode,
} from './diagnostics.js';
export { TransportHandle, type TransportHandleOptions } from './handle.js';
