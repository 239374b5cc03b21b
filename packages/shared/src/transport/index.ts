export type { TransportErrorKind } from './transport-error';
export type {
  SecureTransportOptions,
  TransportCallOptions,
  TransportRequest,
  TransportResponse,
} from './secure-transport';

export {
  CertificateVerificationError,
  NetworkError,
  TransportError,
} from './transport-error';
export {
  CERTIFICATE_ERROR_CODES,
  classifyTransportFailure,
} from './classify-transport-failure';
export {
  SYSTEM_CA_BUNDLE_PATHS,
  loadSystemTrustStore,
} from './system-trust-store';
export { SecureTransport } from './secure-transport';
export { createSecureTransport } from './create-secure-transport';
