import {
  CertificateVerificationError,
  NetworkError,
  TransportError,
} from './transport-error';

/**
 * Node/OpenSSL error codes raised when a certificate chain or the hostname
 * cannot be verified.
 */
export const CERTIFICATE_ERROR_CODES: ReadonlySet<string> = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_SIGNATURE_FAILURE',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'HOSTNAME_MISMATCH',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map a raw failure from node:http(s) onto the transport taxonomy.
 *
 * Errors that are already TransportErrors are returned unchanged.
 */
export function classifyTransportFailure(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readErrorCode(error);

  if (code && CERTIFICATE_ERROR_CODES.has(code)) {
    return new CertificateVerificationError(message, { cause: error, code });
  }

  const detail = code && !message.includes(code) ? `${code}: ${message}` : message;
  return new NetworkError(detail, { cause: error });
}
