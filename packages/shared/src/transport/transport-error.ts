export type TransportErrorKind = 'certificate-verification-failed' | 'network';

/**
 * TransportError
 *
 * Base error for every outbound call made through SecureTransport.
 * `kind` lets callers branch without instanceof checks across packages.
 */
export abstract class TransportError extends Error {
  abstract readonly kind: TransportErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }

  static isTransportError(error: unknown): error is TransportError {
    return error instanceof TransportError;
  }
}

/**
 * CertificateVerificationError
 *
 * The peer certificate (or its hostname) could not be verified under the
 * requested certificate mode. Carries the original validation message.
 */
export class CertificateVerificationError extends TransportError {
  readonly kind = 'certificate-verification-failed';

  /**
   * TLS error code reported by Node (e.g. `SELF_SIGNED_CERT_IN_CHAIN`)
   */
  readonly code?: string;

  constructor(message: string, options?: ErrorOptions & { code?: string }) {
    super(message, options);
    this.name = 'CertificateVerificationError';
    this.code = options?.code;
  }
}

/**
 * NetworkError
 *
 * Any failure other than certificate validation: timeout, DNS, refused
 * connection, or a non-2xx status.
 */
export class NetworkError extends TransportError {
  readonly kind = 'network';

  /**
   * HTTP status, when the server answered
   */
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: ErrorOptions & { statusCode?: number },
  ) {
    super(message, options);
    this.name = 'NetworkError';
    this.statusCode = options?.statusCode;
  }
}
