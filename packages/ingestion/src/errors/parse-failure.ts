import type { CertificateMode, ParseFailureKind } from '@ragbridge/model';

import { TransportError } from '@ragbridge/shared';

/**
 * Classified failure of a single ingestion strategy.
 *
 * The chain records it as the attempt's failure reason and moves on to the
 * next strategy.
 */
export class ParseFailure extends Error {
  public readonly name = 'ParseFailure';

  /**
   * TLS modes tried before the failure (primary service only)
   */
  public readonly certificateModes?: CertificateMode[];

  constructor(
    public readonly kind: ParseFailureKind,
    message: string,
    options?: ErrorOptions & { certificateModes?: CertificateMode[] },
  ) {
    super(message, options);
    this.certificateModes = options?.certificateModes;
  }
}

/**
 * Classify any strategy error. Transport errors keep their kind; anything
 * unrecognized is a `parse-failed`.
 */
export function toParseFailure(
  error: unknown,
  certificateModes?: CertificateMode[],
): ParseFailure {
  if (error instanceof ParseFailure) {
    if (error.certificateModes || !certificateModes) {
      return error;
    }
    return new ParseFailure(error.kind, error.message, {
      cause: error.cause,
      certificateModes,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  const kind = TransportError.isTransportError(error)
    ? error.kind
    : 'parse-failed';

  return new ParseFailure(kind, message, { cause: error, certificateModes });
}
