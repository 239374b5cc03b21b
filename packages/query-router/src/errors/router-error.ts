import type { BackendVersion } from '@ragbridge/model';

import { redactSensitive } from '@ragbridge/shared';

export type RouterErrorKind =
  | 'backend-unavailable'
  | 'invalid-version'
  | 'invalid-request';

export interface RouterErrorOptions extends ErrorOptions {
  version?: BackendVersion;
}

/**
 * RouterError
 *
 * Thrown by the query router. Caller cancellation is never wrapped;
 * the abort reason is rethrown as is.
 */
export class RouterError extends Error {
  public readonly kind: RouterErrorKind;
  public readonly version?: BackendVersion;

  constructor(
    kind: RouterErrorKind,
    message: string,
    options?: RouterErrorOptions,
  ) {
    super(message, options);
    this.name = 'RouterError';
    this.kind = kind;
    this.version = options?.version;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Wrap a backend failure. The message never carries URLs or credentials.
   */
  static backendUnavailable(
    version: BackendVersion,
    cause: unknown,
  ): RouterError {
    return new RouterError(
      'backend-unavailable',
      `Backend ${version} unavailable: ${redactSensitive(RouterError.getErrorMessage(cause))}`,
      { version, cause },
    );
  }
}
