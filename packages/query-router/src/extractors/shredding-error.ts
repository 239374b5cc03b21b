import type { SkippedFile } from '@ragbridge/model';

export type ShreddingErrorKind = 'invalid-request' | 'no-content';

/**
 * ShreddingError
 *
 * Raised before any model call when there is nothing to analyse.
 */
export class ShreddingError extends Error {
  public readonly kind: ShreddingErrorKind;

  /**
   * Files that failed to load, when kind is `no-content`
   */
  public readonly skippedFiles: readonly SkippedFile[];

  constructor(
    kind: ShreddingErrorKind,
    message: string,
    skippedFiles: readonly SkippedFile[] = [],
  ) {
    super(message);
    this.name = 'ShreddingError';
    this.kind = kind;
    this.skippedFiles = skippedFiles;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
