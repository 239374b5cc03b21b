import type { ParseAttempt } from '@ragbridge/model';

function describeAttempt(attempt: ParseAttempt): string {
  const reason = attempt.failureReason;
  return reason
    ? `${attempt.strategy} failed (${reason.kind}): ${reason.message}`
    : `${attempt.strategy} ${attempt.outcome}`;
}

/**
 * Error thrown when every applicable ingestion strategy failed.
 * Carries the full attempt trail for debugging.
 */
export class IngestionError extends Error {
  public readonly name = 'IngestionError';
  public readonly kind = 'all-strategies-exhausted';

  constructor(
    public readonly fileId: string,
    public readonly attempts: readonly ParseAttempt[],
  ) {
    super(
      `All ingestion strategies failed for ${fileId}. ` +
        attempts.map(describeAttempt).join('; '),
    );
  }

  /**
   * One line per attempt, in the order the strategies ran
   */
  getSummary(): string {
    return [
      `Ingestion of ${this.fileId} failed after ${this.attempts.length} attempt(s):`,
      ...this.attempts.map(
        (attempt, index) =>
          `  ${index + 1}. ${describeAttempt(attempt)} [${attempt.durationMs}ms]`,
      ),
    ].join('\n');
  }
}
