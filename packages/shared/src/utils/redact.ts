const REDACTIONS: ReadonlyArray<[RegExp, string]> = [
  [/\bBearer\s+[A-Za-z0-9._~+/=-]+/gi, 'Bearer [REDACTED]'],
  [
    /\b(api[_-]?key|access[_-]?token|token|secret|password)(["']?\s*[:=]\s*["']?)[^\s"'&,;]+/gi,
    '$1$2[REDACTED]',
  ],
  [/\b(sk|llx)-[A-Za-z0-9_-]{8,}/g, '[REDACTED]'],
  [/\bhttps?:\/\/[^\s"'<>]+/gi, '[URL]'],
];

/**
 * Strip URLs and credentials from a message before it reaches a caller or a
 * log line.
 */
export function redactSensitive(message: string): string {
  return REDACTIONS.reduce(
    (text, [pattern, replacement]) => text.replace(pattern, replacement),
    message,
  );
}
