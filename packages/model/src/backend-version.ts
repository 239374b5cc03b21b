/**
 * Query backends the router can dispatch to.
 *
 * - `v1`: locally hosted retrieval + generation pipeline (in-process call)
 * - `v2`: remote graph-based retrieval service (network call)
 */
export const BACKEND_VERSIONS = ['v1', 'v2'] as const;

export type BackendVersion = (typeof BACKEND_VERSIONS)[number];

export function isBackendVersion(value: unknown): value is BackendVersion {
  return (
    typeof value === 'string' &&
    (BACKEND_VERSIONS as readonly string[]).includes(value)
  );
}

/**
 * TLS verification mode for a single outbound call.
 *
 * `insecure` is only ever used when an operator configures it explicitly.
 */
export const CERTIFICATE_MODES = [
  'strict',
  'system-trust-store',
  'insecure',
] as const;

export type CertificateMode = (typeof CERTIFICATE_MODES)[number];
