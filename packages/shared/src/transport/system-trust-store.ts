import { existsSync, readFileSync } from 'node:fs';

import { CertificateVerificationError } from './transport-error';

/**
 * Well-known CA bundle locations, checked in order.
 */
export const SYSTEM_CA_BUNDLE_PATHS = [
  '/etc/ssl/certs/ca-certificates.crt', // Debian, Ubuntu, Alpine
  '/etc/pki/tls/certs/ca-bundle.crt', // Fedora, RHEL
  '/etc/ssl/ca-bundle.pem', // openSUSE
  '/etc/ssl/cert.pem', // macOS, FreeBSD
] as const;

/**
 * Read the operating system's CA bundle.
 *
 * Lookup order: explicit path, `SSL_CERT_FILE`, well-known locations.
 *
 * @throws CertificateVerificationError when no bundle can be found
 */
export function loadSystemTrustStore(explicitPath?: string): string {
  const candidates = [
    explicitPath,
    process.env.SSL_CERT_FILE,
    ...SYSTEM_CA_BUNDLE_PATHS,
  ].filter((path): path is string => !!path);

  for (const path of candidates) {
    if (existsSync(path)) {
      return readFileSync(path, 'utf-8');
    }
  }

  throw new CertificateVerificationError(
    `No system trust store found (checked ${candidates.length} locations)`,
    { code: 'SYSTEM_TRUST_STORE_MISSING' },
  );
}
