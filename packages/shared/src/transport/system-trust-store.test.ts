import { existsSync, readFileSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { loadSystemTrustStore } from './system-trust-store';
import { CertificateVerificationError } from './transport-error';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('loadSystemTrustStore', () => {
  const originalCertFile = process.env.SSL_CERT_FILE;

  beforeEach(() => {
    delete process.env.SSL_CERT_FILE;
    vi.mocked(readFileSync).mockImplementation((path) => `PEM:${String(path)}`);
  });

  afterEach(() => {
    if (originalCertFile === undefined) {
      delete process.env.SSL_CERT_FILE;
    } else {
      process.env.SSL_CERT_FILE = originalCertFile;
    }
  });

  test('explicit path wins', () => {
    vi.mocked(existsSync).mockReturnValue(true);

    expect(loadSystemTrustStore('/opt/ca.pem')).toBe('PEM:/opt/ca.pem');
    expect(readFileSync).toHaveBeenCalledWith('/opt/ca.pem', 'utf-8');
  });

  test('SSL_CERT_FILE is used before well-known locations', () => {
    process.env.SSL_CERT_FILE = '/env/bundle.pem';
    vi.mocked(existsSync).mockImplementation(
      (path) => path === '/env/bundle.pem',
    );

    expect(loadSystemTrustStore()).toBe('PEM:/env/bundle.pem');
  });

  test('falls back to the first existing well-known bundle', () => {
    vi.mocked(existsSync).mockImplementation(
      (path) => path === '/etc/pki/tls/certs/ca-bundle.crt',
    );

    expect(loadSystemTrustStore('/missing.pem')).toBe(
      'PEM:/etc/pki/tls/certs/ca-bundle.crt',
    );
    expect(existsSync).toHaveBeenCalledWith('/missing.pem');
  });

  test('throws a certificate error when nothing exists', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    let thrown: unknown;
    try {
      loadSystemTrustStore();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(CertificateVerificationError);
    expect(thrown).toMatchObject({
      code: 'SYSTEM_TRUST_STORE_MISSING',
      message: 'No system trust store found (checked 4 locations)',
    });
  });
});
