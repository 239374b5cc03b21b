import {
  CertificateVerificationError,
  NetworkError,
} from '@ragbridge/shared';
import { describe, expect, test } from 'vitest';

import { ParseFailure, toParseFailure } from './parse-failure';

describe('toParseFailure', () => {
  test('transport errors keep their kind', () => {
    const cause = new CertificateVerificationError('unable to verify', {
      code: 'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
    });

    const failure = toParseFailure(cause, ['strict', 'system-trust-store']);

    expect(failure).toBeInstanceOf(ParseFailure);
    expect(failure.kind).toBe('certificate-verification-failed');
    expect(failure.message).toBe('unable to verify');
    expect(failure.cause).toBe(cause);
    expect(failure.certificateModes).toEqual(['strict', 'system-trust-store']);
  });

  test('network errors become network failures', () => {
    expect(toParseFailure(new NetworkError('Request timed out')).kind).toBe(
      'network',
    );
  });

  test('unknown errors become parse-failed', () => {
    const failure = toParseFailure('corrupt xref table');

    expect(failure.kind).toBe('parse-failed');
    expect(failure.message).toBe('corrupt xref table');
    expect(failure.certificateModes).toBeUndefined();
  });

  test('existing failures are returned as is', () => {
    const original = new ParseFailure('empty-content', 'No text');

    expect(toParseFailure(original)).toBe(original);
  });

  test('existing failures gain the certificate modes when missing', () => {
    const cause = new Error('root');
    const original = new ParseFailure('configuration', 'No API key', {
      cause,
    });

    const failure = toParseFailure(original, ['strict']);

    expect(failure).not.toBe(original);
    expect(failure).toMatchObject({
      kind: 'configuration',
      message: 'No API key',
      certificateModes: ['strict'],
    });
    expect(failure.cause).toBe(cause);
  });
});
