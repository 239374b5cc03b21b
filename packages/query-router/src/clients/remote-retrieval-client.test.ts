import type { LoggerMethods } from '@ragbridge/logger';
import type { TransportResponse } from '@ragbridge/shared';

import { NetworkError, SecureTransport } from '@ragbridge/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { RemoteRetrievalClient } from './remote-retrieval-client';

function rawResponse(text: string): TransportResponse {
  const body = Buffer.from(text, 'utf-8');
  return {
    statusCode: 200,
    headers: {},
    body,
    text: () => body.toString('utf-8'),
    json: (): unknown => JSON.parse(body.toString('utf-8')),
  };
}

describe('RemoteRetrievalClient', () => {
  let logger: LoggerMethods;
  let transport: SecureTransport;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    transport = new SecureTransport({ logger });
  });

  function createClient(
    overrides: Partial<ConstructorParameters<typeof RemoteRetrievalClient>[0]> = {},
  ) {
    return new RemoteRetrievalClient({
      logger,
      transport,
      baseUrl: 'https://rag.example.com',
      ...overrides,
    });
  }

  test('should post the query and return the validated payload', async () => {
    const fetchSpy = vi.spyOn(transport, 'fetch').mockResolvedValue(
      rawResponse(
        JSON.stringify({
          response: 'Returns are accepted within 30 days.',
          sources: ['file_abc123'],
          usage: { prompt_tokens: 1234, completion_tokens: 567 },
          algorithm: 'noderag',
        }),
      ),
    );
    const controller = new AbortController();

    const payload = await createClient().query({
      query: 'What is your return policy?',
      organizationId: 'org-1',
      conversationHistory: [{ role: 'user', content: 'Hello' }],
      timeoutMs: 8000,
      abortSignal: controller.signal,
    });

    expect(payload).toEqual({
      response: 'Returns are accepted within 30 days.',
      sources: ['file_abc123'],
      usage: { prompt_tokens: 1234, completion_tokens: 567 },
      algorithm: 'noderag',
    });

    const [url, request, mode, options] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://rag.example.com/api/v1/generate-response');
    expect(request.method).toBe('POST');
    expect(request.headers).toEqual({
      'content-type': 'application/json',
      accept: 'application/json',
    });
    expect(JSON.parse(String(request.body))).toEqual({
      org_id: 'org-1',
      query: 'What is your return policy?',
      conversation_history: [{ role: 'user', content: 'Hello' }],
      max_tokens: 1024,
      temperature: 0.7,
    });
    expect(mode).toBe('strict');
    expect(options).toEqual({
      timeoutMs: 8000,
      abortSignal: controller.signal,
    });
  });

  test('should use the configured certificate mode and generation limits', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(rawResponse('{"response":"ok"}'));

    await createClient({
      certificateMode: 'system-trust-store',
      maxTokens: 256,
      temperature: 0,
    }).query({
      query: 'q',
      organizationId: 'org-1',
      conversationHistory: [],
      timeoutMs: 1000,
    });

    const [, request, mode] = fetchSpy.mock.calls[0];
    expect(mode).toBe('system-trust-store');
    expect(JSON.parse(String(request.body))).toMatchObject({
      max_tokens: 256,
      temperature: 0,
    });
  });

  test('should reject a payload without a response field', async () => {
    vi.spyOn(transport, 'fetch').mockResolvedValue(
      rawResponse('{"answer":"wrong field"}'),
    );

    await expect(
      createClient().query({
        query: 'q',
        organizationId: 'org-1',
        conversationHistory: [],
        timeoutMs: 1000,
      }),
    ).rejects.toThrow(
      'Remote service returned a malformed response: response: Required',
    );
  });

  test('should reject a non-JSON body', async () => {
    vi.spyOn(transport, 'fetch').mockResolvedValue(
      rawResponse('<html>gateway</html>'),
    );

    await expect(
      createClient().query({
        query: 'q',
        organizationId: 'org-1',
        conversationHistory: [],
        timeoutMs: 1000,
      }),
    ).rejects.toThrow('Remote service returned a non-JSON response');
  });

  test('should propagate transport failures', async () => {
    const failure = new NetworkError('Unexpected HTTP status 502', {
      statusCode: 502,
    });
    vi.spyOn(transport, 'fetch').mockRejectedValue(failure);

    await expect(
      createClient().query({
        query: 'q',
        organizationId: 'org-1',
        conversationHistory: [],
        timeoutMs: 1000,
      }),
    ).rejects.toBe(failure);
  });

  test('checkHealth should call the health endpoint', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(rawResponse('{"status":"ok"}'));

    await createClient().checkHealth({ timeoutMs: 2000 });

    expect(fetchSpy).toHaveBeenCalledWith(
      'https://rag.example.com/api/v1/health',
      { method: 'GET', headers: { accept: 'application/json' } },
      'strict',
      { timeoutMs: 2000 },
    );
  });

  test('should drop trailing slashes from the base URL', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(rawResponse('{"status":"ok"}'));

    await createClient({ baseUrl: 'https://rag.example.com//' }).checkHealth({
      timeoutMs: 2000,
    });

    expect(fetchSpy.mock.calls[0][0]).toBe(
      'https://rag.example.com/api/v1/health',
    );
  });
});
