import type { LoggerMethods } from '@ragbridge/logger';
import type { TransportResponse } from '@ragbridge/shared';

import { NetworkError, SecureTransport } from '@ragbridge/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PromptProvider } from './prompt-provider';
import { GROUNDED_ANSWER_PROMPT } from './prompts';

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

describe('PromptProvider', () => {
  let logger: LoggerMethods;
  let transport: SecureTransport;
  let provider: PromptProvider;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    transport = new SecureTransport({ logger });
    provider = new PromptProvider({
      logger,
      transport,
      baseUrl: 'http://prompts.example.com',
    });
  });

  test('should return the prompt from the API', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(
        rawResponse(
          JSON.stringify({ success: true, data: { prompt: 'Use {context}' } }),
        ),
      );

    await expect(provider.getChatPrompt()).resolves.toBe('Use {context}');
    expect(fetchSpy).toHaveBeenCalledWith(
      'http://prompts.example.com/api/prompts/chat',
      { method: 'GET', headers: { accept: 'application/json' } },
      'strict',
      { timeoutMs: 5000, abortSignal: undefined },
    );
  });

  test('should fall back when the API reports no prompt', async () => {
    vi.spyOn(transport, 'fetch').mockResolvedValue(
      rawResponse(JSON.stringify({ success: false, data: null })),
    );

    await expect(provider.getChatPrompt()).resolves.toBe(
      GROUNDED_ANSWER_PROMPT,
    );
    expect(logger.warn).toHaveBeenCalledWith(
      '[PromptProvider] Prompt API returned no prompt, using built-in prompt',
    );
  });

  test('should fall back on a transport failure and redact the message', async () => {
    vi.spyOn(transport, 'fetch').mockRejectedValue(
      new NetworkError('ECONNREFUSED: connect http://prompts.example.com'),
    );

    await expect(provider.getChatPrompt()).resolves.toBe(
      GROUNDED_ANSWER_PROMPT,
    );
    expect(logger.warn).toHaveBeenCalledWith(
      '[PromptProvider] Failed to fetch prompt (ECONNREFUSED: connect [URL]), using built-in prompt',
    );
  });

  test('should fall back on a non-JSON body', async () => {
    vi.spyOn(transport, 'fetch').mockResolvedValue(rawResponse('<html>'));

    await expect(provider.getChatPrompt()).resolves.toBe(
      GROUNDED_ANSWER_PROMPT,
    );
  });

  test('should rethrow cancellation instead of falling back', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    controller.abort(reason);
    vi.spyOn(transport, 'fetch').mockRejectedValue(reason);

    await expect(provider.getChatPrompt(controller.signal)).rejects.toBe(
      reason,
    );
  });

  test('should use the configured timeout and certificate mode', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(
        rawResponse(JSON.stringify({ success: true, data: { prompt: 'p' } })),
      );
    provider = new PromptProvider({
      logger,
      transport,
      baseUrl: 'https://prompts.example.com',
      certificateMode: 'system-trust-store',
      timeoutMs: 1500,
    });

    await provider.getChatPrompt();

    const [, , mode, options] = fetchSpy.mock.calls[0];
    expect(mode).toBe('system-trust-store');
    expect(options.timeoutMs).toBe(1500);
  });

  test('should drop a trailing slash from the base URL', async () => {
    const fetchSpy = vi
      .spyOn(transport, 'fetch')
      .mockResolvedValue(
        rawResponse(JSON.stringify({ success: true, data: { prompt: 'p' } })),
      );
    provider = new PromptProvider({
      logger,
      transport,
      baseUrl: 'https://prompts.example.com/',
    });

    await provider.getChatPrompt();

    expect(fetchSpy.mock.calls[0][0]).toBe(
      'https://prompts.example.com/api/prompts/chat',
    );
  });
});
