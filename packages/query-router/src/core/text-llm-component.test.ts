import type { LoggerMethods } from '@ragbridge/logger';
import type {
  LLMCallResult,
  LLMStructuredCallResult,
} from '@ragbridge/shared';
import type { LanguageModel, ModelMessage } from 'ai';

import { LLMCaller } from '@ragbridge/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';

import { TextLLMComponent } from './text-llm-component';

vi.mock('@ragbridge/shared', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@ragbridge/shared')>()),
  LLMCaller: { call: vi.fn(), callStructured: vi.fn() },
}));

class TestTextComponent extends TextLLMComponent {
  protected buildSystemPrompt(): string {
    return 'system';
  }

  protected buildUserPrompt(input: string): string {
    return input;
  }

  public run(
    messages: ModelMessage[],
    abortSignal?: AbortSignal,
  ): Promise<LLMCallResult> {
    return this.callTextLLM('system', messages, abortSignal);
  }

  public extract<TOutput>(
    schema: z.ZodType<TOutput>,
    messages: ModelMessage[],
  ): Promise<LLMStructuredCallResult<TOutput>> {
    return this.callStructuredLLM(schema, 'system', messages);
  }
}

function callResult(usedFallback: boolean): LLMCallResult {
  return {
    text: 'answer',
    usage: {
      model: usedFallback ? 'fallback' : 'primary',
      modelName: usedFallback ? 'fallback-model' : 'primary-model',
      inputTokens: 10,
      outputTokens: 2,
      totalTokens: 12,
    },
    usedFallback,
  };
}

describe('TextLLMComponent', () => {
  const model = { modelId: 'primary-model' } as LanguageModel;
  const fallbackModel = { modelId: 'fallback-model' } as LanguageModel;
  const messages: ModelMessage[] = [{ role: 'user', content: 'Hello' }];
  let logger: LoggerMethods;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  test('should call LLMCaller with the component configuration', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue(callResult(false));
    const component = new TestTextComponent(
      logger,
      model,
      'TestText',
      { maxRetries: 2, temperature: 0.1, maxOutputTokens: 64 },
      fallbackModel,
    );
    const controller = new AbortController();

    const result = await component.run(messages, controller.signal);

    expect(result).toEqual(callResult(false));
    expect(LLMCaller.call).toHaveBeenCalledWith({
      systemPrompt: 'system',
      messages,
      primaryModel: model,
      fallbackModel,
      maxRetries: 2,
      maxOutputTokens: 64,
      temperature: 0.1,
      abortSignal: controller.signal,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('should warn when the fallback model answered', async () => {
    vi.mocked(LLMCaller.call).mockResolvedValue(callResult(true));
    const component = new TestTextComponent(logger, model, 'TestText');

    await component.run(messages);

    expect(logger.warn).toHaveBeenCalledWith(
      '[TestText] Answer generated by fallback model fallback-model',
    );
  });

  test('should propagate errors from LLMCaller', async () => {
    const failure = new Error('model unavailable');
    vi.mocked(LLMCaller.call).mockRejectedValue(failure);
    const component = new TestTextComponent(logger, model, 'TestText');

    await expect(component.run(messages)).rejects.toBe(failure);
  });

  describe('callStructuredLLM', () => {
    const schema = z.object({ title: z.string() });

    test('should pass the schema and component configuration', async () => {
      vi.mocked(LLMCaller.callStructured).mockResolvedValue({
        output: { title: 'Network Upgrade' },
        usage: callResult(false).usage,
        usedFallback: false,
      });
      const component = new TestTextComponent(
        logger,
        model,
        'TestText',
        { maxRetries: 1, temperature: 0.2, maxOutputTokens: 8192 },
        fallbackModel,
      );

      const result = await component.extract(schema, messages);

      expect(result.output).toEqual({ title: 'Network Upgrade' });
      expect(LLMCaller.callStructured).toHaveBeenCalledWith({
        schema,
        systemPrompt: 'system',
        messages,
        primaryModel: model,
        fallbackModel,
        maxRetries: 1,
        maxOutputTokens: 8192,
        temperature: 0.2,
        abortSignal: undefined,
      });
    });

    test('should warn when the fallback model produced the output', async () => {
      vi.mocked(LLMCaller.callStructured).mockResolvedValue({
        output: { title: 'x' },
        usage: callResult(true).usage,
        usedFallback: true,
      });
      const component = new TestTextComponent(logger, model, 'TestText');

      await component.extract(schema, messages);

      expect(logger.warn).toHaveBeenCalledWith(
        '[TestText] Output generated by fallback model fallback-model',
      );
    });
  });
});
