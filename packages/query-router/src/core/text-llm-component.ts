import type {
  LLMCallResult,
  LLMStructuredCallResult,
} from '@ragbridge/shared';
import type { ModelMessage } from 'ai';
import type { z } from 'zod';

import { LLMCaller } from '@ragbridge/shared';

import { BaseLLMComponent } from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-only LLM components
 *
 * Routes every generation through LLMCaller so retries and the fallback
 * model behave the same for all components.
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  /**
   * Generate a text answer
   *
   * @param systemPrompt - System prompt for the call
   * @param messages - Conversation so far, ending with the user turn
   * @param abortSignal - Cancels the call; never retried on the fallback model
   */
  protected async callTextLLM(
    systemPrompt: string,
    messages: ModelMessage[],
    abortSignal?: AbortSignal,
  ): Promise<LLMCallResult> {
    const result = await LLMCaller.call({
      systemPrompt,
      messages,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      maxOutputTokens: this.maxOutputTokens,
      temperature: this.temperature,
      abortSignal,
    });

    if (result.usedFallback) {
      this.log('warn', `Answer generated by fallback model ${result.usage.modelName}`);
    }

    return result;
  }

  /**
   * Generate an answer that must parse against `schema`
   */
  protected async callStructuredLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    systemPrompt: string,
    messages: ModelMessage[],
    abortSignal?: AbortSignal,
  ): Promise<LLMStructuredCallResult<TOutput>> {
    const result = await LLMCaller.callStructured({
      schema,
      systemPrompt,
      messages,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      maxOutputTokens: this.maxOutputTokens,
      temperature: this.temperature,
      abortSignal,
    });

    if (result.usedFallback) {
      this.log('warn', `Output generated by fallback model ${result.usage.modelName}`);
    }

    return result;
  }
}
