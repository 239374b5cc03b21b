import type { LanguageModel, LanguageModelUsage, ModelMessage } from 'ai';
import type { z } from 'zod';

import { NoObjectGeneratedError, Output, generateText } from 'ai';

/**
 * Configuration for a text answer call with retry and fallback support
 */
export interface LLMCallConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * Conversation so far, ending with the user's question
   */
  messages: ModelMessage[];

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model for retry after primary model exhausts maxRetries (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model
   */
  maxRetries: number;

  maxOutputTokens?: number;
  temperature?: number;
  abortSignal?: AbortSignal;
}

/**
 * Configuration for a call whose answer must match a zod schema
 */
export interface LLMStructuredCallConfig<TOutput> extends LLMCallConfig {
  schema: z.ZodType<TOutput>;
}

/**
 * Token usage of one call, tagged with the model that produced it
 */
export interface ModelTokenUsage {
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult {
  text: string;
  usage: ModelTokenUsage;
  usedFallback: boolean;
}

/**
 * Result of a structured call
 */
export interface LLMStructuredCallResult<TOutput> {
  output: TOutput;
  usage: ModelTokenUsage;
  usedFallback: boolean;
}

/**
 * LLMCaller - Text generation with retry and fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model with maxRetries
 * 2. If all attempts fail and fallbackModel provided, try fallback with maxRetries
 * 3. Return usage data with model type indicator
 *
 * Cancellation is never retried on the fallback model.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   systemPrompt: 'Answer using only the provided context.',
 *   messages: [{ role: 'user', content: 'What is your return policy?' }],
 *   primaryModel: openai('gpt-4o-mini'),
 *   fallbackModel: openai('gpt-3.5-turbo'),
 *   maxRetries: 2,
 * });
 *
 * console.log(result.text);
 * console.log(result.usage); // { model: 'primary', modelName: 'gpt-4o-mini', ... }
 * ```
 */
export class LLMCaller {
  /**
   * Maximum number of retries when the answer does not match the schema.
   * Total attempts per model = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 2;

  /**
   * Model id of a provider model, or the id string itself
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    model: LanguageModel,
    usage: LanguageModelUsage,
    usedFallback: boolean,
  ): ModelTokenUsage {
    return {
      model: usedFallback ? 'fallback' : 'primary',
      modelName: this.extractModelName(model),
      inputTokens: usage.inputTokens ?? 0,
      outputTokens: usage.outputTokens ?? 0,
      totalTokens: usage.totalTokens ?? 0,
    };
  }

  private static async generate(
    config: LLMCallConfig,
    model: LanguageModel,
    usedFallback: boolean,
  ): Promise<LLMCallResult> {
    const response = await generateText({
      model,
      system: config.systemPrompt,
      messages: config.messages,
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    });

    return {
      text: response.text,
      usage: this.buildUsage(model, response.usage, usedFallback),
      usedFallback,
    };
  }

  /**
   * Generate with `Output.object()`, retrying on schema mismatch
   *
   * @throws the last NoObjectGeneratedError when every attempt mismatches
   */
  private static async generateStructured<TOutput>(
    config: LLMStructuredCallConfig<TOutput>,
    model: LanguageModel,
    usedFallback: boolean,
  ): Promise<LLMStructuredCallResult<TOutput>> {
    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const response = await generateText({
          model,
          system: config.systemPrompt,
          messages: config.messages,
          maxOutputTokens: config.maxOutputTokens,
          temperature: config.temperature,
          maxRetries: config.maxRetries,
          abortSignal: config.abortSignal,
          experimental_output: Output.object({ schema: config.schema }),
        });

        return {
          output: response.experimental_output,
          usage: this.buildUsage(model, response.usage, usedFallback),
          usedFallback,
        };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  private static async executeWithFallback<TResult>(
    config: LLMCallConfig,
    generateFn: (model: LanguageModel, usedFallback: boolean) => Promise<TResult>,
  ): Promise<TResult> {
    try {
      return await generateFn(config.primaryModel, false);
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      return generateFn(config.fallbackModel, true);
    }
  }

  /**
   * Generate a text answer, falling back to the secondary model on failure
   *
   * @throws the primary model's error when there is no fallback or the call was aborted
   */
  static async call(config: LLMCallConfig): Promise<LLMCallResult> {
    return this.executeWithFallback(config, (model, usedFallback) =>
      this.generate(config, model, usedFallback),
    );
  }

  /**
   * Generate an answer parsed against `config.schema`, with the same
   * fallback rules as {@link LLMCaller.call}
   */
  static async callStructured<TOutput>(
    config: LLMStructuredCallConfig<TOutput>,
  ): Promise<LLMStructuredCallResult<TOutput>> {
    return this.executeWithFallback(config, (model, usedFallback) =>
      this.generateStructured(config, model, usedFallback),
    );
  }
}
