import type { LoggerMethods } from '@ragbridge/logger';
import type { RawBackendResponse } from '@ragbridge/model';
import type { LanguageModel, ModelMessage } from 'ai';

import type { BaseLLMComponentOptions } from '../core/base-llm-component';
import type {
  ContextRetriever,
  LocalPipeline,
  LocalPipelineRequest,
} from './local-pipeline';
import type { PromptProvider } from './prompt-provider';

import { LLMCaller } from '@ragbridge/shared';

import { TextLLMComponent } from '../core/text-llm-component';
import { SIMPLE_ASSISTANT_PROMPT, applyContext } from './prompts';

export interface LlmAnswerPipelineOptions extends BaseLLMComponentOptions {
  /**
   * Source of retrieved context; without one every query runs in simple mode
   */
  retriever?: ContextRetriever;

  promptProvider: PromptProvider;
}

/**
 * LlmAnswerPipeline
 *
 * Local (v1) backend: retrieve context, pick a system prompt, generate.
 *
 * - With context: prompt template from the prompt API with the context
 *   substituted, or the built-in grounded prompt
 * - Without context: a short assistant prompt ("simple mode")
 */
export class LlmAnswerPipeline
  extends TextLLMComponent
  implements LocalPipeline
{
  private readonly retriever?: ContextRetriever;
  private readonly promptProvider: PromptProvider;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options: LlmAnswerPipelineOptions,
    fallbackModel?: LanguageModel,
  ) {
    super(logger, model, 'LlmAnswerPipeline', options, fallbackModel);
    this.retriever = options.retriever;
    this.promptProvider = options.promptProvider;
  }

  async generate(request: LocalPipelineRequest): Promise<RawBackendResponse> {
    const context = this.retriever
      ? await this.retriever.retrieve(
          request.query,
          request.organizationId,
          request.abortSignal,
        )
      : '';
    this.log('debug', `Context length: ${context.length} chars`);

    const systemPrompt = context
      ? this.buildSystemPrompt(
          context,
          await this.promptProvider.getChatPrompt(request.abortSignal),
        )
      : SIMPLE_ASSISTANT_PROMPT;

    const messages: ModelMessage[] = request.conversationHistory.map(
      (turn): ModelMessage =>
        turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content },
    );
    messages.push({ role: 'user', content: this.buildUserPrompt(request.query) });

    const result = await this.callTextLLM(
      systemPrompt,
      messages,
      request.abortSignal,
    );

    return {
      answer: result.text,
      usage: {
        prompt_tokens: result.usage.inputTokens,
        completion_tokens: result.usage.outputTokens,
        total_tokens: result.usage.totalTokens,
      },
      metadata: {
        model: result.usage.modelName,
        context_used: context.length > 0,
        context_length: context.length,
        parameters: {
          max_tokens: this.maxOutputTokens,
          temperature: this.temperature,
        },
      },
    };
  }

  /**
   * Check the model provider with a one-token generation.
   * Rejects when the primary model cannot be reached.
   */
  async checkHealth(abortSignal?: AbortSignal): Promise<void> {
    await LLMCaller.call({
      systemPrompt: SIMPLE_ASSISTANT_PROMPT,
      messages: [{ role: 'user', content: 'ping' }],
      primaryModel: this.model,
      maxRetries: 0,
      maxOutputTokens: 1,
      temperature: 0,
      abortSignal,
    });
  }

  protected buildSystemPrompt(context: string, template: string): string {
    return applyContext(template, context);
  }

  protected buildUserPrompt(query: string): string {
    return query.trim();
  }
}
