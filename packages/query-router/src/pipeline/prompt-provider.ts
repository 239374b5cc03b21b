import type { LoggerMethods } from '@ragbridge/logger';
import type { CertificateMode } from '@ragbridge/model';
import type { SecureTransport } from '@ragbridge/shared';

import { redactSensitive } from '@ragbridge/shared';
import { z } from 'zod';

import { GROUNDED_ANSWER_PROMPT } from './prompts';

const promptResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({ prompt: z.string().min(1) }),
});

export interface PromptProviderOptions {
  logger: LoggerMethods;
  transport: SecureTransport;

  /**
   * Prompt API root, without trailing slash
   */
  baseUrl: string;

  certificateMode?: CertificateMode;

  /**
   * Per-request timeout (default: 5000)
   */
  timeoutMs?: number;
}

/**
 * PromptProvider
 *
 * Fetches the grounded-answer prompt template managed by the back office.
 * Any failure other than cancellation falls back to the built-in template.
 */
export class PromptProvider {
  private readonly logger: LoggerMethods;
  private readonly transport: SecureTransport;
  private readonly baseUrl: string;
  private readonly certificateMode: CertificateMode;
  private readonly timeoutMs: number;

  constructor(options: PromptProviderOptions) {
    this.logger = options.logger;
    this.transport = options.transport;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.certificateMode = options.certificateMode ?? 'strict';
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  /**
   * Template containing a `{context}` placeholder
   */
  async getChatPrompt(abortSignal?: AbortSignal): Promise<string> {
    try {
      const response = await this.transport.fetch(
        `${this.baseUrl}/api/prompts/chat`,
        { method: 'GET', headers: { accept: 'application/json' } },
        this.certificateMode,
        { timeoutMs: this.timeoutMs, abortSignal },
      );
      const parsed = promptResponseSchema.safeParse(response.json());
      if (parsed.success) {
        this.logger.debug('[PromptProvider] Using prompt from API');
        return parsed.data.data.prompt;
      }
      this.logger.warn(
        '[PromptProvider] Prompt API returned no prompt, using built-in prompt',
      );
    } catch (error) {
      if (abortSignal?.aborted) {
        throw abortSignal.reason;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[PromptProvider] Failed to fetch prompt (${redactSensitive(message)}), using built-in prompt`,
      );
    }
    return GROUNDED_ANSWER_PROMPT;
  }
}
