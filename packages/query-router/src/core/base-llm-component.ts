import type { LoggerMethods } from '@ragbridge/logger';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0.7)
   */
  temperature?: number;

  /**
   * Upper bound for generated tokens (default: 1024)
   */
  maxOutputTokens?: number;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Standard configuration (model, fallback, retries, sampling)
 *
 * Subclasses must implement buildSystemPrompt() and buildUserPrompt().
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly maxOutputTokens: number;
  protected readonly componentName: string;

  /**
   * Constructor for BaseLLMComponent
   *
   * @param logger - Logger instance for logging
   * @param model - Primary language model for LLM calls
   * @param componentName - Name of the component for logging (e.g., "LlmAnswerPipeline")
   * @param options - Optional configuration (maxRetries, temperature, maxOutputTokens)
   * @param fallbackModel - Optional fallback model for retry on failure
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0.7;
    this.maxOutputTokens = options?.maxOutputTokens ?? 1024;
    this.fallbackModel = fallbackModel;
  }

  /**
   * Log a message with consistent component name prefix
   *
   * @param level - Log level
   * @param message - Message to log (without prefix)
   * @param args - Additional arguments to pass to logger
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Build system prompt for LLM call
   *
   * Subclasses must implement this to provide component-specific system prompts.
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build user prompt for LLM call
   *
   * Subclasses must implement this to construct prompts from input data.
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}
