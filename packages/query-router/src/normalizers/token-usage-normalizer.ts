import type { LoggerMethods } from '@ragbridge/logger';
import type {
  BackendVersion,
  RawBackendResponse,
  TokenUsage,
} from '@ragbridge/model';

/**
 * Key names each backend uses inside its `usage` mapping.
 * Earlier keys win when several are present.
 */
const USAGE_KEYS: Record<
  BackendVersion,
  { input: readonly string[]; output: readonly string[]; total: string }
> = {
  v1: {
    input: ['prompt_tokens'],
    output: ['completion_tokens'],
    total: 'total_tokens',
  },
  v2: {
    input: ['prompt_tokens', 'input_tokens'],
    output: ['completion_tokens', 'output_tokens'],
    total: 'total_tokens',
  },
};

export interface UsageAnalysis {
  usage: TokenUsage;

  /**
   * False when the payload had no usage mapping or no recognized key
   */
  usageAvailable: boolean;

  /**
   * Set when a supplied total disagrees with input + output
   */
  consistencyWarning?: string;
}

export interface TokenUsageNormalizerOptions {
  logger: LoggerMethods;

  /**
   * Allowed gap between a supplied total and input + output (default: 0)
   */
  toleranceTokens?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a token count. Numeric strings are accepted and fractions truncated;
 * negative, non-finite and non-numeric values count as missing.
 */
function readCount(value: unknown): number | undefined {
  let count: number;
  if (typeof value === 'number') {
    count = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    count = Number(value.trim());
  } else {
    return undefined;
  }

  if (!Number.isFinite(count) || count < 0) {
    return undefined;
  }
  return Math.trunc(count);
}

function firstCount(
  usage: Record<string, unknown>,
  keys: readonly string[],
): number | undefined {
  for (const key of keys) {
    const count = readCount(usage[key]);
    if (count !== undefined) {
      return count;
    }
  }
  return undefined;
}

/**
 * TokenUsageNormalizer
 *
 * Maps each backend's usage vocabulary onto {@link TokenUsage}. Never throws:
 * missing or malformed usage becomes zero counts with `usageAvailable` false.
 */
export class TokenUsageNormalizer {
  private readonly logger: LoggerMethods;
  private readonly toleranceTokens: number;

  constructor(options: TokenUsageNormalizerOptions) {
    this.logger = options.logger;
    this.toleranceTokens = options.toleranceTokens ?? 0;
  }

  normalize(raw: RawBackendResponse, version: BackendVersion): TokenUsage {
    return this.analyze(raw, version).usage;
  }

  analyze(raw: RawBackendResponse, version: BackendVersion): UsageAnalysis {
    const usage = raw.usage;
    if (!isRecord(usage)) {
      return { usage: this.emptyUsage(), usageAvailable: false };
    }

    const keys = USAGE_KEYS[version];
    const input = firstCount(usage, keys.input);
    const output = firstCount(usage, keys.output);
    const suppliedTotal = readCount(usage[keys.total]);

    if (
      input === undefined &&
      output === undefined &&
      suppliedTotal === undefined
    ) {
      return { usage: this.emptyUsage(), usageAvailable: false };
    }

    const inputTokens = input ?? 0;
    const outputTokens = output ?? 0;
    const sum = inputTokens + outputTokens;

    if (suppliedTotal === undefined || (suppliedTotal === 0 && sum > 0)) {
      return {
        usage: { inputTokens, outputTokens, totalTokens: sum },
        usageAvailable: true,
      };
    }

    const analysis: UsageAnalysis = {
      usage: { inputTokens, outputTokens, totalTokens: suppliedTotal },
      usageAvailable: true,
    };

    if (Math.abs(suppliedTotal - sum) > this.toleranceTokens) {
      analysis.consistencyWarning = `${version} reported total_tokens ${suppliedTotal}, expected ${sum} (input ${inputTokens} + output ${outputTokens})`;
      this.logger.warn(
        `[TokenUsageNormalizer] ${analysis.consistencyWarning}`,
      );
    }

    return analysis;
  }

  private emptyUsage(): TokenUsage {
    return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  }
}
