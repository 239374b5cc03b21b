import type { LogLevel } from '@ragbridge/logger';
import type { BackendVersion, CertificateMode } from '@ragbridge/model';

import { BACKEND_VERSIONS, CERTIFICATE_MODES } from '@ragbridge/model';
import { z } from 'zod';

import { ConfigError } from './config-error';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/**
 * Runtime configuration, resolved once at startup.
 */
export interface RagBridgeConfig {
  /** Backend used when a request does not name one */
  ragVersion: BackendVersion;

  /** Allowed difference between a reported total and input + output */
  toleranceTokens: number;

  certificateMode: CertificateMode;
  ingestionTimeoutMs: number;
  queryTimeoutMs: number;

  parsingServiceUrl: string;
  parsingApiKey?: string;

  /** Base URL of the v2 graph retrieval service */
  remoteServiceUrl: string;

  /** Base URL of the prompt API used by the v1 pipeline */
  promptApiUrl: string;

  systemCaPath?: string;
  openaiModel: string;
  openaiApiKey?: string;
  logLevel: LogLevel;
}

/** Blank variables count as unset */
function unsetIfBlank(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(unsetIfBlank, schema);
}

const baseUrl = (fallback: string) =>
  env(
    z
      .string()
      .trim()
      .url()
      .default(fallback)
      .transform((url) => url.replace(/\/+$/, '')),
  );

const milliseconds = (fallback: number) =>
  env(z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  RAG_VERSION: env(
    z.string().trim().toLowerCase().pipe(z.enum(BACKEND_VERSIONS)).default('v1'),
  ),
  TOKEN_TOLERANCE: env(z.coerce.number().int().nonnegative().default(0)),
  CERTIFICATE_MODE: env(
    z
      .string()
      .trim()
      .toLowerCase()
      .pipe(z.enum(CERTIFICATE_MODES))
      .default('strict'),
  ),
  INGESTION_TIMEOUT_MS: milliseconds(60000),
  QUERY_TIMEOUT_MS: milliseconds(8000),
  PARSING_SERVICE_URL: baseUrl('https://api.cloud.llamaindex.ai'),
  LLAMA_CLOUD_API_KEY: env(z.string().optional()),
  NODERAG_SERVICE_URL: baseUrl('http://localhost:5001'),
  BACKEND_API_URL: baseUrl('http://localhost:8083'),
  SYSTEM_CA_PATH: env(z.string().optional()),
  OPENAI_MODEL: env(z.string().trim().default('gpt-3.5-turbo')),
  OPENAI_API_KEY: env(z.string().optional()),
  LOG_LEVEL: env(
    z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  ),
});

/**
 * Validate environment variables and build a frozen {@link RagBridgeConfig}.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): Readonly<RagBridgeConfig> {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
      { cause: parsed.error },
    );
  }

  const vars = parsed.data;

  return Object.freeze({
    ragVersion: vars.RAG_VERSION,
    toleranceTokens: vars.TOKEN_TOLERANCE,
    certificateMode: vars.CERTIFICATE_MODE,
    ingestionTimeoutMs: vars.INGESTION_TIMEOUT_MS,
    queryTimeoutMs: vars.QUERY_TIMEOUT_MS,
    parsingServiceUrl: vars.PARSING_SERVICE_URL,
    parsingApiKey: vars.LLAMA_CLOUD_API_KEY,
    remoteServiceUrl: vars.NODERAG_SERVICE_URL,
    promptApiUrl: vars.BACKEND_API_URL,
    systemCaPath: vars.SYSTEM_CA_PATH,
    openaiModel: vars.OPENAI_MODEL,
    openaiApiKey: vars.OPENAI_API_KEY,
    logLevel: vars.LOG_LEVEL,
  });
}
