/**
 * Token usage types shared by the normalizer, the router and the usage
 * aggregator.
 */

import type { BackendVersion } from './backend-version';

/**
 * Canonical token usage for one query
 *
 * Every backend vocabulary (`prompt_tokens`, `input_tokens`,
 * `completion_tokens`, `output_tokens`, ...) is mapped onto this shape.
 */
export interface TokenUsage {
  /**
   * Tokens in the prompt (system + context + user input)
   */
  inputTokens: number;

  /**
   * Tokens in the generated answer
   */
  outputTokens: number;

  /**
   * Total tokens
   *
   * Equals inputTokens + outputTokens unless the backend reported its own
   * total (some backends count overhead tokens).
   */
  totalTokens: number;
}

/**
 * Usage for one backend version within an organization
 */
export interface VersionUsageReport {
  version: BackendVersion;

  /**
   * Number of routed queries
   */
  queries: number;

  /**
   * Queries whose backend reported no usage at all
   */
  queriesWithoutUsage: number;

  total: TokenUsage;
}

/**
 * Usage for one organization, broken down by backend version
 */
export interface OrganizationUsageReport {
  organizationId: string;
  versions: VersionUsageReport[];
  total: TokenUsage;
}

/**
 * Usage report across every tracked query
 *
 * Organizations are ordered by first appearance.
 */
export interface TokenUsageReport {
  organizations: OrganizationUsageReport[];
  total: TokenUsage;
}
