import type { LoggerMethods } from '@ragbridge/logger';
import type {
  BackendVersion,
  OrganizationUsageReport,
  TokenUsage,
  TokenUsageReport,
  VersionUsageReport,
} from '@ragbridge/model';

/**
 * One routed query, as seen by the aggregator
 */
export interface TrackedQueryUsage {
  organizationId: string;
  version: BackendVersion;
  usage: TokenUsage;

  /**
   * False when the backend reported no usage (counts are zero)
   */
  usageAvailable: boolean;
}

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface OrganizationAggregate {
  organizationId: string;
  versions: Map<BackendVersion, VersionUsageReport>;
  total: TokenUsage;
}

/**
 * TokenUsageAggregator - Aggregates token usage across routed queries
 *
 * Tracks usage by:
 * - Organization
 * - Backend version (v1 local pipeline, v2 remote service)
 *
 * Queries whose backend reported no usage are counted separately so a
 * zero total can be told apart from missing data.
 *
 * @example
 * ```typescript
 * const aggregator = new TokenUsageAggregator();
 *
 * aggregator.track({
 *   organizationId: 'org-1',
 *   version: 'v2',
 *   usage: { inputTokens: 1234, outputTokens: 567, totalTokens: 1801 },
 *   usageAvailable: true,
 * });
 *
 * aggregator.logSummary(logger);
 * // [QueryRouter] Token usage summary:
 * // org-1:
 * //   - v2 (1 queries): 1234 input, 567 output, 1801 total
 * //   org-1 total: 1234 input, 567 output, 1801 total
 * // Grand total: 1234 input, 567 output, 1801 total
 * ```
 */
export class TokenUsageAggregator {
  private readonly usage = new Map<string, OrganizationAggregate>();

  /**
   * Track token usage from one routed query
   */
  track(entry: TrackedQueryUsage): void {
    let organization = this.usage.get(entry.organizationId);
    if (!organization) {
      organization = {
        organizationId: entry.organizationId,
        versions: new Map(),
        total: emptyUsage(),
      };
      this.usage.set(entry.organizationId, organization);
    }

    let version = organization.versions.get(entry.version);
    if (!version) {
      version = {
        version: entry.version,
        queries: 0,
        queriesWithoutUsage: 0,
        total: emptyUsage(),
      };
      organization.versions.set(entry.version, version);
    }

    version.queries += 1;
    if (!entry.usageAvailable) {
      version.queriesWithoutUsage += 1;
    }
    addUsage(version.total, entry.usage);
    addUsage(organization.total, entry.usage);
  }

  /**
   * Get token usage report in structured JSON format
   *
   * The report is a copy; later tracking does not change it.
   */
  getReport(): TokenUsageReport {
    const organizations: OrganizationUsageReport[] = [
      ...this.usage.values(),
    ].map((organization) => ({
      organizationId: organization.organizationId,
      versions: [...organization.versions.values()].map((version) => ({
        ...version,
        total: { ...version.total },
      })),
      total: { ...organization.total },
    }));

    return { organizations, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all organizations and versions
   */
  getTotalUsage(): TokenUsage {
    const total = emptyUsage();
    for (const organization of this.usage.values()) {
      addUsage(total, organization.total);
    }
    return total;
  }

  /**
   * Log token usage grouped by organization, with version breakdown.
   */
  logSummary(logger: LoggerMethods): void {
    if (this.usage.size === 0) {
      logger.info('[QueryRouter] No token usage to report');
      return;
    }

    logger.info('[QueryRouter] Token usage summary:');

    for (const organization of this.usage.values()) {
      logger.info(`${organization.organizationId}:`);

      for (const version of organization.versions.values()) {
        const missing =
          version.queriesWithoutUsage > 0
            ? `, ${version.queriesWithoutUsage} without usage`
            : '';
        logger.info(
          `  - ${version.version} (${version.queries} queries${missing}): ${formatTokens(version.total)}`,
        );
      }

      logger.info(
        `  ${organization.organizationId} total: ${formatTokens(organization.total)}`,
      );
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.usage.clear();
  }
}
