import type { LoggerMethods } from '@ragbridge/logger';

import type { RagBridgeConfig } from '../config';

import { SecureTransport } from './secure-transport';

/**
 * Transport configured from the runtime configuration
 */
export function createSecureTransport(
  config: Pick<RagBridgeConfig, 'systemCaPath'>,
  logger: LoggerMethods,
): SecureTransport {
  return new SecureTransport({ logger, systemCaPath: config.systemCaPath });
}
