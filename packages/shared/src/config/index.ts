export type { RagBridgeConfig } from './ragbridge-config';

export { ConfigError } from './config-error';
export { loadConfig } from './ragbridge-config';
