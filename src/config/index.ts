export {
  resolveClientConfig,
  loadClientConfigFromEnv,
  DEFAULT_MAX_RATE_LIMITER_WAIT_MS,
} from './config.js';
export type { ClientConfig, ResolvedClientConfig } from './config.js';
