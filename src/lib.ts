/**
 * plan-digest Library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Analysis engine (main entry point)
export * from './metrics/index.js';

// Record sources
export * from './source/index.js';

// Platform client
export * from './client/index.js';

// Summary and email digest
export * from './digest/index.js';

// Configuration
export {
  loadConfig,
  getConfig,
  resetConfig,
  requireCredentials,
  type PlanDigestConfig,
  type ApiConfig,
  type DigestConfig,
} from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
