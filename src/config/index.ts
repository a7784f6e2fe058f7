/**
 * @fileoverview Lineage investigator configuration
 *
 * - `agent_config`: loop limits, timeouts, provider and store settings
 */

export {
  DEFAULT_CONFIG,
  LineageConfigSchema,
  loadConfig,
  type LineageConfig,
} from './agent_config.js';
