/**
 * Configuration Module - Public API
 */

export { ConfigManager, configManager, DEFAULT_CONFIG_PATH } from './manager.js';

export {
  UnifiedConfigSchema,
  CoreAuthConfigSchema,
  ExecutionEnvironmentSchema,
  MasqueradeConfigSchema,
  AuditConfigSchema,
  type UnifiedConfig,
  type UnifiedConfigInput,
  type CoreAuthConfig,
  type CoreAuthConfigInput,
  type MasqueradeConfig,
  type AuditConfig,
} from './schemas/index.js';
