import { readFile } from 'fs/promises';
import { UnifiedConfigSchema, type UnifiedConfig, type CoreAuthConfig } from './schemas/index.js';
import { AuditService, AuthenticationBuilder, isExecutionEnvironment } from '../core/index.js';

export const DEFAULT_CONFIG_PATH = './config/auth.json';

export class ConfigManager {
  private config: UnifiedConfig | null = null;
  private env: NodeJS.ProcessEnv;

  /**
   * Creates a new ConfigManager
   *
   * @param options.env - Environment variables to read (default: process.env)
   */
  constructor(options?: { env?: NodeJS.ProcessEnv }) {
    this.env = options?.env ?? process.env;
  }

  /**
   * Load and validate the configuration file (cached after the first load)
   *
   * Path precedence: argument, AUTH_CONFIG_PATH, ./config/auth.json.
   * AUTH_ENVIRONMENT, when it names a valid environment, overrides auth.environment.
   *
   * @throws Error prefixed "Failed to load configuration:" on read, parse or validation errors
   */
  async loadConfig(configPath?: string): Promise<UnifiedConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.AUTH_CONFIG_PATH || DEFAULT_CONFIG_PATH;

    try {
      const configFile = await readFile(path, 'utf-8');
      const rawConfig: unknown = JSON.parse(configFile);

      const config = UnifiedConfigSchema.parse(rawConfig);
      this.applyEnvironmentOverride(config);

      this.config = config;
      console.log('[ConfigManager] Configuration loaded and validated successfully:', {
        path,
        environment: config.auth.environment,
        providerSections: Object.keys(config.providers),
      });
      return config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  getConfig(): UnifiedConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  /**
   * Get Core authentication configuration
   */
  getAuthConfig(): CoreAuthConfig {
    return this.getConfig().auth;
  }

  /**
   * Get the raw configuration section of a provider
   *
   * The provider validates its own section.
   *
   * @param name - Provider section name (e.g. 'jwt')
   * @returns Section value or undefined
   */
  getProviderConfig(name: string): unknown {
    const providers = this.getConfig().providers;
    return Object.prototype.hasOwnProperty.call(providers, name) ? providers[name] : undefined;
  }

  /**
   * Audit service configured from auth.audit (disabled when the section is absent)
   */
  createAuditService(): AuditService {
    const audit = this.getAuthConfig().audit;
    if (!audit) {
      return new AuditService();
    }
    return new AuditService({
      enabled: audit.enabled,
      logAllAttempts: audit.logAllAttempts,
      maxEntries: audit.maxEntries,
    });
  }

  /**
   * Builder pre-configured with environment, masquerade policy and audit service
   *
   * Providers are added by the caller.
   */
  createBuilder(): AuthenticationBuilder {
    const auth = this.getAuthConfig();
    return new AuthenticationBuilder(auth.environment)
      .allowMasquerade(auth.masquerade.permission)
      .restrictMasqueradeTargets(auth.masquerade.restriction)
      .withAuditService(this.createAuditService());
  }

  // Hot reload configuration (for development)
  async reloadConfig(configPath?: string): Promise<UnifiedConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  private applyEnvironmentOverride(config: UnifiedConfig): void {
    const override = this.env.AUTH_ENVIRONMENT;
    if (!override) {
      return;
    }

    if (isExecutionEnvironment(override)) {
      config.auth.environment = override;
    } else {
      console.warn(`[ConfigManager] Ignoring invalid AUTH_ENVIRONMENT value: ${override}`);
    }
  }
}

// Singleton instance
export const configManager = new ConfigManager();
