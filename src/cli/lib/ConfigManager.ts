/**
 * Configuration Manager
 *
 * Persists CLI settings with the 'conf' package: the tenant URL, a default
 * username, and defaults for the configure command.
 *
 * The config file is stored at:
 * - macOS: ~/Library/Preferences/integration-configurator-nodejs/config.json
 * - Windows: %APPDATA%/integration-configurator-nodejs/Config/config.json
 * - Linux: ~/.config/integration-configurator-nodejs/config.json
 */

import Conf from 'conf';
import { CliConfig, ConfigureDefaults } from '../types/index.js';

const defaults: CliConfig = {
  configure: {},
};

const config = new Conf<CliConfig>({
  projectName: 'integration-configurator',
  defaults,
});

/**
 * ConfigManager provides typed access to CLI configuration
 */
export const ConfigManager = {
  getAll(): CliConfig {
    return config.store;
  },

  get<K extends keyof CliConfig>(key: K): CliConfig[K] {
    return config.get(key);
  },

  set<K extends keyof CliConfig>(key: K, value: CliConfig[K]): void {
    config.set(key, value);
  },

  delete<K extends keyof CliConfig>(key: K): void {
    config.delete(key);
  },

  /**
   * Reset all configuration to defaults
   */
  reset(): void {
    config.clear();
  },

  getPath(): string {
    return config.path;
  },

  // ==========================================================================
  // configure command defaults
  // ==========================================================================

  getConfigureDefaults(): ConfigureDefaults {
    return config.get('configure') ?? {};
  },

  setConfigureDefault<K extends keyof ConfigureDefaults>(key: K, value: ConfigureDefaults[K]): void {
    config.set('configure', { ...this.getConfigureDefaults(), [key]: value });
  },

  deleteConfigureDefault(key: keyof ConfigureDefaults): void {
    const next = { ...this.getConfigureDefaults() };
    delete next[key];
    config.set('configure', next);
  },

  // ==========================================================================
  // URL helpers
  // ==========================================================================

  getServerUrl(): string | undefined {
    return config.get('url');
  },

  setServerUrl(url: string): void {
    config.set('url', url.replace(/\/+$/, ''));
  },
};

export default ConfigManager;
