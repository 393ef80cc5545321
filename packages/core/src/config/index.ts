/**
 * Configuration Module
 *
 * Central export for all configuration-related functionality.
 */

export {
  loadHarnessConfig,
  buildConfigFromEnvValues,
  withGatewayToken,
  getHarnessPaths,
  type LoadConfigOptions,
  type HarnessPaths,
} from './loader.js';

export {
  parseEnvFile,
  readEnvFile,
  getEnvValue,
  upsertEnvValue,
  writeEnvValue,
  isPlaceholder,
  type EnvFileContents,
} from './envFile.js';

export * from './schema.js';

export * from './defaults.js';
