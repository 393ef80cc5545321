/**
 * Harness Configuration Loader
 *
 * Builds the HarnessConfig for one run:
 * - defaults from ./defaults.ts
 * - gateway and credential values from the project's secrets file
 * - explicit overrides (tests, embedding callers)
 *
 * The secrets file is parsed, never sourced: process.env is left untouched and
 * the resulting config object is what every step receives.
 */

import { isAbsolute, resolve } from 'path';
import { HarnessError } from '../errors.js';
import { DEFAULT_PROJECT_FILES, ENV_KEYS } from './defaults.js';
import { getEnvValue, readEnvFile } from './envFile.js';
import {
  HarnessConfigSchema,
  type HarnessConfig,
  type HarnessConfigOverrides,
} from './schema.js';

export interface LoadConfigOptions {
  /** Defaults to process.cwd() */
  projectDir?: string;
  overrides?: HarnessConfigOverrides;
  /**
   * Read gateway and credential values from the secrets file (default true).
   * Without it the config carries defaults and overrides only.
   */
  readSecretsFile?: boolean;
}

/**
 * Map secrets file values onto config sections
 */
export function buildConfigFromEnvValues(
  values: Record<string, string>
): Required<Pick<HarnessConfigOverrides, 'gateway' | 'credentials' | 'readiness'>> {
  const gateway: NonNullable<HarnessConfigOverrides['gateway']> = {};
  const image = getEnvValue(values, ENV_KEYS.image);
  const bindIp = getEnvValue(values, ENV_KEYS.bindIp);
  const port = getEnvValue(values, ENV_KEYS.gatewayPort);
  const bridgePort = getEnvValue(values, ENV_KEYS.bridgePort);
  const token = getEnvValue(values, ENV_KEYS.gatewayToken);

  if (image) gateway.image = image;
  if (bindIp) gateway.bindIp = bindIp;
  if (port) gateway.port = Number(port);
  if (bridgePort) gateway.bridgePort = Number(bridgePort);
  if (token) gateway.token = token;

  const readiness: NonNullable<HarnessConfigOverrides['readiness']> = {};
  const probe = getEnvValue(values, ENV_KEYS.readinessProbe);
  if (probe === 'log' || probe === 'http') {
    readiness.probe = probe;
  } else if (probe) {
    throw new HarnessError(
      'precondition',
      `${ENV_KEYS.readinessProbe} must be "log" or "http" (got "${probe}")`
    );
  }

  return {
    gateway,
    credentials: { apiKey: values[ENV_KEYS.apiKey]?.trim() },
    readiness,
  };
}

/**
 * Load and validate the harness configuration for a project directory
 */
export function loadHarnessConfig(options: LoadConfigOptions = {}): HarnessConfig {
  const projectDir = resolve(options.projectDir ?? process.cwd());
  const overrides = options.overrides ?? {};
  const envFileName = overrides.project?.envFile ?? DEFAULT_PROJECT_FILES.envFile;
  const envFile =
    options.readSecretsFile === false
      ? undefined
      : readEnvFile(resolveProjectPath(projectDir, envFileName));
  const fromEnv = buildConfigFromEnvValues(envFile?.values ?? {});

  const result = HarnessConfigSchema.safeParse({
    project: { dir: projectDir, ...overrides.project },
    runtime: { ...overrides.runtime },
    gateway: { ...fromEnv.gateway, ...overrides.gateway },
    credentials: { ...fromEnv.credentials, ...overrides.credentials },
    readiness: { ...fromEnv.readiness, ...overrides.readiness },
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new HarnessError('precondition', 'Invalid configuration', {
      hint: `Fix these values in ${envFileName}:\n${details}`,
    });
  }

  return result.data;
}

/**
 * Copy of the config with the gateway token set
 */
export function withGatewayToken(config: HarnessConfig, token: string): HarnessConfig {
  return { ...config, gateway: { ...config.gateway, token } };
}

function resolveProjectPath(projectDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(projectDir, path);
}

export interface HarnessPaths {
  projectDir: string;
  envFile: string;
  envExampleFile: string;
  templateFile: string;
  composeFile: string;
  dataDir: string;
  runtimeConfigFile: string;
}

/**
 * Absolute paths for every file the harness touches
 */
export function getHarnessPaths(config: HarnessConfig): HarnessPaths {
  const projectDir = config.project.dir;
  const dataDir = resolveProjectPath(projectDir, config.runtime.dataDir);
  return {
    projectDir,
    envFile: resolveProjectPath(projectDir, config.project.envFile),
    envExampleFile: resolveProjectPath(projectDir, config.project.envExampleFile),
    templateFile: resolveProjectPath(projectDir, config.project.templateFile),
    composeFile: resolveProjectPath(projectDir, config.project.composeFile),
    dataDir,
    runtimeConfigFile: resolve(dataDir, config.runtime.configFileName),
  };
}
