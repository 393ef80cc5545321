/**
 * Configuration Schema Definitions
 *
 * Zod schemas for the harness configuration. One validated HarnessConfig is
 * built per run and passed to every setup step.
 */

import { z } from 'zod';
import {
  DEFAULT_GATEWAY,
  DEFAULT_PROJECT_FILES,
  DEFAULT_READINESS,
  DEFAULT_RUNTIME,
} from './defaults.js';

const PortSchema = z.coerce
  .number()
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535');

const FileModeSchema = z.number().int().min(0).max(0o777);

// =============================================================================
// Project Files
// =============================================================================

export const ProjectConfigSchema = z.object({
  /** Absolute path of the directory holding the compose file and secrets */
  dir: z.string().min(1, 'Project directory is required'),
  envFile: z.string().min(1).default(DEFAULT_PROJECT_FILES.envFile),
  envExampleFile: z.string().min(1).default(DEFAULT_PROJECT_FILES.envExampleFile),
  /** Versioned runtime-config template copied on first run */
  templateFile: z.string().min(1).default(DEFAULT_PROJECT_FILES.templateFile),
  composeFile: z.string().min(1).default(DEFAULT_PROJECT_FILES.composeFile),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// =============================================================================
// Runtime Directory
// =============================================================================

export const RuntimeConfigSchema = z.object({
  /** Relative to the project directory */
  dataDir: z.string().min(1).default(DEFAULT_RUNTIME.dataDir),
  configFileName: z.string().min(1).default(DEFAULT_RUNTIME.configFileName),
  subdirectories: z.array(z.string().min(1)).default([...DEFAULT_RUNTIME.subdirectories]),
  ownerUid: z.number().int().nonnegative().default(DEFAULT_RUNTIME.ownerUid),
  ownerGid: z.number().int().nonnegative().default(DEFAULT_RUNTIME.ownerGid),
  dirMode: FileModeSchema.default(DEFAULT_RUNTIME.dirMode),
  fileMode: FileModeSchema.default(DEFAULT_RUNTIME.fileMode),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

// =============================================================================
// Gateway Service
// =============================================================================

export const GatewayConfigSchema = z.object({
  service: z.string().min(1).default(DEFAULT_GATEWAY.service),
  cliService: z.string().min(1).default(DEFAULT_GATEWAY.cliService),
  containerName: z.string().min(1).default(DEFAULT_GATEWAY.containerName),
  image: z.string().min(1).default(DEFAULT_GATEWAY.image),
  bindIp: z.string().min(1).default(DEFAULT_GATEWAY.bindIp),
  port: PortSchema.default(DEFAULT_GATEWAY.port),
  bridgePort: PortSchema.default(DEFAULT_GATEWAY.bridgePort),
  /** Gateway auth token; absent until the secret provisioner runs */
  token: z.string().min(1).optional(),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// =============================================================================
// Credentials
// =============================================================================

export const CredentialsConfigSchema = z.object({
  /** AI-provider API key (may still be a placeholder; the validator decides) */
  apiKey: z.string().optional(),
});

export type CredentialsConfig = z.infer<typeof CredentialsConfigSchema>;

// =============================================================================
// Readiness
// =============================================================================

export const ReadinessProbeKindSchema = z.enum(['log', 'http']);

export type ReadinessProbeKind = z.infer<typeof ReadinessProbeKindSchema>;

export const ReadinessConfigSchema = z.object({
  probe: ReadinessProbeKindSchema.default(DEFAULT_READINESS.probe),
  marker: z.string().min(1).default(DEFAULT_READINESS.marker),
  attempts: z.number().int().positive().default(DEFAULT_READINESS.attempts),
  intervalMs: z.number().int().positive().default(DEFAULT_READINESS.intervalMs),
  settleMs: z.number().int().nonnegative().default(DEFAULT_READINESS.settleMs),
  doctorOutputLines: z.number().int().positive().default(DEFAULT_READINESS.doctorOutputLines),
});

export type ReadinessConfig = z.infer<typeof ReadinessConfigSchema>;

// =============================================================================
// Complete Harness Configuration
// =============================================================================

export const HarnessConfigSchema = z.object({
  project: ProjectConfigSchema,
  runtime: RuntimeConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  credentials: CredentialsConfigSchema.default({}),
  readiness: ReadinessConfigSchema.default({}),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

/**
 * Per-section overrides applied on top of the secrets file
 */
export interface HarnessConfigOverrides {
  project?: Partial<z.input<typeof ProjectConfigSchema>>;
  runtime?: Partial<z.input<typeof RuntimeConfigSchema>>;
  gateway?: Partial<z.input<typeof GatewayConfigSchema>>;
  credentials?: Partial<z.input<typeof CredentialsConfigSchema>>;
  readiness?: Partial<z.input<typeof ReadinessConfigSchema>>;
}
