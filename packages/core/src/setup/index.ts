export { validateEnvironment, type EnvironmentReport } from './environmentValidator.js';
export { provisionGatewayToken, type SecretProvisionResult } from './secretProvisioner.js';
export {
  initializeRuntimeDirectory,
  chownRecursive,
  type RuntimeDirectoryResult,
  type RuntimeDirectoryDependencies,
} from './runtimeDirectory.js';
export {
  startGateway,
  type GatewayStartResult,
  type ContainerLifecycleDependencies,
} from './containerLifecycle.js';
export {
  runPostStartChecks,
  DOCTOR_ARGS,
  type PostStartResult,
  type PostStartDependencies,
} from './postStartValidator.js';
export {
  buildSetupSummary,
  renderSetupSummary,
  renderBanner,
  type SetupSummary,
} from './summary.js';
export { runSetup, type SetupOutcome } from './pipeline.js';
export type { SetupDependencies, ChownFn } from './types.js';
