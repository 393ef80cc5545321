export {
  ProcessCommandRunner,
  COMMAND_NOT_FOUND,
  isCommandNotFound,
  combinedOutput,
  type CommandRunner,
  type CommandResult,
  type RunOptions,
} from './commandRunner.js';

export { ComposeClient, describeFailure, type ComposeClientOptions } from './composeClient.js';

export {
  LogMarkerProbe,
  HttpProbe,
  createReadinessProbe,
  gatewayHttpUrl,
  waitForReady,
  type ReadinessProbe,
  type FetchLike,
  type FetchResponseLike,
  type ProbeDependencies,
  type WaitOptions,
} from './readiness.js';
