export {
  resetRuntime,
  isResetConfirmed,
  RESET_CONFIRM_PROMPT,
  type ResetOutcome,
  type ResetDependencies,
} from './resetRuntime.js';
