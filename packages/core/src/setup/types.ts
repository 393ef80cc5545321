/**
 * Dependencies shared by the setup steps
 */

import type { ComposeClient, FetchLike } from '../docker/index.js';
import type { ServiceLogger } from '../logger/index.js';
import type { Clock, Sleep } from '../utils/index.js';

/**
 * Change ownership of a tree. Throws when the process lacks permission.
 */
export type ChownFn = (path: string, uid: number, gid: number) => void;

export interface SetupDependencies {
  compose: ComposeClient;
  logger: ServiceLogger;
  sleep: Sleep;
  /** Readiness deadline clock, Date.now unless set */
  now?: Clock;
  /** Raw output lines (doctor output, summary) */
  print: (line: string) => void;
  platform: NodeJS.Platform;
  /** undefined where the platform has no POSIX uids */
  currentUid: number | undefined;
  chown: ChownFn;
  fetch?: FetchLike;
  generateToken?: () => string;
}
