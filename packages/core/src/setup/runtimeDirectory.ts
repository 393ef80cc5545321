/**
 * Runtime Directory Initializer
 *
 * Step 3 of setup. Creates the state tree the gateway container mounts
 * (credentials, paired devices, sessions, workspace) and seeds its config from
 * the versioned template. An existing tree is left exactly as it is.
 */

import {
  chmodSync,
  copyFileSync,
  existsSync,
  lchownSync,
  mkdirSync,
  readdirSync,
  statSync,
} from 'fs';
import { join, relative } from 'path';
import { getHarnessPaths } from '../config/index.js';
import type { HarnessConfig } from '../config/index.js';
import { HarnessError, fail, ok, type StepResult } from '../errors.js';
import type { ServiceLogger } from '../logger/index.js';
import type { ChownFn } from './types.js';

export interface RuntimeDirectoryResult {
  dataDir: string;
  /** True when this run created the tree */
  firstRun: boolean;
}

export interface RuntimeDirectoryDependencies {
  logger: ServiceLogger;
  platform: NodeJS.Platform;
  currentUid: number | undefined;
  chown: ChownFn;
}

/**
 * Recursive lchown. Symlinks are changed themselves, never followed.
 */
export const chownRecursive: ChownFn = (path, uid, gid) => {
  lchownSync(path, uid, gid);
  if (!statSync(path).isDirectory()) {
    return;
  }
  for (const entry of readdirSync(path, { withFileTypes: true })) {
    const child = join(path, entry.name);
    if (entry.isDirectory()) {
      chownRecursive(child, uid, gid);
    } else {
      lchownSync(child, uid, gid);
    }
  }
};

export function initializeRuntimeDirectory(
  config: HarnessConfig,
  deps: RuntimeDirectoryDependencies
): StepResult<RuntimeDirectoryResult> {
  const { logger } = deps;
  const { runtime } = config;
  const paths = getHarnessPaths(config);
  const displayDir = relative(paths.projectDir, paths.dataDir) || paths.dataDir;

  logger.info('Preparing runtime data directory...');

  if (existsSync(paths.dataDir)) {
    if (!statSync(paths.dataDir).isDirectory()) {
      return fail(
        new HarnessError('precondition', `${displayDir} exists but is not a directory.`, {
          hint: `Move it aside or remove it, then re-run setup.`,
        })
      );
    }
    logger.ok(`${displayDir}/ already exists (preserving existing data).`);
    return ok({ dataDir: paths.dataDir, firstRun: false });
  }

  if (!existsSync(paths.templateFile)) {
    return fail(
      new HarnessError('precondition', `Config template ${config.project.templateFile} not found.`, {
        hint: 'Restore it from version control and re-run setup.',
      })
    );
  }

  const op = logger.startOperation('initializeRuntimeDirectory', { dataDir: paths.dataDir });
  try {
    for (const subdirectory of runtime.subdirectories) {
      mkdirSync(join(paths.dataDir, subdirectory), { recursive: true });
    }
    copyFileSync(paths.templateFile, paths.runtimeConfigFile);
    chmodSync(paths.dataDir, runtime.dirMode);
    chmodSync(paths.runtimeConfigFile, runtime.fileMode);
  } catch (error) {
    op.failure(error instanceof Error ? error : String(error));
    return fail(
      new HarnessError('operation', `Could not create ${displayDir}/`, { cause: error })
    );
  }

  applyOwnership(paths.dataDir, displayDir, config, deps);

  op.success(`Created ${displayDir}/ with config template.`);
  return ok({ dataDir: paths.dataDir, firstRun: true });
}

/**
 * Hand the tree to the container user. Linux only: Docker Desktop maps uids
 * itself on other platforms. Failure leaves a warning with the manual command.
 */
function applyOwnership(
  dataDir: string,
  displayDir: string,
  config: HarnessConfig,
  deps: RuntimeDirectoryDependencies
): void {
  const { ownerUid, ownerGid } = config.runtime;

  if (deps.platform !== 'linux') {
    return;
  }
  if (deps.currentUid === ownerUid) {
    deps.logger.debug('Skipping chown, already running as the container uid', { uid: ownerUid });
    return;
  }

  try {
    deps.chown(dataDir, ownerUid, ownerGid);
  } catch (error) {
    deps.logger.warn(
      `Could not chown ${displayDir} to uid ${ownerUid}. ` +
        `Run: sudo chown -R ${ownerUid}:${ownerGid} ${displayDir}`,
      { error: error instanceof Error ? error.message : String(error) }
    );
  }
}
