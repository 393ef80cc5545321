/**
 * Temporary project fixture
 *
 * A throwaway project directory with the files setup reads: secrets file,
 * its example and the runtime-config template.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { loadHarnessConfig, type HarnessConfig, type HarnessConfigOverrides } from '@clawharbor/core';

export const TEST_API_KEY = 'sk-test-secret';

export const TEST_TEMPLATE = '{\n  "gateway": {\n    "mode": "local"\n  }\n}\n';

export interface TempProjectOptions {
  /** Secrets file content; null leaves it out */
  env?: string | null;
  envExample?: string | null;
  template?: string | null;
}

export interface TempProject {
  dir: string;
  path: (relativePath: string) => string;
  write: (relativePath: string, content: string) => void;
  read: (relativePath: string) => string;
  exists: (relativePath: string) => boolean;
  /** Load the harness config for this project, with fast readiness timings */
  loadConfig: (overrides?: HarnessConfigOverrides) => HarnessConfig;
  cleanup: () => void;
}

export function createTempProject(options: TempProjectOptions = {}): TempProject {
  const dir = mkdtempSync(join(tmpdir(), 'clawharbor-test-'));
  const path = (relativePath: string) => join(dir, relativePath);

  const write = (relativePath: string, content: string) => {
    mkdirSync(dirname(path(relativePath)), { recursive: true });
    writeFileSync(path(relativePath), content);
  };

  const env = options.env === undefined ? `OPENAI_API_KEY=${TEST_API_KEY}\n` : options.env;
  const envExample =
    options.envExample === undefined
      ? 'OPENAI_API_KEY=sk-proj-your-openai-key-here\n'
      : options.envExample;
  const template = options.template === undefined ? TEST_TEMPLATE : options.template;

  if (env !== null) write('.env', env);
  if (envExample !== null) write('.env.example', envExample);
  if (template !== null) write('openclaw.template.json', template);

  return {
    dir,
    path,
    write,
    read: (relativePath) => readFileSync(path(relativePath), 'utf8'),
    exists: (relativePath) => existsSync(path(relativePath)),
    loadConfig: (overrides = {}) =>
      loadHarnessConfig({
        projectDir: dir,
        overrides: {
          ...overrides,
          readiness: { intervalMs: 10, settleMs: 20, ...overrides.readiness },
        },
      }),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
