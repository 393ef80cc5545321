/**
 * Reset Path Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createSetupFixture,
  createTempProject,
  failWith,
  type TempProject,
} from '@clawharbor/test-utils';
import { RESET_CONFIRM_PROMPT, isResetConfirmed, resetRuntime } from '../../src/reset/index.js';

describe('isResetConfirmed', () => {
  it('should accept only an exact yes', () => {
    expect(isResetConfirmed('yes')).toBe(true);
    expect(isResetConfirmed('  yes\n')).toBe(true);
    expect(isResetConfirmed('YES')).toBe(false);
    expect(isResetConfirmed('y')).toBe(false);
    expect(isResetConfirmed('yes please')).toBe(false);
    expect(isResetConfirmed('')).toBe(false);
  });
});

describe('resetRuntime', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  function createProjectWithState(): TempProject {
    const created = createTempProject();
    created.write('data/openclaw/openclaw.json', '{}');
    created.write('data/openclaw/credentials/creds.json', '{"linked":true}');
    return created;
  }

  it.each(['no', 'YES', 'y', '', 'yes!'])(
    'should abort without deleting anything for %j',
    async (answer) => {
      project = createProjectWithState();
      const { compose, logger, runner } = createSetupFixture(project);
      const prompt = vi.fn(async () => answer);

      const result = await resetRuntime(project.loadConfig(), { compose, logger, prompt });

      expect(result).toEqual({ ok: true, value: { status: 'aborted' } });
      expect(prompt).toHaveBeenCalledWith(RESET_CONFIRM_PROMPT);
      expect(project.read('data/openclaw/credentials/creds.json')).toBe('{"linked":true}');
      expect(runner.calls).toEqual([]);
      expect(logger.getMessages('info')).toEqual(['Aborted.']);
    }
  );

  it('should stop the service and delete the runtime directory on yes', async () => {
    project = createProjectWithState();
    const { compose, logger, runner } = createSetupFixture(project);

    const result = await resetRuntime(project.loadConfig(), {
      compose,
      logger,
      prompt: async () => 'yes\n',
    });

    expect(result).toEqual({
      ok: true,
      value: { status: 'wiped', dataDir: project.path('data/openclaw') },
    });
    expect(project.exists('data/openclaw')).toBe(false);
    expect(project.exists('.env')).toBe(true);
    expect(runner.commandLines()).toEqual(['docker compose down']);
    expect(logger.getMessages('warn')).toEqual([
      'This will delete ALL runtime data (WhatsApp link, sessions, devices).',
    ]);
    expect(logger.getMessages('ok')).toEqual([
      'Runtime data wiped. Run clawharbor again to start fresh.',
    ]);
  });

  it('should delete even when compose down fails', async () => {
    project = createProjectWithState();
    const { compose, logger, runner } = createSetupFixture(project);
    runner.on('docker compose down', failWith(1, 'Cannot connect to the Docker daemon'));

    const result = await resetRuntime(project.loadConfig(), {
      compose,
      logger,
      prompt: async () => 'yes',
    });

    expect(result.ok).toBe(true);
    expect(project.exists('data/openclaw')).toBe(false);
  });

  it('should succeed when there is nothing to delete', async () => {
    project = createTempProject();
    const { compose, logger } = createSetupFixture(project);

    const result = await resetRuntime(project.loadConfig(), {
      compose,
      logger,
      prompt: async () => 'yes',
    });

    expect(result).toEqual({
      ok: true,
      value: { status: 'wiped', dataDir: project.path('data/openclaw') },
    });
  });
});
