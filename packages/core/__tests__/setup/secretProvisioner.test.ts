/**
 * Secret Provisioner Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { statSync } from 'fs';
import {
  TEST_GATEWAY_TOKEN,
  createMockServiceLogger,
  createTempProject,
  type TempProject,
} from '@clawharbor/test-utils';
import { provisionGatewayToken } from '../../src/setup/index.js';

describe('provisionGatewayToken', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('should append exactly one generated token line', () => {
    project = createTempProject({ env: '# secrets\nOPENAI_API_KEY=sk-test-secret\n' });
    const logger = createMockServiceLogger();

    const result = provisionGatewayToken(project.loadConfig(), { logger });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const token = result.value.config.gateway.token;
    expect(token).toMatch(/^[0-9a-f]{64}$/);
    expect(result.value.generated).toBe(true);
    expect(project.read('.env')).toBe(
      `# secrets\nOPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_TOKEN=${token}\n`
    );
    expect(logger.getMessages('ok')).toEqual(['Generated gateway token.']);
  });

  it('should replace an empty token line in place of appending a duplicate', () => {
    project = createTempProject({
      env: 'OPENCLAW_GATEWAY_TOKEN=\nOPENAI_API_KEY=sk-test-secret\nOPENCLAW_BIND_IP=127.0.0.1\n',
    });

    const result = provisionGatewayToken(project.loadConfig(), {
      logger: createMockServiceLogger(),
      generateToken: () => TEST_GATEWAY_TOKEN,
    });

    expect(result.ok).toBe(true);
    expect(project.read('.env')).toBe(
      'OPENAI_API_KEY=sk-test-secret\n' +
        'OPENCLAW_BIND_IP=127.0.0.1\n' +
        `OPENCLAW_GATEWAY_TOKEN=${TEST_GATEWAY_TOKEN}\n`
    );
  });

  it('should keep an existing token and not touch the file', () => {
    const env = 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_TOKEN=test-token\n';
    project = createTempProject({ env });
    const before = statSync(project.path('.env')).mtimeMs;
    const logger = createMockServiceLogger();

    const result = provisionGatewayToken(project.loadConfig(), {
      logger,
      generateToken: () => {
        throw new Error('must not generate');
      },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.generated).toBe(false);
    expect(result.value.config.gateway.token).toBe('test-token');
    expect(project.read('.env')).toBe(env);
    expect(statSync(project.path('.env')).mtimeMs).toBe(before);
    expect(logger.getMessages('ok')).toEqual(['Gateway token exists.']);
  });

  it('should be idempotent across runs', () => {
    project = createTempProject({ env: 'OPENAI_API_KEY=sk-test-secret\n' });

    const first = provisionGatewayToken(project.loadConfig(), {
      logger: createMockServiceLogger(),
    });
    const afterFirst = project.read('.env');
    const second = provisionGatewayToken(project.loadConfig(), {
      logger: createMockServiceLogger(),
    });

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.value.generated).toBe(false);
    expect(second.value.config.gateway.token).toBe(first.value.config.gateway.token);
    expect(project.read('.env')).toBe(afterFirst);
    expect(afterFirst.match(/OPENCLAW_GATEWAY_TOKEN=/g)).toHaveLength(1);
  });

  it('should fail when the secrets file is missing', () => {
    project = createTempProject({ env: null });

    const result = provisionGatewayToken(project.loadConfig(), {
      logger: createMockServiceLogger(),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('precondition');
    expect(result.error.message).toBe('.env not found.');
  });
});
