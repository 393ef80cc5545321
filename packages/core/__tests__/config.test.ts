/**
 * Configuration Module Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { createTempProject, type TempProject } from '@clawharbor/test-utils';
import {
  buildConfigFromEnvValues,
  getEnvValue,
  getHarnessPaths,
  isPlaceholder,
  loadHarnessConfig,
  parseEnvFile,
  readEnvFile,
  upsertEnvValue,
  withGatewayToken,
  writeEnvValue,
} from '../src/config/index.js';
import { HarnessError } from '../src/errors.js';

function captureError(fn: () => unknown): HarnessError {
  try {
    fn();
  } catch (error) {
    if (error instanceof HarnessError) return error;
    throw error;
  }
  throw new Error('Expected a HarnessError');
}

describe('Configuration Module', () => {
  let project: TempProject | undefined;

  afterEach(() => {
    project?.cleanup();
    project = undefined;
  });

  describe('Secrets file', () => {
    it('should parse dotenv syntax', () => {
      const values = parseEnvFile('# comment\nA="quoted value"\nB=plain # trailing\n\nC=\n');

      expect(values).toEqual({ A: 'quoted value', B: 'plain', C: '' });
    });

    it('should return null for a missing file', () => {
      project = createTempProject({ env: null });

      expect(readEnvFile(project.path('.env'))).toBeNull();
    });

    it('should read content and values', () => {
      project = createTempProject({ env: 'OPENAI_API_KEY=sk-test-secret\n' });

      expect(readEnvFile(project.path('.env'))).toEqual({
        content: 'OPENAI_API_KEY=sk-test-secret\n',
        values: { OPENAI_API_KEY: 'sk-test-secret' },
      });
    });

    it('should treat blank values as absent', () => {
      expect(getEnvValue({ A: '   ' }, 'A')).toBeUndefined();
      expect(getEnvValue({ A: ' x ' }, 'A')).toBe('x');
      expect(getEnvValue({}, 'A')).toBeUndefined();
    });

    describe('upsertEnvValue', () => {
      it('should strip existing assignments and append one line', () => {
        const content = 'A=1\nOPENCLAW_GATEWAY_TOKEN=\nB=2\n';

        expect(upsertEnvValue(content, 'OPENCLAW_GATEWAY_TOKEN', 'abc')).toBe(
          'A=1\nB=2\nOPENCLAW_GATEWAY_TOKEN=abc\n'
        );
      });

      it('should add a newline when the file lacks a trailing one', () => {
        expect(upsertEnvValue('A=1', 'KEY', 'v')).toBe('A=1\nKEY=v\n');
      });

      it('should handle an empty file', () => {
        expect(upsertEnvValue('', 'KEY', 'v')).toBe('KEY=v\n');
      });

      it('should keep comments and keys that only share a prefix', () => {
        const content =
          'export OPENCLAW_GATEWAY_TOKEN=old\n' +
          '# OPENCLAW_GATEWAY_TOKEN is generated\n' +
          'OPENCLAW_GATEWAY_TOKEN_BACKUP=x\n';

        expect(upsertEnvValue(content, 'OPENCLAW_GATEWAY_TOKEN', 'new')).toBe(
          '# OPENCLAW_GATEWAY_TOKEN is generated\n' +
            'OPENCLAW_GATEWAY_TOKEN_BACKUP=x\n' +
            'OPENCLAW_GATEWAY_TOKEN=new\n'
        );
      });

      it('should normalize CRLF line endings', () => {
        expect(upsertEnvValue('A=1\r\nB=2\r\n', 'K', 'v')).toBe('A=1\nB=2\nK=v\n');
      });
    });

    it('should write a value into the file', () => {
      project = createTempProject({ env: 'OPENAI_API_KEY=sk-test-secret\n' });

      writeEnvValue(project.path('.env'), 'OPENCLAW_BIND_IP', '0.0.0.0');

      expect(project.read('.env')).toBe('OPENAI_API_KEY=sk-test-secret\nOPENCLAW_BIND_IP=0.0.0.0\n');
    });

    it('should recognize placeholder values', () => {
      expect(isPlaceholder(undefined)).toBe(true);
      expect(isPlaceholder('')).toBe(true);
      expect(isPlaceholder('   ')).toBe(true);
      expect(isPlaceholder('sk-proj-your-openai-key-here')).toBe(true);
      expect(isPlaceholder('sk-proj-your-key-here')).toBe(true);
      expect(isPlaceholder('CHANGEME')).toBe(true);
      expect(isPlaceholder('sk-test-secret')).toBe(false);
    });
  });

  describe('buildConfigFromEnvValues', () => {
    it('should map known keys onto config sections', () => {
      const result = buildConfigFromEnvValues({
        OPENAI_API_KEY: ' sk-test-secret ',
        OPENCLAW_GATEWAY_TOKEN: 'test-token',
        OPENCLAW_IMAGE: 'ghcr.io/example/openclaw:1.0',
        OPENCLAW_BIND_IP: '0.0.0.0',
        OPENCLAW_GATEWAY_PORT: '28789',
        OPENCLAW_BRIDGE_PORT: '28790',
        OPENCLAW_READINESS_PROBE: 'http',
        UNRELATED: 'x',
      });

      expect(result).toEqual({
        gateway: {
          image: 'ghcr.io/example/openclaw:1.0',
          bindIp: '0.0.0.0',
          port: 28789,
          bridgePort: 28790,
          token: 'test-token',
        },
        credentials: { apiKey: 'sk-test-secret' },
        readiness: { probe: 'http' },
      });
    });

    it('should reject an unknown readiness probe', () => {
      const error = captureError(() =>
        buildConfigFromEnvValues({ OPENCLAW_READINESS_PROBE: 'tcp' })
      );

      expect(error.kind).toBe('precondition');
      expect(error.message).toBe('OPENCLAW_READINESS_PROBE must be "log" or "http" (got "tcp")');
    });
  });

  describe('loadHarnessConfig', () => {
    it('should apply defaults', () => {
      project = createTempProject({ env: 'OPENAI_API_KEY=sk-test-secret\n' });

      const config = loadHarnessConfig({ projectDir: project.dir });

      expect(config.project).toEqual({
        dir: project.dir,
        envFile: '.env',
        envExampleFile: '.env.example',
        templateFile: 'openclaw.template.json',
        composeFile: 'docker-compose.yml',
      });
      expect(config.runtime).toEqual({
        dataDir: 'data/openclaw',
        configFileName: 'openclaw.json',
        subdirectories: ['workspace', 'agents/main/sessions', 'credentials', 'devices'],
        ownerUid: 1000,
        ownerGid: 1000,
        dirMode: 0o700,
        fileMode: 0o600,
      });
      expect(config.gateway).toEqual({
        service: 'openclaw-gateway',
        cliService: 'openclaw-cli',
        containerName: 'openclaw-gateway',
        image: 'openclaw:local',
        bindIp: '127.0.0.1',
        port: 18789,
        bridgePort: 18790,
      });
      expect(config.credentials).toEqual({ apiKey: 'sk-test-secret' });
      expect(config.readiness).toEqual({
        probe: 'log',
        marker: 'listening on ws://',
        attempts: 15,
        intervalMs: 2000,
        settleMs: 5000,
        doctorOutputLines: 5,
      });
    });

    it('should read gateway values from the secrets file', () => {
      project = createTempProject({
        env: 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_PORT=19000\nOPENCLAW_GATEWAY_TOKEN=test-token\n',
      });

      const config = loadHarnessConfig({ projectDir: project.dir });

      expect(config.gateway.port).toBe(19000);
      expect(config.gateway.token).toBe('test-token');
    });

    it('should let overrides win over the secrets file', () => {
      project = createTempProject({
        env: 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_PORT=19000\n',
      });

      const config = loadHarnessConfig({
        projectDir: project.dir,
        overrides: { gateway: { port: 20000 }, readiness: { attempts: 3 } },
      });

      expect(config.gateway.port).toBe(20000);
      expect(config.readiness.attempts).toBe(3);
    });

    it('should leave the API key undefined without a secrets file', () => {
      project = createTempProject({ env: null });

      const config = loadHarnessConfig({ projectDir: project.dir });

      expect(config.credentials.apiKey).toBeUndefined();
      expect(config.gateway.token).toBeUndefined();
    });

    it('should report out-of-range ports as a precondition error', () => {
      project = createTempProject({
        env: 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_PORT=70000\n',
      });
      const projectDir = project.dir;

      const error = captureError(() => loadHarnessConfig({ projectDir }));

      expect(error.kind).toBe('precondition');
      expect(error.message).toBe('Invalid configuration');
      expect(error.hint).toBe(
        'Fix these values in .env:\n  - gateway.port: Port must be between 1 and 65535'
      );
    });

    it('should ignore the secrets file when asked to', () => {
      project = createTempProject({
        env: 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_GATEWAY_PORT=0\nOPENCLAW_READINESS_PROBE=tcp\n',
      });

      const config = loadHarnessConfig({ projectDir: project.dir, readSecretsFile: false });

      expect(config.gateway.port).toBe(18789);
      expect(config.readiness.probe).toBe('log');
      expect(config.credentials.apiKey).toBeUndefined();
      expect(config.runtime.dataDir).toBe('data/openclaw');
    });

    it('should not export secrets into process.env', () => {
      project = createTempProject({
        env: 'OPENAI_API_KEY=sk-test-secret\nOPENCLAW_BRIDGE_PORT=18791\n',
      });
      const before = process.env.OPENCLAW_BRIDGE_PORT;

      loadHarnessConfig({ projectDir: project.dir });

      expect(process.env.OPENCLAW_BRIDGE_PORT).toBe(before);
    });
  });

  describe('withGatewayToken', () => {
    it('should return a copy carrying the token', () => {
      project = createTempProject();
      const config = loadHarnessConfig({ projectDir: project.dir });

      const updated = withGatewayToken(config, 'test-token');

      expect(updated.gateway.token).toBe('test-token');
      expect(config.gateway.token).toBeUndefined();
      expect(updated.runtime).toBe(config.runtime);
    });
  });

  describe('getHarnessPaths', () => {
    it('should resolve every file against the project directory', () => {
      project = createTempProject();
      const config = loadHarnessConfig({ projectDir: project.dir });

      expect(getHarnessPaths(config)).toEqual({
        projectDir: project.dir,
        envFile: join(project.dir, '.env'),
        envExampleFile: join(project.dir, '.env.example'),
        templateFile: join(project.dir, 'openclaw.template.json'),
        composeFile: join(project.dir, 'docker-compose.yml'),
        dataDir: join(project.dir, 'data/openclaw'),
        runtimeConfigFile: join(project.dir, 'data/openclaw/openclaw.json'),
      });
    });
  });
});
