/**
 * @clawharbor/test-utils
 *
 * Shared test utilities for the clawharbor workspaces.
 *
 * This package provides:
 * - A mock ServiceLogger that records every line
 * - FakeCommandRunner, a scripted stand-in for docker
 * - Temporary project directories and a recording sleep
 *
 * @example
 * ```typescript
 * import { FakeCommandRunner, createMockServiceLogger, failWith } from '@clawharbor/test-utils';
 *
 * it('reports a missing compose plugin', () => {
 *   const runner = new FakeCommandRunner().on('docker compose version', failWith(1));
 *   const logger = createMockServiceLogger();
 *   // ... run a step
 *   expect(runner.count('docker compose pull')).toBe(0);
 * });
 * ```
 */

export * from './mocks/index.js';
export * from './helpers/index.js';
