/**
 * @clawharbor/core
 *
 * Setup and reset logic for the OpenClaw gateway deployment.
 *
 * This package provides:
 * - Configuration loading and validation
 * - Structured logging with Winston
 * - Docker / Compose command execution and readiness probes
 * - The setup steps, the setup pipeline and the reset path
 */

export * from './config/index.js';

export * from './logger/index.js';

export * from './errors.js';

export * from './crypto.js';

export * from './docker/index.js';

export * from './setup/index.js';

export * from './reset/index.js';

export * from './utils/index.js';
