#!/usr/bin/env tsx
/**
 * clawharbor CLI
 *
 * Usage:
 *   clawharbor          First-time setup (safe to re-run)
 *   clawharbor reset    Wipe runtime data and start fresh
 */

import { closeLogger } from '@clawharbor/core';
import { createDefaultDependencies } from './dependencies.js';
import { createProgram } from './program.js';

const program = createProgram(createDefaultDependencies(), {
  onExit: (code) => {
    process.exitCode = code;
  },
});

try {
  await program.parseAsync(process.argv);
} finally {
  await closeLogger();
}
