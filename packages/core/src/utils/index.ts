/**
 * Utility Functions Module
 *
 * Small helpers shared by the setup steps and the CLI.
 */

/**
 * Injected wherever the harness waits, so tests can record delays instead of
 * sleeping
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for a specified duration
 */
export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Milliseconds since some fixed point. Injected next to Sleep so tests can
 * run deadlines on a virtual clock.
 */
export type Clock = () => number;

/**
 * Last `count` non-empty lines of command output
 */
export function tailLines(text: string, count: number): string[] {
  if (count <= 0) {
    return [];
  }
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
  return lines.slice(-count);
}

/**
 * Host used to reach the gateway from this machine. A wildcard bind is
 * reachable on loopback.
 */
export function reachableHost(bindIp: string): string {
  if (bindIp === '0.0.0.0' || bindIp === '::') {
    return '127.0.0.1';
  }
  return bindIp.includes(':') ? `[${bindIp}]` : bindIp;
}

/**
 * Format milliseconds as a short human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
