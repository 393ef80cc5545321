/**
 * Gateway Readiness
 *
 * A ReadinessProbe answers "is the gateway accepting connections yet?" once
 * per call. waitForReady polls a probe within attempts × interval, and each
 * call is bounded by the time left.
 */

import type { ReadinessConfig, GatewayConfig } from '../config/index.js';
import type { Clock, Sleep } from '../utils/index.js';
import { reachableHost } from '../utils/index.js';
import { combinedOutput } from './commandRunner.js';
import type { ComposeClient } from './composeClient.js';

export interface ReadinessProbe {
  /** Shown in debug logs */
  readonly name: string;
  /** Answers false rather than running past `timeoutMs` */
  isReady(timeoutMs?: number): Promise<boolean>;
}

const LOG_PROBE_TIMEOUT_MS = 10000;
const HTTP_PROBE_TIMEOUT_MS = 2000;

/**
 * Per-call timeout: the probe's own cap, lowered to the caller's limit
 */
function probeTimeout(cap: number, limit: number | undefined): number {
  return Math.max(1, Math.ceil(Math.min(cap, limit ?? cap)));
}

/**
 * Ready once the container's log stream contains the marker line
 */
export class LogMarkerProbe implements ReadinessProbe {
  readonly name = 'log-marker';

  constructor(
    private readonly compose: ComposeClient,
    private readonly container: string,
    private readonly marker: string
  ) {}

  async isReady(timeoutMs?: number): Promise<boolean> {
    const result = this.compose.logs(this.container, {
      timeoutMs: probeTimeout(LOG_PROBE_TIMEOUT_MS, timeoutMs),
    });
    if (result.exitCode !== 0) {
      return false;
    }
    return combinedOutput(result).includes(this.marker);
  }
}

export interface FetchResponseLike {
  status: number;
}

export type FetchLike = (
  url: string,
  init?: { method?: string; signal?: AbortSignal }
) => Promise<FetchResponseLike>;

/**
 * Ready once the gateway answers HTTP with anything below 500. Connection
 * errors and timeouts count as not ready.
 */
export class HttpProbe implements ReadinessProbe {
  readonly name = 'http';

  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchLike = fetch,
    private readonly timeoutMs: number = HTTP_PROBE_TIMEOUT_MS
  ) {}

  async isReady(timeoutMs?: number): Promise<boolean> {
    try {
      const response = await this.fetchFn(this.url, {
        method: 'GET',
        signal: AbortSignal.timeout(probeTimeout(this.timeoutMs, timeoutMs)),
      });
      return response.status < 500;
    } catch {
      return false;
    }
  }
}

export function gatewayHttpUrl(gateway: GatewayConfig): string {
  return `http://${reachableHost(gateway.bindIp)}:${gateway.port}/`;
}

export interface ProbeDependencies {
  compose: ComposeClient;
  fetch?: FetchLike;
}

export function createReadinessProbe(
  readiness: ReadinessConfig,
  gateway: GatewayConfig,
  deps: ProbeDependencies
): ReadinessProbe {
  switch (readiness.probe) {
    case 'http':
      return new HttpProbe(gatewayHttpUrl(gateway), deps.fetch);
    case 'log':
      return new LogMarkerProbe(deps.compose, gateway.containerName, readiness.marker);
  }
}

export interface WaitOptions {
  attempts: number;
  intervalMs: number;
  sleep: Sleep;
  /** Defaults to Date.now */
  now?: Clock;
  /** Called before each attempt with its 1-based number */
  onAttempt?: (attempt: number) => void;
}

/**
 * Poll until the probe reports ready. Sleeps between attempts, never after
 * the last one. The whole wait, probe calls included, ends by
 * attempts × intervalMs. Resolves to the attempt that succeeded, or null when
 * either budget ran out.
 */
export async function waitForReady(
  probe: ReadinessProbe,
  options: WaitOptions
): Promise<number | null> {
  const now = options.now ?? Date.now;
  const deadline = now() + options.attempts * options.intervalMs;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    const remaining = deadline - now();
    if (remaining <= 0) {
      return null;
    }
    options.onAttempt?.(attempt);
    if (await probe.isReady(remaining)) {
      return attempt;
    }
    if (attempt < options.attempts) {
      const left = deadline - now();
      if (left <= 0) {
        return null;
      }
      await options.sleep(Math.min(options.intervalMs, left));
    }
  }
  return null;
}
