import { vi, type Mock } from 'vitest';
import type { Clock, Sleep } from '@clawharbor/core';

export interface RecordingSleep {
  /** Resolves immediately and records the requested delay */
  sleep: Mock<Sleep>;
  delays: number[];
  /** Virtual clock: the sum of every recorded delay */
  now: Clock;
}

export function createRecordingSleep(): RecordingSleep {
  const delays: number[] = [];
  let elapsed = 0;
  const sleep = vi.fn<Sleep>(async (ms) => {
    delays.push(ms);
    elapsed += ms;
  });
  return { sleep, delays, now: () => elapsed };
}
