import type { Clock } from '../orchestrator/clock.js';
import type { MetricsProvider, SystemSnapshot } from '../system/types.js';

export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class StubMetricsProvider implements MetricsProvider {
  calls = 0;

  constructor(private readonly reading: SystemSnapshot | (() => SystemSnapshot)) {}

  async snapshot(): Promise<SystemSnapshot> {
    this.calls++;
    return typeof this.reading === 'function' ? this.reading() : { ...this.reading };
  }
}

export class FailingMetricsProvider implements MetricsProvider {
  calls = 0;

  async snapshot(): Promise<SystemSnapshot> {
    this.calls++;
    throw new Error('collector offline');
  }
}

/** Replays `values` in order, then repeats the last one. */
export function scriptedRandom(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index++;
    return value;
  };
}

export const BASELINE: SystemSnapshot = {
  cpu_usage: 40,
  memory_usage: 50,
  disk_usage: 60,
};
