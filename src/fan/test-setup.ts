/**
 * Property-Based Testing Setup for the Fan Controller
 *
 * Shared fast-check generators and helpers for fan controller tests.
 */

import * as fc from 'fast-check';
import type { ControllerStatus, CurvePoint, FanOutput, TemperatureSensor } from './types/index.js';
import type { StatusPublisher } from './status-publisher/index.js';

/** Duty percentages as integers, so expected values stay exact */
export const speedArbitrary: fc.Arbitrary<number> = fc.integer({ min: 0, max: 100 });

/**
 * Curves with one to eight points and distinct temperatures, in random order.
 */
export const curvePointsArbitrary: fc.Arbitrary<CurvePoint[]> = fc
  .uniqueArray(
    fc.record({
      temperature: fc.integer({ min: -10, max: 110 }),
      speed: speedArbitrary,
    }),
    { minLength: 1, maxLength: 8, selector: point => point.temperature },
  )
  .map(rows => rows.map(({ temperature, speed }): CurvePoint => [temperature, speed]));

export const propertyTestConfig = {
  numRuns: 50,
};

/**
 * In-memory sensor whose reading can be changed between cycles.
 */
export class FakeSensor implements TemperatureSensor {
  readonly kind = 'hwmon' as const;
  readCount = 0;

  constructor(readonly id: string, public value: number | null) {}

  read(): number | null {
    this.readCount++;
    return this.value;
  }
}

/**
 * In-memory fan that records every request and can be told to fail.
 */
export class FakeFan implements FanOutput {
  readonly kind = 'hwmon' as const;
  readonly requests: number[] = [];
  failWrites = false;

  constructor(readonly id: string) {}

  setSpeed(percent: number): boolean {
    this.requests.push(percent);
    return !this.failWrites;
  }
}

/**
 * Publisher that keeps deep copies of every published status.
 */
export class RecordingPublisher implements StatusPublisher {
  readonly published: ControllerStatus[] = [];
  clearCount = 0;

  publish(status: ControllerStatus): boolean {
    this.published.push(structuredClone(status));
    return true;
  }

  clear(): void {
    this.clearCount++;
  }

  last(): ControllerStatus | undefined {
    return this.published[this.published.length - 1];
  }
}
