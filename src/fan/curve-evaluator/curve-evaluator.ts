/**
 * Curve Evaluator
 *
 * Maps a temperature to a target duty percentage by piecewise-linear
 * interpolation over the configured control points. Outside the covered
 * temperature range the nearest end point's speed applies.
 */

import type { CurvePoint } from '../types/index.js';

/**
 * Returns a copy of the points ordered by temperature, then speed.
 */
export function sortCurvePoints(points: readonly CurvePoint[]): CurvePoint[] {
  return [...points].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
}

export function evaluateCurve(temperature: number, points: readonly CurvePoint[]): number {
  if (points.length === 0) {
    throw new Error('Cannot evaluate a curve without control points');
  }

  const sorted = sortCurvePoints(points);
  const [firstTemp, firstSpeed] = sorted[0];
  const [lastTemp, lastSpeed] = sorted[sorted.length - 1];

  if (temperature <= firstTemp) {
    return firstSpeed;
  }
  if (temperature >= lastTemp) {
    return lastSpeed;
  }

  for (let i = 1; i < sorted.length; i++) {
    const [upperTemp, upperSpeed] = sorted[i];
    if (temperature > upperTemp) {
      continue;
    }
    if (temperature === upperTemp) {
      return upperSpeed;
    }

    const [lowerTemp, lowerSpeed] = sorted[i - 1];
    const fraction = (temperature - lowerTemp) / (upperTemp - lowerTemp);
    return lowerSpeed + fraction * (upperSpeed - lowerSpeed);
  }

  return lastSpeed;
}
