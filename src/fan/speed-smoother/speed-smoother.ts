/**
 * Speed Smoother
 *
 * Bounds how far the commanded speed of each fan may move per control cycle,
 * so fans ramp instead of jumping. The first request for a fan passes through
 * unchanged; there is no previous speed to ramp from, so a cold start goes
 * straight to the curve's target.
 *
 * The recorded speed is the value returned, not the requested target, so an
 * oscillating target converges at a bounded rate.
 */

export class SpeedSmoother {
  private readonly lastSpeeds = new Map<string, number>();

  smooth(fanId: string, target: number, step: number): number {
    if (!Number.isFinite(step) || step < 0) {
      throw new Error(`Smoothing step must be a non-negative number, got ${step}`);
    }

    const last = this.lastSpeeds.get(fanId);
    const applied = last === undefined
      ? target
      : Math.min(last + step, Math.max(last - step, target));

    this.lastSpeeds.set(fanId, applied);
    return applied;
  }

  lastSpeed(fanId: string): number | undefined {
    return this.lastSpeeds.get(fanId);
  }

  /**
   * Forgets the recorded speed for one fan, or for all fans.
   */
  reset(fanId?: string): void {
    if (fanId === undefined) {
      this.lastSpeeds.clear();
    } else {
      this.lastSpeeds.delete(fanId);
    }
  }

  trackedFans(): string[] {
    return [...this.lastSpeeds.keys()];
  }
}
