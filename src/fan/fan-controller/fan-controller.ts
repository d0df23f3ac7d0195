/**
 * Fan Controller
 *
 * The control loop: loads configuration, discovers hardware, then repeatedly
 * reads every sensor, evaluates each bound fan's curve, rate-limits the
 * result and commands the fan. Status is published after every cycle and on
 * every terminal transition, and removed when the loop ends.
 *
 * Lifecycle: starting → running → { error, stopped }. `stopped` is signalled
 * by the absence of the status document.
 *
 * Failure containment:
 * - a sensor read or fan write failure affects only that device for that cycle
 * - a fan without a usable binding is skipped with a one-time warning
 * - a missing or invalid configuration stops the controller before the loop
 * - any other exception ends the loop with status `error`
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { evaluateCurve } from '../curve-evaluator/index.js';
import { SpeedSmoother } from '../speed-smoother/index.js';
import { ConfigurationError, curveNameForFan, loadFanConfig } from '../configuration/index.js';
import { VendorGpuFan, discoverHardware, type DiscoveryOptions } from '../hardware/index.js';
import type { StatusPublisher } from '../status-publisher/index.js';
import {
  createInitialStatus,
  type ControllerState,
  type ControllerStatus,
  type DiscoveredHardware,
  type FanCurveConfig,
  type FanOutput,
} from '../types/index.js';

export type ControllerOutcome = 'stopped' | 'error';

export type FanSkipReason = 'unbound' | 'missing_curve' | 'missing_sensor' | 'no_reading';

export interface FanSkip {
  fanId: string;
  reason: FanSkipReason;
  curveName?: string;
  sensorId?: string;
}

export interface FanUpdate {
  fanId: string;
  sensorId: string;
  temperature: number;
  target: number;
  applied: number;
  written: boolean;
}

export interface CycleReport {
  cycle: number;
  readings: Record<string, number | null>;
  updates: FanUpdate[];
  skipped: FanSkip[];
}

export interface FanControllerOptions {
  configPath: string;
  publisher: StatusPublisher;
  /** Hardware source; defaults to probing hwmon and the vendor tool */
  discover?: (options: DiscoveryOptions) => DiscoveredHardware;
  /** Inter-cycle wait; resolves early when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  pid?: number;
}

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

export class FanController extends EventEmitter {
  private readonly logger = createSubsystemLogger('fan/controller');
  private readonly configPath: string;
  private readonly publisher: StatusPublisher;
  private readonly discover: (options: DiscoveryOptions) => DiscoveredHardware;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly smoother = new SpeedSmoother();
  private readonly status: ControllerStatus;

  private config?: FanCurveConfig;
  private hardware: DiscoveredHardware = { sensors: [], fans: [] };
  private readonly warnedSkips = new Set<string>();
  private readonly stopController = new AbortController();
  private cycleCount = 0;
  private running = false;

  constructor(options: FanControllerOptions) {
    super();
    this.configPath = options.configPath;
    this.publisher = options.publisher;
    this.discover = options.discover ?? discoverHardware;
    this.sleep = options.sleep ?? abortableSleep;
    this.status = createInitialStatus(options.pid ?? process.pid);
  }

  /**
   * Loads configuration, discovers hardware and publishes `running`.
   * Returns false, with status `error` published, when configuration is
   * missing or invalid.
   */
  initialize(): boolean {
    this.publish();

    try {
      this.config = loadFanConfig(this.configPath);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.logger.error('Cannot start without a valid configuration', {
        configPath: this.configPath,
        error: error.message,
      });
      this.fail(error.message);
      return false;
    }

    this.hardware = this.discover({ vendorTimeoutMs: this.config.hardware.vendorCommandTimeoutMs });
    this.applyHardwareOptions(this.config);
    this.warnAboutUnknownFans(this.config);

    this.transition('running');
    this.publish();

    this.logger.info('Fan controller started', {
      sensors: this.hardware.sensors.length,
      fans: this.hardware.fans.length,
      curves: Object.keys(this.config.curves).length,
      stepPercent: this.config.control.stepPercent,
      intervalMs: this.config.control.intervalMs,
    });
    return true;
  }

  /**
   * Runs until stopped or until an unexpected error. The status document is
   * removed before this resolves.
   */
  async run(): Promise<ControllerOutcome> {
    this.running = true;
    let outcome: ControllerOutcome = 'stopped';

    try {
      if (!this.initialize()) {
        outcome = 'error';
      } else {
        const intervalMs = this.requireConfig().control.intervalMs;
        while (!this.stopController.signal.aborted) {
          this.runCycle();
          await this.sleep(intervalMs, this.stopController.signal);
        }
        this.logger.info('Fan controller stopped on request', { cycles: this.cycleCount });
      }
    } catch (error) {
      outcome = 'error';
      this.logger.error('Unhandled exception in control loop', {
        error: String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.fail(error instanceof Error ? error.message : String(error));
    } finally {
      this.running = false;
      this.logger.info('Stopping fan controller');
      this.publisher.clear();
      this.emit('stopped', outcome);
    }

    return outcome;
  }

  /**
   * Requests a cooperative stop: the pending sleep ends and the loop exits
   * before the next cycle.
   */
  stop(): void {
    if (!this.stopController.signal.aborted) {
      this.stopController.abort();
    }
  }

  /**
   * One sense → decide → act pass followed by a status publish.
   */
  runCycle(): CycleReport {
    const config = this.requireConfig();
    this.cycleCount++;

    const readings = new Map<string, number | null>();
    for (const sensor of this.hardware.sensors) {
      const value = sensor.read();
      readings.set(sensor.id, value);
      this.status.sensors[sensor.id] = value;
    }

    const updates: FanUpdate[] = [];
    const skipped: FanSkip[] = [];
    for (const fan of this.hardware.fans) {
      const result = this.updateFan(fan, config, readings);
      if ('reason' in result) {
        skipped.push(result);
        this.reportSkip(result);
      } else {
        updates.push(result);
      }
    }

    this.publish();

    const report: CycleReport = {
      cycle: this.cycleCount,
      readings: Object.fromEntries(readings),
      updates,
      skipped,
    };
    this.emit('cycleCompleted', report);
    return report;
  }

  private updateFan(
    fan: FanOutput,
    config: FanCurveConfig,
    readings: ReadonlyMap<string, number | null>,
  ): FanUpdate | FanSkip {
    const curveName = curveNameForFan(config, fan.id);
    if (curveName === undefined) {
      return { fanId: fan.id, reason: 'unbound' };
    }

    const curve = Object.hasOwn(config.curves, curveName) ? config.curves[curveName] : undefined;
    if (!curve) {
      return { fanId: fan.id, reason: 'missing_curve', curveName };
    }

    const temperature = readings.get(curve.sensor);
    if (temperature === undefined) {
      return { fanId: fan.id, reason: 'missing_sensor', curveName, sensorId: curve.sensor };
    }
    if (temperature === null) {
      return { fanId: fan.id, reason: 'no_reading', curveName, sensorId: curve.sensor };
    }

    const target = evaluateCurve(temperature, curve.points);
    const applied = this.smoother.smooth(fan.id, target, config.control.stepPercent);
    const written = fan.setSpeed(applied);
    if (written) {
      this.status.fans[fan.id] = applied;
    }

    this.logger.debug('Fan updated', {
      fan: fan.id,
      curve: curveName,
      temperature,
      target,
      applied,
      written,
    });

    return { fanId: fan.id, sensorId: curve.sensor, temperature, target, applied, written };
  }

  /**
   * Warns once per distinct skip; a failed reading is transient and only
   * logged at debug level.
   */
  private reportSkip(skip: FanSkip): void {
    this.emit('fanSkipped', skip);

    if (skip.reason === 'no_reading') {
      this.logger.debug('No reading for curve sensor, keeping fan speed', { ...skip });
      return;
    }

    const key = `${skip.fanId}\u0000${skip.reason}\u0000${skip.curveName ?? ''}`;
    if (this.warnedSkips.has(key)) {
      return;
    }
    this.warnedSkips.add(key);

    switch (skip.reason) {
      case 'unbound':
        this.logger.warn('No curve assigned to fan, skipping', { fan: skip.fanId });
        break;
      case 'missing_curve':
        this.logger.warn('Curve not found for fan, skipping', { fan: skip.fanId, curve: skip.curveName });
        break;
      case 'missing_sensor':
        this.logger.warn('Curve sensor not available, skipping fan', {
          fan: skip.fanId,
          curve: skip.curveName,
          sensor: skip.sensorId,
        });
        break;
    }
  }

  private applyHardwareOptions(config: FanCurveConfig): void {
    for (const fan of this.hardware.fans) {
      if (fan instanceof VendorGpuFan) {
        fan.setMinSpeed(config.hardware.vendorMinFanSpeed);
        this.logger.info('Applied GPU fan floor', { fan: fan.id, minSpeed: fan.getMinSpeed() });
      }
    }
  }

  private warnAboutUnknownFans(config: FanCurveConfig): void {
    const known = new Set(this.hardware.fans.map(fan => fan.id));
    for (const fanId of Object.keys(config.fans)) {
      if (!known.has(fanId)) {
        this.logger.warn('Configured fan was not found on this system', { fan: fanId });
      }
    }
  }

  private requireConfig(): FanCurveConfig {
    if (!this.config) {
      throw new Error('Fan controller has not been initialized');
    }
    return this.config;
  }

  private fail(message: string): void {
    this.status.error_message = message;
    this.transition('error');
    this.publish();
  }

  private transition(state: ControllerState): void {
    if (this.status.status === state) {
      return;
    }
    const previous = this.status.status;
    this.status.status = state;
    this.emit('stateChanged', { previous, current: state });
  }

  private publish(): void {
    this.publisher.publish(this.status);
  }

  getStatus(): ControllerStatus {
    return structuredClone(this.status);
  }

  getLastSpeed(fanId: string): number | undefined {
    return this.smoother.lastSpeed(fanId);
  }

  getHardware(): DiscoveredHardware {
    return { sensors: [...this.hardware.sensors], fans: [...this.hardware.fans] };
  }

  isRunning(): boolean {
    return this.running;
  }

  getCycleCount(): number {
    return this.cycleCount;
  }
}
