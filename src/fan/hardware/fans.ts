/**
 * Fan Outputs
 *
 * HwmonFan drives a kernel PWM file, converting percent to the device's raw
 * range. VendorGpuFan drives the GPU fan through `nvidia-settings`, never
 * dropping below a vendor floor while fan control is engaged.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { DEFAULT_VENDOR_MIN_FAN_SPEED, type DeviceKind, type FanOutput } from '../types/index.js';
import {
  NVIDIA_SETTINGS,
  VENDOR_GPU_ID,
  isPrivilegedProcess,
  runVendorCommand,
  type VendorToolOptions,
} from './vendor-tool.js';
import { parseIntegerReading } from './sensors.js';

const log = createSubsystemLogger('fan/fans');

export const DEFAULT_PWM_MAX = 255;
/** Value written to `pwmN_enable` to select manual control */
export const PWM_MANUAL_MODE = '1';

export function clampPercent(percent: number): number {
  if (Number.isNaN(percent)) {
    return 0;
  }
  return Math.min(100, Math.max(0, percent));
}

/**
 * Converts a duty percentage to a raw PWM value in [0, max].
 */
export function percentToPwm(percent: number, max: number): number {
  const raw = Math.round((clampPercent(percent) / 100) * max);
  return Math.min(max, Math.max(0, raw));
}

export class HwmonFan implements FanOutput {
  readonly kind: DeviceKind = 'hwmon';
  private manualModeRequested = false;

  constructor(readonly id: string) {}

  get enablePath(): string {
    return `${this.id}_enable`;
  }

  get maxPath(): string {
    return `${this.id}_max`;
  }

  setSpeed(percent: number): boolean {
    if (!this.manualModeRequested) {
      this.manualModeRequested = true;
      this.enableManualControl();
    }

    const raw = percentToPwm(percent, this.readPwmMax());
    try {
      writeFileSync(this.id, String(raw));
      return true;
    } catch (error) {
      log.error('Failed to set fan speed', { fan: this.id, raw, error: String(error) });
      return false;
    }
  }

  /**
   * Switches the channel to manual mode. The device may already be in manual
   * mode or may not support the switch, so failure is only a warning.
   */
  private enableManualControl(): void {
    if (!existsSync(this.enablePath)) {
      return;
    }
    try {
      writeFileSync(this.enablePath, PWM_MANUAL_MODE);
      log.info('Enabled manual fan control', { fan: this.id });
    } catch (error) {
      log.warn('Could not enable manual fan control', { fan: this.id, error: String(error) });
    }
  }

  readPwmMax(): number {
    if (!existsSync(this.maxPath)) {
      return DEFAULT_PWM_MAX;
    }
    try {
      const max = parseIntegerReading(readFileSync(this.maxPath, 'utf8'));
      if (max !== null && max > 0) {
        return max;
      }
      log.warn('Invalid PWM maximum, using default', { fan: this.id, default: DEFAULT_PWM_MAX });
    } catch (error) {
      log.warn('Could not read PWM maximum, using default', {
        fan: this.id,
        default: DEFAULT_PWM_MAX,
        error: String(error),
      });
    }
    return DEFAULT_PWM_MAX;
  }
}

export interface VendorGpuFanOptions extends VendorToolOptions {
  minSpeed?: number;
  /** Overrides the uid check; used to decide whether to go through sudo */
  isPrivileged?: () => boolean;
}

export class VendorGpuFan implements FanOutput {
  readonly id = VENDOR_GPU_ID;
  readonly kind: DeviceKind = 'vendor-gpu';
  private minSpeed: number;
  private readonly toolOptions: VendorToolOptions;
  private readonly isPrivileged: () => boolean;

  constructor(options: VendorGpuFanOptions = {}) {
    this.minSpeed = options.minSpeed ?? DEFAULT_VENDOR_MIN_FAN_SPEED;
    this.toolOptions = { timeoutMs: options.timeoutMs };
    this.isPrivileged = options.isPrivileged ?? isPrivilegedProcess;
  }

  getMinSpeed(): number {
    return this.minSpeed;
  }

  setMinSpeed(minSpeed: number): void {
    this.minSpeed = clampPercent(minSpeed);
  }

  /**
   * Percent actually sent to the tool: an integer in [minSpeed, 100].
   */
  effectiveSpeed(percent: number): number {
    return Math.round(Math.min(100, Math.max(this.minSpeed, clampPercent(percent))));
  }

  /**
   * Builds the single invocation that engages fan control and sets the target.
   */
  buildCommand(percent: number): { command: string; args: string[] } {
    const toolArgs = [
      '-a', '[gpu:0]/GPUFanControlState=1',
      '-a', `[fan:0]/GPUTargetFanSpeed=${this.effectiveSpeed(percent)}`,
    ];

    if (this.isPrivileged()) {
      return { command: NVIDIA_SETTINGS, args: toolArgs };
    }
    // -n: fail instead of prompting for a password
    return { command: 'sudo', args: ['-n', NVIDIA_SETTINGS, ...toolArgs] };
  }

  setSpeed(percent: number): boolean {
    const { command, args } = this.buildCommand(percent);
    const result = runVendorCommand(command, args, this.toolOptions);
    if (!result.ok) {
      log.error('Failed to set GPU fan speed', { fan: this.id, error: result.reason });
      return false;
    }
    return true;
  }
}
