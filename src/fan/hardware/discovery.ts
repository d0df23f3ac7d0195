/**
 * Hardware Discovery
 *
 * Enumerates hwmon temperature inputs and PWM outputs, then probes for the
 * GPU vendor tooling. Runs once at startup and never fails as a whole: a
 * missing source only shrinks the result.
 */

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { DiscoveredHardware, FanOutput, TemperatureSensor } from '../types/index.js';
import { HwmonFan, VendorGpuFan } from './fans.js';
import { HwmonSensor, VendorGpuSensor } from './sensors.js';
import { NVIDIA_SMI, runVendorCommand } from './vendor-tool.js';

const log = createSubsystemLogger('fan/discovery');

export const HWMON_ROOT = '/sys/class/hwmon';

const HWMON_DEVICE_PATTERN = /^hwmon\d+$/;
const TEMPERATURE_INPUT_PATTERN = /^temp\d+_input$/;
/** Raw duty-cycle files only; `pwmN_enable` and friends do not match */
const PWM_OUTPUT_PATTERN = /^pwm\d+$/;

export interface DiscoveryOptions {
  hwmonRoot?: string;
  /** Set to false to skip the vendor tool probe */
  probeVendor?: boolean;
  vendorTimeoutMs?: number;
}

function listDirectory(path: string): string[] {
  try {
    return readdirSync(path);
  } catch (error) {
    log.warn('Could not list directory', { path, error: String(error) });
    return [];
  }
}

/**
 * Returns `<root>/hwmonN/<file>` paths whose file name matches the pattern,
 * sorted for a stable order across runs.
 */
export function findHwmonFiles(root: string, pattern: RegExp): string[] {
  if (!existsSync(root)) {
    return [];
  }

  const matches: string[] = [];
  for (const device of listDirectory(root)) {
    if (!HWMON_DEVICE_PATTERN.test(device)) {
      continue;
    }
    const devicePath = join(root, device);
    for (const file of listDirectory(devicePath)) {
      if (pattern.test(file)) {
        matches.push(join(devicePath, file));
      }
    }
  }
  return matches.sort();
}

export function findHwmonSensors(root: string = HWMON_ROOT): HwmonSensor[] {
  return findHwmonFiles(root, TEMPERATURE_INPUT_PATTERN).map(path => new HwmonSensor(path));
}

export function findHwmonFans(root: string = HWMON_ROOT): HwmonFan[] {
  return findHwmonFiles(root, PWM_OUTPUT_PATTERN).map(path => new HwmonFan(path));
}

/**
 * Probes the vendor tool with a bare invocation.
 */
export function isVendorToolAvailable(timeoutMs?: number): boolean {
  const result = runVendorCommand(NVIDIA_SMI, [], { timeoutMs });
  if (!result.ok) {
    log.debug('GPU vendor tooling not available', { reason: result.reason });
  }
  return result.ok;
}

export function discoverHardware(options: DiscoveryOptions = {}): DiscoveredHardware {
  const root = options.hwmonRoot ?? HWMON_ROOT;
  const sensors: TemperatureSensor[] = findHwmonSensors(root);
  const fans: FanOutput[] = findHwmonFans(root);

  if (options.probeVendor !== false && isVendorToolAvailable(options.vendorTimeoutMs)) {
    const toolOptions = { timeoutMs: options.vendorTimeoutMs };
    sensors.push(new VendorGpuSensor(toolOptions));
    fans.push(new VendorGpuFan(toolOptions));
  }

  log.info('Hardware discovery complete', {
    hwmonRoot: root,
    sensors: sensors.length,
    fans: fans.length,
  });

  return { sensors, fans };
}
