/**
 * Temperature Sensors
 *
 * HwmonSensor reads millidegrees from a kernel hwmon `temp*_input` file.
 * VendorGpuSensor queries the GPU temperature through `nvidia-smi`.
 * Both report failures as a null reading.
 */

import { readFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { DeviceKind, TemperatureSensor } from '../types/index.js';
import {
  GPU_TEMPERATURE_QUERY_ARGS,
  NVIDIA_SMI,
  VENDOR_GPU_ID,
  runVendorCommand,
  type VendorToolOptions,
} from './vendor-tool.js';

const log = createSubsystemLogger('fan/sensors');

/**
 * Parses an integer reading, rejecting anything but an optional sign and digits.
 */
export function parseIntegerReading(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

export class HwmonSensor implements TemperatureSensor {
  readonly kind: DeviceKind = 'hwmon';

  constructor(readonly id: string) {}

  read(): number | null {
    let raw: string;
    try {
      raw = readFileSync(this.id, 'utf8');
    } catch (error) {
      log.error('Failed to read temperature', { sensor: this.id, error: String(error) });
      return null;
    }

    const milliCelsius = parseIntegerReading(raw);
    if (milliCelsius === null) {
      log.error('Invalid temperature reading', { sensor: this.id, rawValue: raw.trim() });
      return null;
    }
    return milliCelsius / 1000;
  }
}

export class VendorGpuSensor implements TemperatureSensor {
  readonly id = VENDOR_GPU_ID;
  readonly kind: DeviceKind = 'vendor-gpu';

  constructor(private readonly toolOptions: VendorToolOptions = {}) {}

  read(): number | null {
    const result = runVendorCommand(NVIDIA_SMI, GPU_TEMPERATURE_QUERY_ARGS, this.toolOptions);
    if (!result.ok) {
      log.error('Failed to read GPU temperature', { sensor: this.id, error: result.reason });
      return null;
    }

    const firstLine = result.stdout.split('\n')[0] ?? '';
    const celsius = parseIntegerReading(firstLine);
    if (celsius === null) {
      log.error('Invalid GPU temperature output', { sensor: this.id, output: firstLine.trim() });
      return null;
    }
    return celsius;
  }
}
