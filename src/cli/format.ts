/**
 * Human-readable output for the CLI.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { ObservedStatus } from '../fan/status-publisher/index.js';
import type { DiscoveredHardware } from '../fan/types/index.js';

export function formatTemperature(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(1)}°C`;
}

export function formatSpeed(value: number): string {
  return `${Number.isInteger(value) ? value : value.toFixed(1)}%`;
}

export function formatObservedStatus(observed: ObservedStatus, c: ChalkInstance = chalk): string[] {
  if (observed.state === 'stopped') {
    return [c.gray(observed.stale ? '○ stopped (removed stale status file)' : '○ stopped')];
  }
  if (observed.state === 'unknown') {
    return [c.yellow(`? unknown: ${observed.reason}`)];
  }

  const { status } = observed;
  const colour = status.status === 'running' ? c.green : status.status === 'error' ? c.red : c.cyan;
  const lines = [colour.bold(`● ${status.status}`), `  pid: ${status.pid}`];
  if (status.updated_at) {
    lines.push(`  updated: ${status.updated_at}`);
  }
  if (status.error_message) {
    lines.push(c.red(`  error: ${status.error_message}`));
  }

  lines.push(c.white.bold('Sensors'));
  for (const [id, value] of Object.entries(status.sensors)) {
    lines.push(`  ${id}: ${value === null ? c.yellow(formatTemperature(value)) : formatTemperature(value)}`);
  }
  lines.push(c.white.bold('Fans'));
  for (const [id, value] of Object.entries(status.fans)) {
    lines.push(`  ${id}: ${formatSpeed(value)}`);
  }
  return lines;
}

/**
 * Lists discovered devices; every sensor is read once.
 */
export function formatHardware(hardware: DiscoveredHardware, c: ChalkInstance = chalk): string[] {
  const lines = [c.white.bold(`Sensors (${hardware.sensors.length})`)];
  for (const sensor of hardware.sensors) {
    const value = sensor.read();
    const reading = value === null ? c.yellow(formatTemperature(value)) : formatTemperature(value);
    lines.push(`  ${sensor.id} ${c.gray(`[${sensor.kind}]`)} ${reading}`);
  }
  lines.push(c.white.bold(`Fans (${hardware.fans.length})`));
  for (const fan of hardware.fans) {
    lines.push(`  ${fan.id} ${c.gray(`[${fan.kind}]`)}`);
  }
  return lines;
}
