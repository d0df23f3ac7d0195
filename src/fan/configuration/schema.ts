/**
 * Configuration Document Schema
 *
 * The on-disk `config.json` is shared with the configuration client, which
 * also stores display settings (`aliases`, `hidden_fans`, `hidden_sensors`).
 * Keys the controller does not use are dropped during parsing.
 */

import { z } from 'zod';
import {
  DEFAULT_INTERVAL_MS,
  DEFAULT_STEP_PERCENT,
  DEFAULT_VENDOR_COMMAND_TIMEOUT_MS,
  DEFAULT_VENDOR_MIN_FAN_SPEED,
  type CurvePoint,
  type FanCurveConfig,
} from '../types/index.js';

const finiteNumber = z.number().finite();

export const CurvePointSchema = z
  .tuple([finiteNumber, finiteNumber])
  .transform((point): CurvePoint => [point[0], point[1]]);

export const CurveSchema = z.object({
  sensor: z.string().min(1),
  points: z.array(CurvePointSchema).min(1, 'a curve needs at least one point'),
});

export const HardwareSchema = z.object({
  vendor_min_fan_speed: z.number().int().min(0).max(100).optional(),
  /** Key written by older configuration clients */
  nvidia_min_fan_speed: z.number().int().min(0).max(100).optional(),
  vendor_command_timeout_ms: z.number().int().positive().optional(),
});

export const ControlSchema = z.object({
  step: z.number().finite().nonnegative().optional(),
  interval_seconds: z.number().finite().positive().optional(),
});

export const ConfigDocumentSchema = z.object({
  curves: z.record(z.string(), CurveSchema).default({}),
  fans: z.record(z.string(), z.string().nullable()).default({}),
  hardware: HardwareSchema.default({}),
  control: ControlSchema.default({}),
});

export type ConfigDocument = z.input<typeof ConfigDocumentSchema>;

export const FanCurveConfigSchema = ConfigDocumentSchema.transform((document): FanCurveConfig => ({
  curves: document.curves,
  fans: document.fans,
  hardware: {
    vendorMinFanSpeed:
      document.hardware.vendor_min_fan_speed
      ?? document.hardware.nvidia_min_fan_speed
      ?? DEFAULT_VENDOR_MIN_FAN_SPEED,
    vendorCommandTimeoutMs: document.hardware.vendor_command_timeout_ms ?? DEFAULT_VENDOR_COMMAND_TIMEOUT_MS,
  },
  control: {
    stepPercent: document.control.step ?? DEFAULT_STEP_PERCENT,
    intervalMs: document.control.interval_seconds !== undefined
      ? Math.round(document.control.interval_seconds * 1000)
      : DEFAULT_INTERVAL_MS,
  },
}));

/**
 * Renders zod issues as `path: message` pairs, e.g.
 * `curves.cpu.points: a curve needs at least one point`.
 */
export function formatConfigIssues(error: z.ZodError, limit = 3): string {
  const rendered = error.issues.slice(0, limit).map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  const remaining = error.issues.length - rendered.length;
  return remaining > 0 ? `${rendered.join('; ')} (+${remaining} more)` : rendered.join('; ');
}
