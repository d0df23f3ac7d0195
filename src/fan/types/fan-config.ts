/**
 * FanCurveConfig
 *
 * Normalized configuration consumed by the control loop. The on-disk document
 * uses snake_case keys; see `configuration/schema.ts`.
 */

/** A control point: temperature in Celsius, speed in percent */
export type CurvePoint = readonly [temperature: number, speed: number];

export interface CurveDefinition {
  /** Identity of the sensor driving this curve */
  sensor: string;
  points: CurvePoint[];
}

export interface HardwareOptions {
  /** Floor for the vendor GPU fan while fan control is engaged */
  vendorMinFanSpeed: number;
  /** Upper bound for a single vendor tool invocation */
  vendorCommandTimeoutMs: number;
}

export interface ControlOptions {
  /** Maximum change in commanded speed per cycle, in percent */
  stepPercent: number;
  /** Pause between cycles */
  intervalMs: number;
}

export interface FanCurveConfig {
  curves: Record<string, CurveDefinition>;
  /** Fan id to curve name; null or empty means unbound */
  fans: Record<string, string | null>;
  hardware: HardwareOptions;
  control: ControlOptions;
}

export const DEFAULT_VENDOR_MIN_FAN_SPEED = 26;
export const DEFAULT_VENDOR_COMMAND_TIMEOUT_MS = 5000;
export const DEFAULT_STEP_PERCENT = 10;
export const DEFAULT_INTERVAL_MS = 1000;
