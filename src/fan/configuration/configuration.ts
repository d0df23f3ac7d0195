/**
 * Fan Curve Configuration
 *
 * Loads and validates `config.json` once at startup. A missing or invalid
 * document is a fatal startup error for the controller.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { FanCurveConfig } from '../types/index.js';
import { FanCurveConfigSchema, formatConfigIssues } from './schema.js';

export const CONFIG_FILE_NAME = 'config.json';
export const STATUS_FILE_NAME = '.fan_controller_status.json';

export class ConfigurationError extends Error {
  constructor(message: string, readonly configPath: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function parseFanConfig(content: string, configPath: string): FanCurveConfig {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${CONFIG_FILE_NAME} is not valid JSON: ${String(error)}`, configPath);
  }

  const result = FanCurveConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${CONFIG_FILE_NAME}: ${formatConfigIssues(result.error)}`, configPath);
  }
  return result.data;
}

export function loadFanConfig(configPath: string): FanCurveConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`${CONFIG_FILE_NAME} not found at ${configPath}`, configPath);
  }

  let content: string;
  try {
    content = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Could not read ${CONFIG_FILE_NAME}: ${String(error)}`, configPath);
  }
  return parseFanConfig(content, configPath);
}

/**
 * Curve name bound to a fan, or undefined when the fan is unbound.
 */
export function curveNameForFan(config: FanCurveConfig, fanId: string): string | undefined {
  const name = Object.hasOwn(config.fans, fanId) ? config.fans[fanId] : null;
  return name ? name : undefined;
}
