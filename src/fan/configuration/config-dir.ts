/**
 * Configuration Directory Resolution
 *
 * Order: an explicit directory that exists, then the working directory if it
 * holds a `config.json`, then `~/.config/fan_controller` (created on demand).
 */

import { existsSync, mkdirSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { CONFIG_FILE_NAME, STATUS_FILE_NAME } from './configuration.js';

const log = createSubsystemLogger('fan/config');

export const CONFIG_DIR_NAME = 'fan_controller';

export interface ConfigPaths {
  configDir: string;
  configPath: string;
  statusPath: string;
}

export interface ResolveConfigDirOptions {
  override?: string;
  cwd?: string;
  home?: string;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function defaultConfigDir(home: string = homedir()): string {
  return join(home, '.config', CONFIG_DIR_NAME);
}

export function resolveConfigDir(options: ResolveConfigDirOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();

  if (options.override) {
    const override = resolve(cwd, options.override);
    if (isDirectory(override)) {
      return override;
    }
    log.warn('Configuration directory override does not exist, ignoring', { path: override });
  }

  if (existsSync(join(cwd, CONFIG_FILE_NAME))) {
    return cwd;
  }

  const configDir = defaultConfigDir(options.home);
  mkdirSync(configDir, { recursive: true });
  return configDir;
}

export function configPathsFor(configDir: string): ConfigPaths {
  return {
    configDir,
    configPath: join(configDir, CONFIG_FILE_NAME),
    statusPath: join(configDir, STATUS_FILE_NAME),
  };
}
