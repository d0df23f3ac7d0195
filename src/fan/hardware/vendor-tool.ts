/**
 * Vendor Tool Runner
 *
 * Runs the GPU vendor command-line tools with a hard timeout. A hung tool
 * must not stall the control cycle, so expiry is reported like any other
 * device failure.
 */

import { execFileSync } from 'node:child_process';
import { DEFAULT_VENDOR_COMMAND_TIMEOUT_MS } from '../types/index.js';

export const VENDOR_GPU_ID = 'vendor-gpu';

export const NVIDIA_SMI = 'nvidia-smi';
export const NVIDIA_SETTINGS = 'nvidia-settings';

export const GPU_TEMPERATURE_QUERY_ARGS = [
  '--query-gpu=temperature.gpu',
  '--format=csv,noheader,nounits',
] as const;

export type VendorCommandResult =
  | { ok: true; stdout: string }
  | { ok: false; reason: string };

export interface VendorToolOptions {
  timeoutMs?: number;
}

interface ExecFailure {
  code?: unknown;
  status?: unknown;
  signal?: unknown;
  stderr?: unknown;
}

function asExecFailure(error: unknown): ExecFailure {
  return typeof error === 'object' && error !== null ? error : {};
}

/**
 * Turns an execFileSync failure into a one-line reason.
 */
export function describeCommandFailure(command: string, error: unknown, timeoutMs: number): string {
  const failure = asExecFailure(error);

  if (failure.code === 'ENOENT') {
    return `${command} not found`;
  }
  if (failure.code === 'ETIMEDOUT') {
    return `${command} timed out after ${timeoutMs}ms`;
  }
  if (typeof failure.status === 'number') {
    const stderr = typeof failure.stderr === 'string' ? failure.stderr.trim() : '';
    return stderr
      ? `${command} exited with code ${failure.status}: ${stderr}`
      : `${command} exited with code ${failure.status}`;
  }
  if (typeof failure.signal === 'string') {
    return `${command} terminated by ${failure.signal}`;
  }
  return `${command} failed: ${String(error)}`;
}

export function runVendorCommand(
  command: string,
  args: readonly string[],
  options: VendorToolOptions = {},
): VendorCommandResult {
  const timeoutMs = options.timeoutMs ?? DEFAULT_VENDOR_COMMAND_TIMEOUT_MS;
  try {
    const stdout = execFileSync(command, args, {
      encoding: 'utf8',
      timeout: timeoutMs,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    return { ok: true, stdout };
  } catch (error) {
    return { ok: false, reason: describeCommandFailure(command, error, timeoutMs) };
  }
}

export function isPrivilegedProcess(): boolean {
  return process.getuid?.() === 0;
}
