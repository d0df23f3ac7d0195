/**
 * Status Reader
 *
 * Observer side of the status document: turns the file (or its absence)
 * into a controller state. A document left behind by a process that no
 * longer exists counts as stopped and is removed.
 */

import { existsSync, readFileSync, unlinkSync } from 'node:fs';
import { z } from 'zod';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { ControllerStatus } from '../types/index.js';

const log = createSubsystemLogger('fan/status-reader');

export const ControllerStatusSchema = z.object({
  pid: z.number().int(),
  status: z.enum(['starting', 'running', 'error']),
  sensors: z.record(z.string(), z.number().nullable()).default({}),
  fans: z.record(z.string(), z.number()).default({}),
  error_message: z.string().optional(),
  updated_at: z.string().optional(),
});

export type ObservedStatus =
  | { state: 'stopped'; stale: boolean }
  | { state: 'unknown'; reason: string }
  | { state: ControllerStatus['status']; status: ControllerStatus };

export interface StatusReaderOptions {
  /** Liveness check for the recorded pid */
  isProcessAlive?: (pid: number) => boolean;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EPERM';
  }
}

export function parseControllerStatus(content: string): ControllerStatus {
  return ControllerStatusSchema.parse(JSON.parse(content));
}

export function readControllerStatus(statusPath: string, options: StatusReaderOptions = {}): ObservedStatus {
  const alive = options.isProcessAlive ?? isProcessAlive;

  if (!existsSync(statusPath)) {
    return { state: 'stopped', stale: false };
  }

  let status: ControllerStatus;
  try {
    status = parseControllerStatus(readFileSync(statusPath, 'utf8'));
  } catch (error) {
    return { state: 'unknown', reason: String(error) };
  }

  if (!alive(status.pid)) {
    log.info('Removing status file left by a stopped controller', { path: statusPath, pid: status.pid });
    try {
      unlinkSync(statusPath);
    } catch (error) {
      log.warn('Failed to remove stale status file', { path: statusPath, error: String(error) });
    }
    return { state: 'stopped', stale: true };
  }

  return { state: status.status, status };
}
