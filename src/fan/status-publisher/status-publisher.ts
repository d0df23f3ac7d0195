/**
 * Status Publisher
 *
 * Writes the controller status document for external observers. The control
 * loop is the only writer. Each write goes to a temporary file that is then
 * renamed over the status path, so a reader sees either the previous or the
 * new document, never a partial one.
 */

import { existsSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { ControllerStatus } from '../types/index.js';

const log = createSubsystemLogger('fan/status');

export interface StatusPublisher {
  /** Returns false when the document could not be written */
  publish(status: ControllerStatus): boolean;
  /** Removes the document; its absence means the controller is stopped */
  clear(): void;
}

export interface FileStatusPublisherOptions {
  /** Timestamp source for `updated_at` */
  now?: () => Date;
}

export function serializeStatus(status: ControllerStatus): string {
  return `${JSON.stringify(status, null, 2)}\n`;
}

export class FileStatusPublisher implements StatusPublisher {
  private readonly now: () => Date;

  constructor(readonly statusPath: string, options: FileStatusPublisherOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  get tempPath(): string {
    return `${this.statusPath}.${process.pid}.tmp`;
  }

  publish(status: ControllerStatus): boolean {
    const document: ControllerStatus = { ...status, updated_at: this.now().toISOString() };
    try {
      writeFileSync(this.tempPath, serializeStatus(document), 'utf8');
      renameSync(this.tempPath, this.statusPath);
      return true;
    } catch (error) {
      log.error('Failed to write status file', { path: this.statusPath, error: String(error) });
      this.removeQuietly(this.tempPath);
      return false;
    }
  }

  clear(): void {
    this.removeQuietly(this.tempPath);
    this.removeQuietly(this.statusPath);
  }

  private removeQuietly(path: string): void {
    if (!existsSync(path)) {
      return;
    }
    try {
      unlinkSync(path);
    } catch (error) {
      log.warn('Failed to remove status file', { path, error: String(error) });
    }
  }
}
