/**
 * ControllerStatus
 *
 * The document the control loop publishes for external observers. Absence of
 * the document means the controller is stopped.
 */

export type ControllerState = 'starting' | 'running' | 'error';

export interface ControllerStatus {
  pid: number;
  status: ControllerState;
  /** Last reading per sensor id; null when the last read failed */
  sensors: Record<string, number | null>;
  /** Last applied duty percentage per fan id */
  fans: Record<string, number>;
  error_message?: string;
  /** ISO-8601 time of the write */
  updated_at?: string;
}

export function createInitialStatus(pid: number): ControllerStatus {
  return {
    pid,
    status: 'starting',
    sensors: {},
    fans: {},
  };
}
