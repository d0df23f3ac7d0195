/**
 * Fan Curve Daemon Entry Point
 *
 * Resolves the configuration directory, wires the controller to the status
 * file and to process signals, and runs it to completion.
 */

import { createSubsystemLogger } from '../logging/subsystem.js';
import { configPathsFor, resolveConfigDir } from './configuration/index.js';
import { FanController, type ControllerOutcome } from './fan-controller/index.js';
import { discoverHardware, type DiscoveryOptions } from './hardware/index.js';
import { FileStatusPublisher } from './status-publisher/index.js';
import type { DiscoveredHardware } from './types/index.js';

export * from './types/index.js';
export * from './hardware/index.js';
export * from './curve-evaluator/index.js';
export * from './speed-smoother/index.js';
export * from './configuration/index.js';
export * from './status-publisher/index.js';
export * from './fan-controller/index.js';

const log = createSubsystemLogger('fan/daemon');

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export interface FanDaemonOptions {
  /** Configuration directory; resolved from the working directory when relative */
  configDir?: string;
  cwd?: string;
  home?: string;
  discover?: (options: DiscoveryOptions) => DiscoveredHardware;
  /** Install SIGINT/SIGTERM handlers and the exit backstop (default true) */
  handleSignals?: boolean;
  /** Receives the controller before it starts, e.g. to attach listeners */
  onController?: (controller: FanController) => void;
}

/**
 * Runs the daemon until it is stopped by a signal or fails.
 */
export async function runFanDaemon(options: FanDaemonOptions = {}): Promise<ControllerOutcome> {
  const configDir = resolveConfigDir({ override: options.configDir, cwd: options.cwd, home: options.home });
  const paths = configPathsFor(configDir);
  const publisher = new FileStatusPublisher(paths.statusPath);

  const controller = new FanController({
    configPath: paths.configPath,
    publisher,
    discover: options.discover ?? discoverHardware,
  });
  options.onController?.(controller);

  log.info('Starting fan curve daemon', { configDir, pid: process.pid });

  const onSignal = (signal: NodeJS.Signals): void => {
    log.info('Received signal, stopping', { signal });
    controller.stop();
  };
  const onExit = (): void => publisher.clear();

  const handleSignals = options.handleSignals ?? true;
  if (handleSignals) {
    for (const signal of STOP_SIGNALS) {
      process.on(signal, onSignal);
    }
    process.on('exit', onExit);
  }

  try {
    return await controller.run();
  } finally {
    if (handleSignals) {
      for (const signal of STOP_SIGNALS) {
        process.off(signal, onSignal);
      }
      process.off('exit', onExit);
    }
  }
}
