/**
 * Command-line interface: `run` (default), `status` and `discover`.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { configureLogging, isLogLevelName, LOG_LEVELS, type LogFormat } from '../logging/subsystem.js';
import {
  configPathsFor,
  discoverHardware,
  readControllerStatus,
  resolveConfigDir,
  runFanDaemon,
  type FanDaemonOptions,
} from '../fan/index.js';
import { formatHardware, formatObservedStatus } from './format.js';

const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json', 'hidden'];

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

const processIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
  setExitCode: code => {
    process.exitCode = code;
  },
};

interface GlobalOptions {
  logLevel?: string;
  logFormat?: string;
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function applyLoggingOptions(options: GlobalOptions): void {
  configureLogging({
    ...(options.logLevel !== undefined && isLogLevelName(options.logLevel) ? { level: options.logLevel } : {}),
    ...(options.logFormat !== undefined && isLogFormat(options.logFormat) ? { format: options.logFormat } : {}),
  });
}

export function buildProgram(io: CliIo = processIo, daemonOptions: FanDaemonOptions = {}): Command {
  const program = new Command();

  program
    .name('fan-curve')
    .description('Temperature-driven fan curve daemon for hwmon and GPU fans')
    .addOption(new Option('--log-level <level>', 'minimum log level').choices(Object.keys(LOG_LEVELS)))
    .addOption(new Option('--log-format <format>', 'log output format').choices([...LOG_FORMATS]))
    .hook('preAction', () => applyLoggingOptions(program.opts<GlobalOptions>()));

  program
    .command('run', { isDefault: true })
    .description('run the control loop until interrupted')
    .argument('[configDir]', 'directory holding config.json')
    .action(async (configDir: string | undefined) => {
      const outcome = await runFanDaemon({ ...daemonOptions, configDir: configDir ?? daemonOptions.configDir });
      if (outcome === 'error') {
        io.err(chalk.red('Fan controller stopped with an error; see the log for details'));
        io.setExitCode(1);
      }
    });

  program
    .command('status')
    .description('show the state published by a running controller')
    .argument('[configDir]', 'directory holding the status file')
    .action((configDir: string | undefined) => {
      const dir = resolveConfigDir({ override: configDir, cwd: daemonOptions.cwd, home: daemonOptions.home });
      const observed = readControllerStatus(configPathsFor(dir).statusPath);
      for (const line of formatObservedStatus(observed)) {
        io.out(line);
      }
      if (observed.state === 'error' || observed.state === 'unknown') {
        io.setExitCode(1);
      }
    });

  program
    .command('discover')
    .description('list temperature sensors and controllable fans')
    .option('--hwmon-root <path>', 'hwmon class directory')
    .option('--no-vendor', 'skip the GPU vendor tool probe')
    .action((options: { hwmonRoot?: string; vendor: boolean }) => {
      const discover = daemonOptions.discover ?? discoverHardware;
      const hardware = discover({ hwmonRoot: options.hwmonRoot, probeVendor: options.vendor });
      for (const line of formatHardware(hardware)) {
        io.out(line);
      }
    });

  return program;
}
