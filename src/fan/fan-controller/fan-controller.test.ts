/**
 * FanController Unit Tests
 *
 * Drives the control loop with in-memory sensors, fans and publisher. The
 * configuration is a real document in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { execFileSync } from 'node:child_process';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FanController, type FanSkip } from './fan-controller.js';
import { VendorGpuFan } from '../hardware/index.js';
import { FakeFan, FakeSensor, RecordingPublisher } from '../test-setup.js';
import type { ConfigDocument } from '../configuration/index.js';
import type { FanOutput, TemperatureSensor } from '../types/index.js';

const logger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => logger),
}));

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockExecFileSync = vi.mocked(execFileSync);

const CPU_POINTS: [number, number][] = [[20, 0], [40, 50], [60, 100]];

function warnings(message: string): unknown[][] {
  return logger.warn.mock.calls.filter(call => call[0] === message);
}

describe('FanController', () => {
  let dir: string;
  let configPath: string;
  let publisher: RecordingPublisher;
  let sensors: TemperatureSensor[];
  let fans: FanOutput[];
  const discover = vi.fn(() => ({ sensors, fans }));

  function writeConfig(document: ConfigDocument): void {
    writeFileSync(configPath, JSON.stringify(document));
  }

  function createController(sleep?: (ms: number, signal: AbortSignal) => Promise<void>): FanController {
    return new FanController({ configPath, publisher, discover, sleep, pid: 4242 });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'fan-controller-'));
    configPath = join(dir, 'config.json');
    publisher = new RecordingPublisher();
    sensors = [];
    fans = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('should publish starting and then running', () => {
      writeConfig({ curves: {}, fans: {} });
      const controller = createController();
      const transitions: unknown[] = [];
      controller.on('stateChanged', change => transitions.push(change));

      expect(controller.initialize()).toBe(true);

      expect(publisher.published.map(status => status.status)).toEqual(['starting', 'running']);
      expect(publisher.published[0]).toEqual({ pid: 4242, status: 'starting', sensors: {}, fans: {} });
      expect(transitions).toEqual([{ previous: 'starting', current: 'running' }]);
    });

    it('should pass the configured vendor timeout to discovery', () => {
      writeConfig({ hardware: { vendor_command_timeout_ms: 1500 } });

      createController().initialize();

      expect(discover).toHaveBeenCalledWith({ vendorTimeoutMs: 1500 });
    });

    it('should apply the GPU fan floor from configuration', () => {
      writeConfig({
        curves: { gpu: { sensor: 'vendor-gpu', points: [[30, 10], [80, 100]] } },
        fans: { 'vendor-gpu': 'gpu' },
        hardware: { vendor_min_fan_speed: 30 },
      });
      const gpuFan = new VendorGpuFan({ isPrivileged: () => true });
      sensors = [new FakeSensor('vendor-gpu', 20)];
      fans = [gpuFan];
      mockExecFileSync.mockReturnValue('');
      const controller = createController();

      controller.initialize();
      controller.runCycle();

      expect(gpuFan.getMinSpeed()).toBe(30);
      expect(mockExecFileSync).toHaveBeenCalledWith(
        'nvidia-settings',
        ['-a', '[gpu:0]/GPUFanControlState=1', '-a', '[fan:0]/GPUTargetFanSpeed=30'],
        expect.objectContaining({ timeout: 5000 }),
      );
    });

    it('should warn about bindings for fans that were not discovered', () => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { ghost: 'cpu' },
      });

      createController().initialize();

      expect(warnings('Configured fan was not found on this system')).toEqual([
        ['Configured fan was not found on this system', { fan: 'ghost' }],
      ]);
    });

    it('should publish a single error when the configuration is missing', () => {
      const controller = createController();

      expect(controller.initialize()).toBe(false);

      expect(publisher.published.map(status => status.status)).toEqual(['starting', 'error']);
      expect(publisher.last()?.error_message).toBe(`config.json not found at ${configPath}`);
      expect(discover).not.toHaveBeenCalled();
    });
  });

  describe('runCycle', () => {
    beforeEach(() => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { f1: 'cpu', f2: 'cpu' },
      });
    });

    it('should drive each bound fan from its curve', () => {
      sensors = [new FakeSensor('s1', 30), new FakeSensor('s2', 55)];
      const f1 = new FakeFan('f1');
      const f2 = new FakeFan('f2');
      fans = [f1, f2];
      const controller = createController();
      controller.initialize();

      const report = controller.runCycle();

      expect(f1.requests).toEqual([25]);
      expect(f2.requests).toEqual([25]);
      expect(report.readings).toEqual({ s1: 30, s2: 55 });
      expect(report.skipped).toEqual([]);
      expect(publisher.last()).toEqual({
        pid: 4242,
        status: 'running',
        sensors: { s1: 30, s2: 55 },
        fans: { f1: 25, f2: 25 },
      });
    });

    it('should limit speed changes to the configured step', () => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { f1: 'cpu' },
        control: { step: 10 },
      });
      const sensor = new FakeSensor('s1', 40);
      const fan = new FakeFan('f1');
      sensors = [sensor];
      fans = [fan];
      const controller = createController();
      controller.initialize();

      controller.runCycle();
      sensor.value = 60;
      controller.runCycle();
      sensor.value = 40;
      controller.runCycle();

      expect(fan.requests).toEqual([50, 60, 50]);
      expect(controller.getLastSpeed('f1')).toBe(50);
    });

    it('should keep other fans running when one write fails', () => {
      sensors = [new FakeSensor('s1', 50)];
      const failing = new FakeFan('f1');
      failing.failWrites = true;
      const healthy = new FakeFan('f2');
      fans = [failing, healthy];
      const controller = createController();
      controller.initialize();

      const report = controller.runCycle();

      expect(failing.requests).toEqual([75]);
      expect(healthy.requests).toEqual([75]);
      expect(report.updates.map(update => [update.fanId, update.written])).toEqual([
        ['f1', false],
        ['f2', true],
      ]);
      expect(publisher.last()?.fans).toEqual({ f2: 75 });
    });

    it('should skip a fan bound to a missing curve on every cycle', () => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { F: 'turbo', f2: 'cpu' },
      });
      sensors = [new FakeSensor('s1', 30)];
      const missing = new FakeFan('F');
      const healthy = new FakeFan('f2');
      fans = [missing, healthy];
      const controller = createController();
      const skips: FanSkip[] = [];
      controller.on('fanSkipped', skip => skips.push(skip));
      controller.initialize();

      controller.runCycle();
      controller.runCycle();

      expect(missing.requests).toEqual([]);
      expect(healthy.requests).toEqual([25, 25]);
      expect(skips).toEqual([
        { fanId: 'F', reason: 'missing_curve', curveName: 'turbo' },
        { fanId: 'F', reason: 'missing_curve', curveName: 'turbo' },
      ]);
      expect(warnings('Curve not found for fan, skipping')).toEqual([
        ['Curve not found for fan, skipping', { fan: 'F', curve: 'turbo' }],
      ]);
      expect(publisher.last()?.fans).toEqual({ f2: 25 });
    });

    it('should skip unbound fans with a single warning', () => {
      writeConfig({ curves: { cpu: { sensor: 's1', points: CPU_POINTS } }, fans: { f1: null } });
      sensors = [new FakeSensor('s1', 30)];
      const fan = new FakeFan('f1');
      fans = [fan, new FakeFan('f9')];
      const controller = createController();
      controller.initialize();

      controller.runCycle();
      const report = controller.runCycle();

      expect(fan.requests).toEqual([]);
      expect(report.skipped.map(skip => [skip.fanId, skip.reason])).toEqual([
        ['f1', 'unbound'],
        ['f9', 'unbound'],
      ]);
      expect(warnings('No curve assigned to fan, skipping')).toHaveLength(2);
    });

    it('should skip a fan whose curve sensor was not discovered', () => {
      writeConfig({ curves: { cpu: { sensor: 's9', points: CPU_POINTS } }, fans: { f1: 'cpu' } });
      sensors = [new FakeSensor('s1', 30)];
      const fan = new FakeFan('f1');
      fans = [fan];
      const controller = createController();
      controller.initialize();

      const report = controller.runCycle();

      expect(fan.requests).toEqual([]);
      expect(report.skipped).toEqual([
        { fanId: 'f1', reason: 'missing_sensor', curveName: 'cpu', sensorId: 's9' },
      ]);
    });

    it('should hold a fan at its last speed while its sensor fails', () => {
      const sensor = new FakeSensor('s1', 30);
      const fan = new FakeFan('f1');
      sensors = [sensor];
      fans = [fan];
      const controller = createController();
      controller.initialize();

      controller.runCycle();
      sensor.value = null;
      const report = controller.runCycle();

      expect(fan.requests).toEqual([25]);
      expect(report.skipped).toEqual([
        { fanId: 'f1', reason: 'no_reading', curveName: 'cpu', sensorId: 's1' },
      ]);
      expect(publisher.last()).toMatchObject({ sensors: { s1: null }, fans: { f1: 25 } });
      expect(logger.debug).toHaveBeenCalledWith('No reading for curve sensor, keeping fan speed', {
        fanId: 'f1',
        reason: 'no_reading',
        curveName: 'cpu',
        sensorId: 's1',
      });
      expect(warnings('Curve sensor not available, skipping fan')).toEqual([]);
    });

    it('should refuse to cycle before initialization', () => {
      expect(() => createController().runCycle()).toThrow('Fan controller has not been initialized');
    });
  });

  describe('run', () => {
    beforeEach(() => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { f1: 'cpu' },
        control: { interval_seconds: 2 },
      });
      sensors = [new FakeSensor('s1', 45)];
      fans = [new FakeFan('f1')];
    });

    it('should cycle until stopped and then clear the status', async () => {
      let controller: FanController | undefined;
      const sleep = vi.fn(async () => {
        if (controller && controller.getCycleCount() >= 3) {
          controller.stop();
        }
      });
      controller = createController(sleep);
      const stopped = vi.fn();
      controller.on('stopped', stopped);

      const outcome = await controller.run();

      expect(outcome).toBe('stopped');
      expect(controller.getCycleCount()).toBe(3);
      expect(sleep).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(2000, expect.any(AbortSignal));
      expect(publisher.clearCount).toBe(1);
      expect(stopped).toHaveBeenCalledWith('stopped');
      expect(controller.isRunning()).toBe(false);
    });

    it('should never enter the loop without a configuration', async () => {
      rmSync(configPath);
      const sleep = vi.fn(async () => undefined);
      const controller = createController(sleep);

      const outcome = await controller.run();

      expect(outcome).toBe('error');
      expect(sleep).not.toHaveBeenCalled();
      expect(controller.getCycleCount()).toBe(0);
      const errors = publisher.published.filter(status => status.status === 'error');
      expect(errors).toHaveLength(1);
      expect(errors[0].error_message).toBe(`config.json not found at ${configPath}`);
      expect(publisher.clearCount).toBe(1);
    });

    it('should end with an error status when a cycle throws', async () => {
      fans = [{
        id: 'f1',
        kind: 'hwmon',
        setSpeed: () => {
          throw new Error('device vanished');
        },
      }];
      const controller = createController(vi.fn(async () => undefined));

      const outcome = await controller.run();

      expect(outcome).toBe('error');
      expect(publisher.last()).toMatchObject({ status: 'error', error_message: 'device vanished' });
      expect(controller.getStatus().status).toBe('error');
      expect(publisher.clearCount).toBe(1);
    });

    it('should cut the inter-cycle sleep short when stopped', async () => {
      writeConfig({
        curves: { cpu: { sensor: 's1', points: CPU_POINTS } },
        fans: { f1: 'cpu' },
        control: { interval_seconds: 60 },
      });
      const controller = createController();
      controller.once('cycleCompleted', () => controller.stop());

      const outcome = await controller.run();

      expect(outcome).toBe('stopped');
      expect(controller.getCycleCount()).toBe(1);
    });
  });
});
