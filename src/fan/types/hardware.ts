/**
 * Hardware Device Interfaces
 *
 * Sensors and fans are polymorphic over two kinds: kernel hwmon files and the
 * vendor GPU command-line tools. Discovery returns them as homogeneous lists.
 */

export type DeviceKind = 'hwmon' | 'vendor-gpu';

export interface TemperatureSensor {
  /** Stable identity: the device path, or `vendor-gpu` */
  readonly id: string;
  readonly kind: DeviceKind;
  /**
   * Reads the current temperature in degrees Celsius.
   * Returns null when the reading failed; failures are logged, never thrown.
   */
  read(): number | null;
}

export interface FanOutput {
  readonly id: string;
  readonly kind: DeviceKind;
  /**
   * Commands a duty cycle in percent. Values outside 0-100 are clamped.
   * Returns false when the device rejected the write.
   */
  setSpeed(percent: number): boolean;
}

export interface DiscoveredHardware {
  sensors: TemperatureSensor[];
  fans: FanOutput[];
}
