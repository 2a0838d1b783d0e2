/**
 * Current readings data structure.
 */

import type { Status } from './enums';

/**
 * One snapshot of the sensor, decoded from the current readings characteristic.
 */
export interface Measurement {
  /** CO2 concentration in ppm */
  readonly co2Ppm: number;

  /** Temperature in Celsius (0.05 resolution) */
  readonly temperatureC: number;

  /** Atmospheric pressure in hPa, truncated to an integer */
  readonly pressureHpa: number;

  /** Relative humidity in percent */
  readonly humidityPercent: number;

  /** Remaining battery in percent */
  readonly batteryPercent: number;

  /** CO2 status indicator */
  readonly status: Status;

  /** Configured measurement interval in seconds */
  readonly intervalSeconds: number;

  /** Seconds since the device last refreshed its readings */
  readonly sinceLastUpdateSeconds: number;
}
