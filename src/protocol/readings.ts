/**
 * Current readings payload parsing.
 */

import { DecodeError } from '../exceptions';
import { parseStatus } from '../models/enums';
import type { Measurement } from '../models/measurement';
import {
  CURRENT_READINGS_LENGTH,
  PRESSURE_DIVISOR,
  TEMPERATURE_DIVISOR,
} from './constants';

/**
 * Parse the current readings characteristic.
 *
 * Format (13 bytes, little-endian):
 *
 * - [0-1]: CO2 in ppm (uint16)
 * - [2-3]: Temperature in 1/20 °C (uint16)
 * - [4-5]: Pressure in 1/10 hPa (uint16)
 * - [6]: Relative humidity in percent (uint8)
 * - [7]: Battery in percent (uint8)
 * - [8]: Status, 1 = green, 2 = amber, 3 = red (uint8)
 * - [9-10]: Measurement interval in seconds (uint16)
 * - [11-12]: Seconds since last update (uint16)
 *
 * Bytes past offset 12 are ignored.
 *
 * @param data - Raw characteristic value
 * @returns Frozen Measurement
 * @throws {DecodeError} If data is too short or the status byte is not 1-3
 */
export function parseCurrentReadings(data: Uint8Array): Measurement {
  if (data.length < CURRENT_READINGS_LENGTH) {
    throw new DecodeError(
      `Current readings too short: ${data.length} bytes (need ${CURRENT_READINGS_LENGTH})`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const statusByte = view.getUint8(8);
  const status = parseStatus(statusByte);
  if (!status.ok) {
    throw new DecodeError(
      `Invalid status value: ${status.value} (expected 1, 2 or 3)`
    );
  }

  return Object.freeze({
    co2Ppm: view.getUint16(0, true),
    temperatureC: view.getUint16(2, true) / TEMPERATURE_DIVISOR,
    pressureHpa: Math.floor(view.getUint16(4, true) / PRESSURE_DIVISOR),
    humidityPercent: view.getUint8(6),
    batteryPercent: view.getUint8(7),
    status: status.status,
    intervalSeconds: view.getUint16(9, true),
    sinceLastUpdateSeconds: view.getUint16(11, true),
  });
}
