/**
 * Connected Aranet4 device.
 */

import { DeviceTransportError } from './exceptions';
import type { DeviceIdentity } from './models/identity';
import type { Measurement } from './models/measurement';
import { resolveIdentity } from './protocol/device-information';
import { parseCurrentReadings } from './protocol/readings';
import type { BluetoothPeripheral, GattCharacteristic } from './transport/types';

/**
 * Aranet4 CO2 sensor.
 *
 * Created by `connect()`. Holds the peripheral and its current readings
 * characteristic, which is resolved once and reused across reconnects.
 * Operations on one device must not overlap.
 *
 * @example
 * ```typescript
 * const device = await connect();
 * const identity = await device.readIdentity();
 * const measurement = await device.readMeasurement();
 * console.log(`${identity.modelNumber}: ${measurement.co2Ppm} ppm`);
 * await device.disconnect();
 * ```
 */
export class Aranet4Device {
  constructor(
    private readonly peripheral: BluetoothPeripheral,
    private readonly currentReadings: GattCharacteristic,
    private readonly localName?: string
  ) {}

  /**
   * Platform identifier of the peripheral.
   */
  get id(): string {
    return this.peripheral.id;
  }

  /**
   * Advertised name seen during discovery.
   */
  get name(): string | undefined {
    return this.localName;
  }

  /**
   * Ask the platform whether the link is up. Never cached.
   *
   * @throws {DeviceTransportError} If the platform query fails
   */
  async isConnected(): Promise<boolean> {
    try {
      return await this.peripheral.isConnected();
    } catch (e) {
      throw new DeviceTransportError(e);
    }
  }

  /**
   * Read and decode the current sensor values.
   *
   * Reconnects first if the platform reports the link as down.
   *
   * @throws {DecodeError} If the payload is malformed
   * @throws {DeviceTransportError} If reconnecting or reading fails
   */
  async readMeasurement(): Promise<Measurement> {
    await this.ensureConnected();

    let data: Uint8Array;
    try {
      data = await this.peripheral.read(this.currentReadings);
    } catch (e) {
      throw new DeviceTransportError(e);
    }

    console.debug(`Read ${data.length} bytes of current readings from ${this.id}`);

    return parseCurrentReadings(data);
  }

  /**
   * Read the Device Information Service strings.
   *
   * @throws {MissingAttributeError} If one of the six attributes is not exposed
   * @throws {InvalidAttributeError} If a value is not UTF-8
   * @throws {DeviceTransportError} If reconnecting or reading fails
   */
  async readIdentity(): Promise<DeviceIdentity> {
    await this.ensureConnected();

    return resolveIdentity(this.peripheral.characteristics(), (characteristic) =>
      this.peripheral.read(characteristic)
    );
  }

  /**
   * Re-establish the link. The platform no-ops when already connected.
   *
   * @throws {DeviceTransportError} If connecting fails
   */
  async reconnect(): Promise<void> {
    console.log(`Reconnecting to ${this.name ?? this.id}`);

    try {
      await this.peripheral.connect();
    } catch (e) {
      throw new DeviceTransportError(e);
    }
  }

  /**
   * Tear down the link. The device can be reconnected afterwards.
   *
   * @throws {DeviceTransportError} If the platform fails to disconnect
   */
  async disconnect(): Promise<void> {
    try {
      await this.peripheral.disconnect();
    } catch (e) {
      throw new DeviceTransportError(e);
    }

    console.log(`Disconnected from ${this.name ?? this.id}`);
  }

  private async ensureConnected(): Promise<void> {
    if (!(await this.isConnected())) {
      await this.reconnect();
    }
  }
}
