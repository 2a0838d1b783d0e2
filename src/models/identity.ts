/**
 * Device identity data structure.
 */

/**
 * Device Information Service strings reported by the sensor.
 */
export interface DeviceIdentity {
  readonly manufacturerName: string;
  readonly modelNumber: string;
  readonly serialNumber: string;
  readonly hardwareRevision: string;
  readonly firmwareRevision: string;
  readonly softwareRevision: string;
}
