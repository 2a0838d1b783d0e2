/**
 * Platform BLE capability required by the client.
 *
 * The client never touches a radio directly. A platform supplies adapters,
 * adapters surface peripherals seen while scanning, and peripherals expose
 * connection control and characteristic reads. `createNoblePlatform()` is
 * the production implementation, `MemoryPlatform` the in-process one.
 */

export interface ScanFilter {
  /** Service UUIDs to filter on. Advisory: platforms may still report others. */
  services: string[];
}

/**
 * Advertisement data known for a peripheral.
 */
export interface PeripheralProperties {
  /** Advertised local name, absent when the peripheral did not send one */
  localName?: string;

  /** Signal strength of the last advertisement, if known */
  rssi?: number;
}

/**
 * A resolved GATT characteristic.
 */
export interface GattCharacteristic {
  /** Characteristic UUID, in whatever form the platform reports */
  readonly uuid: string;

  /** UUID of the owning service */
  readonly serviceUuid: string;
}

export interface BluetoothPeripheral {
  /** Platform identifier (address or OS handle) */
  readonly id: string;

  /**
   * Read the latest advertisement properties.
   *
   * @returns Properties, or undefined if nothing has been received yet
   */
  properties(): Promise<PeripheralProperties | undefined>;

  /**
   * Connect and resolve services. No-op when already connected.
   */
  connect(): Promise<void>;

  disconnect(): Promise<void>;

  isConnected(): Promise<boolean>;

  /**
   * Characteristics resolved by the last successful connect.
   */
  characteristics(): GattCharacteristic[];

  read(characteristic: GattCharacteristic): Promise<Uint8Array>;
}

export interface BluetoothAdapter {
  startScan(filter: ScanFilter): Promise<void>;

  stopScan(): Promise<void>;

  /**
   * Peripherals seen by this adapter so far, in discovery order.
   */
  peripherals(): Promise<BluetoothPeripheral[]>;
}

export interface BluetoothPlatform {
  /**
   * Enumerate usable adapters.
   *
   * @returns Adapters, possibly empty
   */
  adapters(): Promise<BluetoothAdapter[]>;
}
