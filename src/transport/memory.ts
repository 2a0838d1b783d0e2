/**
 * In-process BLE platform.
 *
 * Scripted peripherals for tests and offline development: advertised names,
 * characteristic values, link drops and transport failures, with no radio.
 */

import type {
  BluetoothAdapter,
  BluetoothPeripheral,
  BluetoothPlatform,
  GattCharacteristic,
  PeripheralProperties,
  ScanFilter,
} from './types';

export interface MemoryCharacteristic extends GattCharacteristic {
  value: Uint8Array;
}

export interface MemoryPeripheralInit {
  id: string;
  localName?: string;
  characteristics?: Array<{ uuid: string; serviceUuid?: string; value: Uint8Array }>;
}

/**
 * Failure injection points. A set error is thrown by the next matching call.
 */
export interface MemoryFailures {
  connect?: Error;
  disconnect?: Error;
  isConnected?: Error;
  read?: Error;
  properties?: Error;
}

export class MemoryPeripheral implements BluetoothPeripheral {
  readonly id: string;
  localName: string | undefined;
  failures: MemoryFailures = {};

  connectCalls = 0;
  disconnectCalls = 0;
  readonly reads: string[] = [];

  private connected = false;
  private readonly gatt: MemoryCharacteristic[];

  constructor(init: MemoryPeripheralInit) {
    this.id = init.id;
    this.localName = init.localName;
    this.gatt = (init.characteristics ?? []).map((c) => ({
      uuid: c.uuid,
      serviceUuid: c.serviceUuid ?? '',
      value: c.value,
    }));
  }

  async properties(): Promise<PeripheralProperties | undefined> {
    this.fail('properties');
    return { localName: this.localName };
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    this.fail('connect');
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls++;
    this.fail('disconnect');
    this.connected = false;
  }

  async isConnected(): Promise<boolean> {
    this.fail('isConnected');
    return this.connected;
  }

  characteristics(): GattCharacteristic[] {
    // Nothing is resolved until the first connect
    return this.connectCalls > 0 ? [...this.gatt] : [];
  }

  async read(characteristic: GattCharacteristic): Promise<Uint8Array> {
    this.fail('read');
    if (!this.connected) {
      throw new Error(`Peripheral ${this.id} is not connected`);
    }

    const match = this.gatt.find((c) => c.uuid === characteristic.uuid);
    if (!match) {
      throw new Error(`Characteristic ${characteristic.uuid} not found on ${this.id}`);
    }

    this.reads.push(match.uuid);
    return match.value.slice();
  }

  /**
   * Replace the value served for a characteristic.
   */
  setValue(uuid: string, value: Uint8Array): void {
    const match = this.gatt.find((c) => c.uuid === uuid);
    if (!match) {
      throw new Error(`Characteristic ${uuid} not found on ${this.id}`);
    }
    match.value = value;
  }

  /**
   * Drop the link as if the device went out of range.
   */
  dropConnection(): void {
    this.connected = false;
  }

  private fail(operation: keyof MemoryFailures): void {
    const error = this.failures[operation];
    if (error) {
      delete this.failures[operation];
      throw error;
    }
  }
}

export class MemoryAdapter implements BluetoothAdapter {
  scanning = false;
  readonly scanFilters: ScanFilter[] = [];
  failures: { startScan?: Error; stopScan?: Error; peripherals?: Error } = {};
  pollCount = 0;

  private readonly visible: MemoryPeripheral[] = [];

  async startScan(filter: ScanFilter): Promise<void> {
    if (this.failures.startScan) {
      throw this.failures.startScan;
    }
    this.scanFilters.push(filter);
    this.scanning = true;
  }

  async stopScan(): Promise<void> {
    this.scanning = false;
    if (this.failures.stopScan) {
      throw this.failures.stopScan;
    }
  }

  async peripherals(): Promise<BluetoothPeripheral[]> {
    this.pollCount++;
    if (this.failures.peripherals) {
      throw this.failures.peripherals;
    }
    return [...this.visible];
  }

  /**
   * Make a peripheral visible to subsequent polls.
   */
  advertise(peripheral: MemoryPeripheral): void {
    this.visible.push(peripheral);
  }
}

export class MemoryPlatform implements BluetoothPlatform {
  constructor(readonly adapterList: MemoryAdapter[] = [new MemoryAdapter()]) {}

  async adapters(): Promise<BluetoothAdapter[]> {
    return [...this.adapterList];
  }
}
