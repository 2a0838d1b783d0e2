/**
 * noble platform implementation.
 *
 * Wraps @abandonware/noble (HCI on Linux, CoreBluetooth on macOS, WinRT on
 * Windows) behind the {@link BluetoothPlatform} interface. noble exposes a
 * single host adapter, reported once it reaches the poweredOn state.
 *
 * noble is loaded on first use: requiring it opens the host radio, which
 * importing this library must not do.
 */

import type { Characteristic, Peripheral } from '@abandonware/noble';
import { ADAPTER_TIMEOUT_MS } from '../protocol/constants';
import { toNobleUuid } from '../protocol/uuid';
import type {
  BluetoothAdapter,
  BluetoothPeripheral,
  BluetoothPlatform,
  GattCharacteristic,
  PeripheralProperties,
  ScanFilter,
} from './types';

type Noble = typeof import('@abandonware/noble');

export interface NoblePlatformOptions {
  /**
   * How long to wait for the adapter to power on (default: 5000)
   */
  adapterTimeoutMs?: number;

  /**
   * Report repeated advertisements from the same peripheral (default: false)
   */
  allowDuplicates?: boolean;
}

// States after which the adapter will not become usable without user action
const UNUSABLE_STATES = new Set(['unsupported', 'unauthorized', 'poweredOff']);

interface NobleGattCharacteristic extends GattCharacteristic {
  readonly native: Characteristic;
}

/**
 * Wraps a noble peripheral. Characteristics are discovered once per
 * connection and cached for {@link characteristics}.
 */
class NoblePeripheral implements BluetoothPeripheral {
  readonly id: string;
  private resolved: NobleGattCharacteristic[] = [];

  constructor(private readonly native: Peripheral) {
    this.id = native.id;
  }

  async properties(): Promise<PeripheralProperties | undefined> {
    const advertisement = this.native.advertisement;
    if (!advertisement) {
      return undefined;
    }

    const localName: string | undefined = advertisement.localName || undefined;
    return { localName, rssi: this.native.rssi };
  }

  async connect(): Promise<void> {
    if (this.native.state === 'connected' && this.resolved.length > 0) {
      return;
    }

    if (this.native.state !== 'connected') {
      await this.native.connectAsync();
    }

    const { services } = await this.native.discoverAllServicesAndCharacteristicsAsync();

    this.resolved = services.flatMap((service) =>
      (service.characteristics ?? []).map((native) => ({
        uuid: native.uuid,
        serviceUuid: service.uuid,
        native,
      }))
    );
  }

  async disconnect(): Promise<void> {
    await this.native.disconnectAsync();
  }

  async isConnected(): Promise<boolean> {
    return this.native.state === 'connected';
  }

  characteristics(): GattCharacteristic[] {
    return [...this.resolved];
  }

  async read(characteristic: GattCharacteristic): Promise<Uint8Array> {
    const match = this.resolved.find((c) => c === characteristic || c.uuid === characteristic.uuid);
    if (!match) {
      throw new Error(`Characteristic ${characteristic.uuid} is not resolved on ${this.id}`);
    }

    const data = await match.native.readAsync();
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  }
}

/**
 * The host adapter. Peripherals are collected from discover events while a
 * scan runs; the listener is detached when the scan stops.
 */
class NobleAdapter implements BluetoothAdapter {
  private readonly discovered = new Map<string, NoblePeripheral>();
  private listening = false;

  constructor(
    private readonly noble: Noble,
    private readonly allowDuplicates: boolean
  ) {}

  private readonly handleDiscover = (peripheral: Peripheral): void => {
    if (this.discovered.has(peripheral.id)) {
      return;
    }
    console.debug(
      `Discovered ${peripheral.advertisement?.localName || 'unnamed peripheral'} (${peripheral.id})`
    );
    this.discovered.set(peripheral.id, new NoblePeripheral(peripheral));
  };

  async startScan(filter: ScanFilter): Promise<void> {
    if (!this.listening) {
      this.noble.on('discover', this.handleDiscover);
      this.listening = true;
    }

    await this.noble.startScanningAsync(filter.services.map(toNobleUuid), this.allowDuplicates);
  }

  async stopScan(): Promise<void> {
    if (this.listening) {
      this.noble.removeListener('discover', this.handleDiscover);
      this.listening = false;
    }

    await this.noble.stopScanningAsync();
  }

  async peripherals(): Promise<BluetoothPeripheral[]> {
    return [...this.discovered.values()];
  }
}

class NoblePlatform implements BluetoothPlatform {
  private adapter: NobleAdapter | null = null;

  constructor(
    private readonly noble: Noble,
    private readonly options: Required<NoblePlatformOptions>
  ) {}

  async adapters(): Promise<BluetoothAdapter[]> {
    const state = await this.waitForPoweredOn();
    if (state !== 'poweredOn') {
      console.warn(`Bluetooth adapter unavailable (state: ${state})`);
      return [];
    }

    this.adapter ??= new NobleAdapter(this.noble, this.options.allowDuplicates);
    return [this.adapter];
  }

  /**
   * Resolve with poweredOn, an unusable state, or the last state seen when
   * the wait times out.
   */
  private waitForPoweredOn(): Promise<string> {
    const current: string = this.noble._state;
    if (current === 'poweredOn' || UNUSABLE_STATES.has(current)) {
      return Promise.resolve(current);
    }

    return new Promise<string>((resolve) => {
      let last = current;

      const stateChangeHandler = (state: string) => {
        last = state;
        if (state === 'poweredOn' || UNUSABLE_STATES.has(state)) {
          settle(state);
        }
      };

      const settle = (state: string) => {
        clearTimeout(timer);
        this.noble.removeListener('stateChange', stateChangeHandler);
        resolve(state);
      };

      const timer = setTimeout(() => settle(last), this.options.adapterTimeoutMs);
      this.noble.on('stateChange', stateChangeHandler);
    });
  }
}

/**
 * Create the noble-backed platform.
 *
 * @param options - Adapter wait and scan options
 * @example
 * ```typescript
 * const platform = await createNoblePlatform({ adapterTimeoutMs: 10000 });
 * const device = await connect({ platform });
 * ```
 */
export async function createNoblePlatform(
  options: NoblePlatformOptions = {}
): Promise<BluetoothPlatform> {
  const { default: noble } = await import('@abandonware/noble');

  return new NoblePlatform(noble, {
    adapterTimeoutMs: options.adapterTimeoutMs ?? ADAPTER_TIMEOUT_MS,
    allowDuplicates: options.allowDuplicates ?? false,
  });
}
