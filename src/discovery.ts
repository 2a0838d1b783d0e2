/**
 * Aranet4 discovery and connection.
 *
 * Scanning surfaces peripherals asynchronously and the platform scan filter
 * is only advisory, so the adapter's peripheral list is polled and matched
 * by advertised name until a timer runs out.
 */

import { Aranet4Device } from './device';
import {
  AdapterUnavailableError,
  CharacteristicNotFoundError,
  ConnectionTransportError,
  SearchTimeoutError,
} from './exceptions';
import {
  ADVERTISED_SERVICE_UUID,
  CURRENT_READINGS_CHARACTERISTIC_UUID,
  DEVICE_NAME_PREFIX,
  POLL_INTERVAL_MS,
  SEARCH_TIMEOUT_MS,
} from './protocol/constants';
import { uuidEquals } from './protocol/uuid';
import type {
  BluetoothAdapter,
  BluetoothPeripheral,
  BluetoothPlatform,
} from './transport/types';

/**
 * Options for {@link connect}.
 */
export interface ConnectOptions {
  /**
   * BLE platform to use. Defaults to noble, loaded on first use.
   */
  platform?: BluetoothPlatform;

  /**
   * Advertised name prefix to match (default: "Aranet4")
   */
  namePrefix?: string;

  /**
   * Service UUID passed to the scan filter
   */
  serviceUuid?: string;

  /**
   * Give up if no device is found within this time (default: 10000)
   */
  searchTimeoutMs?: number;

  /**
   * Delay between peripheral list polls (default: 1000)
   */
  pollIntervalMs?: number;
}

/**
 * Peripheral matched during a search, with the name it matched on.
 */
export interface FoundPeripheral {
  peripheral: BluetoothPeripheral;
  localName: string;
}

/**
 * Find an Aranet4 device and connect to it.
 *
 * @param options - Platform and discovery parameters
 * @returns Connected device
 * @throws {AdapterUnavailableError} If the platform has no adapter
 * @throws {SearchTimeoutError} If no device is found in time
 * @throws {CharacteristicNotFoundError} If the device lacks the current readings characteristic
 * @throws {ConnectionTransportError} If scanning, polling or connecting fails
 *
 * @example
 * ```typescript
 * const device = await connect();
 * // or with a specific unit and a shorter search:
 * const device = await connect({ namePrefix: 'Aranet4 1A2B3', searchTimeoutMs: 5000 });
 * ```
 */
export async function connect(options: ConnectOptions = {}): Promise<Aranet4Device> {
  const platform = options.platform ?? (await loadDefaultPlatform());
  const adapter = await firstAdapter(platform);

  const serviceUuid = options.serviceUuid ?? ADVERTISED_SERVICE_UUID;
  try {
    await adapter.startScan({ services: [serviceUuid] });
  } catch (e) {
    throw new ConnectionTransportError(e);
  }

  console.log(`Scanning for devices advertising ${serviceUuid}`);

  let found: FoundPeripheral;
  try {
    found = await searchWithTimeout(
      adapter,
      options.namePrefix ?? DEVICE_NAME_PREFIX,
      options.searchTimeoutMs ?? SEARCH_TIMEOUT_MS,
      options.pollIntervalMs ?? POLL_INTERVAL_MS
    );
  } finally {
    await stopScanQuietly(adapter);
  }

  const { peripheral, localName } = found;
  console.log(`Found ${localName} (${peripheral.id}), connecting`);

  try {
    await peripheral.connect();
  } catch (e) {
    throw new ConnectionTransportError(e);
  }

  const currentReadings = peripheral
    .characteristics()
    .find((c) => uuidEquals(c.uuid, CURRENT_READINGS_CHARACTERISTIC_UUID));

  if (!currentReadings) {
    throw new CharacteristicNotFoundError(CURRENT_READINGS_CHARACTERISTIC_UUID);
  }

  console.log(`Connected to ${localName}`);

  return new Aranet4Device(peripheral, currentReadings, localName);
}

/**
 * Race a polling search against a timer.
 *
 * Whichever settles first decides the outcome; the loser is cancelled via an
 * AbortSignal. A peripheral query already in flight when the timer fires is
 * left to finish on its own.
 *
 * @throws {SearchTimeoutError} If the timer fires first
 * @throws {ConnectionTransportError} If polling the adapter fails
 */
export async function searchWithTimeout(
  adapter: BluetoothAdapter,
  namePrefix: string,
  timeoutMs: number,
  pollIntervalMs: number
): Promise<FoundPeripheral> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new SearchTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      findDevice(adapter, namePrefix, pollIntervalMs, controller.signal),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}

/**
 * Poll the adapter until a peripheral whose name starts with `namePrefix`
 * shows up. Has no exit of its own other than the abort signal.
 */
async function findDevice(
  adapter: BluetoothAdapter,
  namePrefix: string,
  pollIntervalMs: number,
  signal: AbortSignal
): Promise<FoundPeripheral> {
  while (!signal.aborted) {
    let peripherals: BluetoothPeripheral[];
    try {
      peripherals = await adapter.peripherals();
    } catch (e) {
      throw new ConnectionTransportError(e);
    }

    console.debug(`Polled ${peripherals.length} peripherals`);

    for (const peripheral of peripherals) {
      if (signal.aborted) {
        break;
      }

      let localName: string | undefined;
      try {
        localName = (await peripheral.properties())?.localName;
      } catch (e) {
        throw new ConnectionTransportError(e);
      }

      if (localName === undefined) {
        continue;
      }

      if (localName.startsWith(namePrefix)) {
        return { peripheral, localName };
      }
    }

    await sleep(pollIntervalMs, signal);
  }

  throw new ConnectionTransportError(signal.reason);
}

async function firstAdapter(platform: BluetoothPlatform): Promise<BluetoothAdapter> {
  let adapters: BluetoothAdapter[];
  try {
    adapters = await platform.adapters();
  } catch (e) {
    throw new AdapterUnavailableError({ cause: e });
  }

  const [adapter] = adapters;
  if (!adapter) {
    throw new AdapterUnavailableError();
  }
  return adapter;
}

async function stopScanQuietly(adapter: BluetoothAdapter): Promise<void> {
  try {
    await adapter.stopScan();
  } catch (e) {
    console.warn(`Failed to stop scanning: ${e instanceof Error ? e.message : String(e)}`);
  }
}

async function loadDefaultPlatform(): Promise<BluetoothPlatform> {
  const { createNoblePlatform } = await import('./transport/noble');
  return createNoblePlatform();
}

/**
 * Wait `ms` milliseconds, or less if the signal aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
