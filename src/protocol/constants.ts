/**
 * BLE protocol constants for Aranet4 devices.
 */

/** Service advertised by the Aranet4 family, used as the scan filter. */
export const ADVERTISED_SERVICE_UUID = '0000fce0-0000-1000-8000-00805f9b34fb';

/** Characteristic holding the current sensor readings. */
export const CURRENT_READINGS_CHARACTERISTIC_UUID = 'f0cd3001-95da-4f4b-9ac8-aa55d312af0c';

export const DEVICE_NAME_PREFIX = 'Aranet4';

// Discovery timing
export const SEARCH_TIMEOUT_MS = 10_000;
export const POLL_INTERVAL_MS = 1_000;

// Time allowed for the host adapter to report poweredOn
export const ADAPTER_TIMEOUT_MS = 5_000;

// Current readings layout
export const CURRENT_READINGS_LENGTH = 13;
export const TEMPERATURE_DIVISOR = 20;
export const PRESSURE_DIVISOR = 10;
