/**
 * aranet4-ble - TypeScript client for Aranet4 BLE CO2 sensors
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { Aranet4Device } from './device';
export { connect, searchWithTimeout } from './discovery';
export type { ConnectOptions, FoundPeripheral } from './discovery';

// Models and types
export * from './models';

// Protocol
export * from './protocol';

// Transports
export type * from './transport/types';
export { createNoblePlatform } from './transport/noble';
export type { NoblePlatformOptions } from './transport/noble';
export * from './transport/memory';

// Exceptions
export * from './exceptions';
