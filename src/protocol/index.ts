/**
 * Protocol layer exports for Aranet4 BLE communication.
 */

export * from './constants';
export * from './uuid';
export * from './readings';
export * from './device-information';
