/**
 * Models layer exports for Aranet4 data structures.
 */

export * from './enums';
export * from './measurement';
export * from './identity';
