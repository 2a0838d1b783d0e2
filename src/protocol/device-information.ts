/**
 * Device Information Service (0x180A) attribute table and identity assembly.
 */

import {
  DeviceTransportError,
  InvalidAttributeError,
  MissingAttributeError,
} from '../exceptions';
import type { DeviceIdentity } from '../models/identity';
import type { GattCharacteristic } from '../transport/types';
import { normalizeUuid, tryNormalizeUuid } from './uuid';

/**
 * One identity field: where it lives and how its raw value is cleaned.
 */
export interface IdentityAttribute {
  /** Field of {@link DeviceIdentity} it fills */
  key: keyof DeviceIdentity;

  /** Name reported in errors */
  name: string;

  /** SIG-assigned characteristic UUID */
  uuid: string;

  /** The device pads this value with NUL bytes */
  stripTrailingNul: boolean;
}

export const IDENTITY_ATTRIBUTES: readonly IdentityAttribute[] = [
  { key: 'manufacturerName', name: 'manufacturer_name', uuid: '2a29', stripTrailingNul: true },
  { key: 'modelNumber', name: 'model_number', uuid: '2a24', stripTrailingNul: true },
  { key: 'serialNumber', name: 'serial_number', uuid: '2a25', stripTrailingNul: false },
  { key: 'hardwareRevision', name: 'hardware_revision', uuid: '2a27', stripTrailingNul: false },
  { key: 'firmwareRevision', name: 'firmware_revision', uuid: '2a26', stripTrailingNul: false },
  { key: 'softwareRevision', name: 'software_revision', uuid: '2a28', stripTrailingNul: false },
];

const ATTRIBUTES_BY_UUID = new Map<string, IdentityAttribute>(
  IDENTITY_ATTRIBUTES.map((attribute) => [normalizeUuid(attribute.uuid), attribute])
);

/**
 * Find the identity attribute stored in a characteristic.
 *
 * @returns The attribute, or undefined for unrelated or unparseable UUIDs
 */
export function lookupIdentityAttribute(uuid: string): IdentityAttribute | undefined {
  const normalized = tryNormalizeUuid(uuid);
  return normalized === undefined ? undefined : ATTRIBUTES_BY_UUID.get(normalized);
}

/**
 * Decode one identity value as strict UTF-8.
 *
 * @throws {InvalidAttributeError} If the bytes are not valid UTF-8
 */
export function decodeIdentityValue(
  attribute: IdentityAttribute,
  data: Uint8Array
): string {
  let value: string;
  try {
    value = new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (e) {
    throw new InvalidAttributeError(attribute.name, e);
  }

  return attribute.stripTrailingNul ? value.replace(/\0+$/, '') : value;
}

/**
 * Read and assemble the device identity.
 *
 * Every characteristic is checked against {@link IDENTITY_ATTRIBUTES}, not just
 * those of the Device Information Service, and each match is read once.
 *
 * @param characteristics - All characteristics resolved on the device
 * @param read - Characteristic read primitive
 * @throws {MissingAttributeError} If any of the six attributes is absent
 * @throws {InvalidAttributeError} If a value is not UTF-8
 * @throws {DeviceTransportError} If a read fails
 */
export async function resolveIdentity(
  characteristics: readonly GattCharacteristic[],
  read: (characteristic: GattCharacteristic) => Promise<Uint8Array>
): Promise<DeviceIdentity> {
  const values = new Map<keyof DeviceIdentity, string>();

  for (const characteristic of characteristics) {
    const attribute = lookupIdentityAttribute(characteristic.uuid);
    if (!attribute || values.has(attribute.key)) {
      continue;
    }

    let data: Uint8Array;
    try {
      data = await read(characteristic);
    } catch (e) {
      throw new DeviceTransportError(e);
    }

    values.set(attribute.key, decodeIdentityValue(attribute, data));
  }

  const field = (key: keyof DeviceIdentity): string => {
    const value = values.get(key);
    if (value === undefined) {
      const attribute = IDENTITY_ATTRIBUTES.find((a) => a.key === key);
      throw new MissingAttributeError(attribute?.name ?? key);
    }
    return value;
  };

  return Object.freeze({
    manufacturerName: field('manufacturerName'),
    modelNumber: field('modelNumber'),
    serialNumber: field('serialNumber'),
    hardwareRevision: field('hardwareRevision'),
    firmwareRevision: field('firmwareRevision'),
    softwareRevision: field('softwareRevision'),
  });
}
