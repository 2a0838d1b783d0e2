/**
 * UUID normalization.
 *
 * Platforms disagree on UUID spelling: noble reports lowercase 128-bit UUIDs
 * without dashes and short 16-bit forms for SIG-assigned attributes, while
 * constants are usually written dashed. All comparisons go through
 * {@link normalizeUuid}.
 */

const BLUETOOTH_BASE_SUFFIX = '00001000800000805f9b34fb';

/**
 * Normalize a UUID to lowercase, undashed 128-bit form.
 *
 * @param uuid - 16-bit ("2a29", "0x2A29"), 32-bit or 128-bit UUID, any case, dashes optional
 * @throws {Error} If the input is not a hexadecimal UUID of a known width
 *
 * @example
 * ```typescript
 * normalizeUuid('2A29'); // '00002a2900001000800000805f9b34fb'
 * normalizeUuid('F0CD3001-95DA-4F4B-9AC8-AA55D312AF0C'); // 'f0cd300195da4f4b9ac8aa55d312af0c'
 * ```
 */
export function normalizeUuid(uuid: string): string {
  const hex = uuid.toLowerCase().replace(/^0x/, '').replace(/-/g, '');

  if (!/^[0-9a-f]+$/.test(hex)) {
    throw new Error(`Invalid UUID: ${uuid}`);
  }

  switch (hex.length) {
    case 4:
      return `0000${hex}${BLUETOOTH_BASE_SUFFIX}`;
    case 8:
      return `${hex}${BLUETOOTH_BASE_SUFFIX}`;
    case 32:
      return hex;
    default:
      throw new Error(`Invalid UUID length: ${uuid}`);
  }
}

/**
 * {@link normalizeUuid} for platform-reported values.
 *
 * @returns The normalized UUID, or undefined if it cannot be parsed
 */
export function tryNormalizeUuid(uuid: string): string | undefined {
  try {
    return normalizeUuid(uuid);
  } catch {
    return undefined;
  }
}

/**
 * Compare two UUIDs regardless of width, case or dashes.
 *
 * A UUID that cannot be parsed equals nothing.
 */
export function uuidEquals(a: string, b: string): boolean {
  const left = tryNormalizeUuid(a);
  return left !== undefined && left === tryNormalizeUuid(b);
}

/**
 * Spell a UUID the way noble reports advertised services.
 *
 * noble reports 16-bit SIG UUIDs in 4-hex short form and matches scan
 * filters against that spelling, so UUIDs on the Bluetooth base collapse
 * back to it.
 *
 * @example
 * ```typescript
 * toNobleUuid('0000fce0-0000-1000-8000-00805f9b34fb'); // 'fce0'
 * toNobleUuid('F0CD3001-95DA-4F4B-9AC8-AA55D312AF0C'); // 'f0cd300195da4f4b9ac8aa55d312af0c'
 * ```
 */
export function toNobleUuid(uuid: string): string {
  const normalized = normalizeUuid(uuid);
  if (normalized.startsWith('0000') && normalized.endsWith(BLUETOOTH_BASE_SUFFIX)) {
    return normalized.slice(4, 8);
  }
  return normalized;
}
