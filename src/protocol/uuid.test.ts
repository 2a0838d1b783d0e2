import { describe, it, expect } from 'vitest';
import { normalizeUuid, toNobleUuid, tryNormalizeUuid, uuidEquals } from './uuid';

describe('normalizeUuid', () => {
  it('expands 16-bit UUIDs onto the Bluetooth base', () => {
    expect(normalizeUuid('2A29')).toBe('00002a2900001000800000805f9b34fb');
    expect(normalizeUuid('0x2a29')).toBe('00002a2900001000800000805f9b34fb');
  });

  it('expands 32-bit UUIDs onto the Bluetooth base', () => {
    expect(normalizeUuid('0000fce0')).toBe('0000fce000001000800000805f9b34fb');
  });

  it('strips dashes and lowercases 128-bit UUIDs', () => {
    expect(normalizeUuid('F0CD3001-95DA-4F4B-9AC8-AA55D312AF0C')).toBe(
      'f0cd300195da4f4b9ac8aa55d312af0c'
    );
  });

  it('leaves noble-style UUIDs unchanged', () => {
    expect(normalizeUuid('f0cd300195da4f4b9ac8aa55d312af0c')).toBe(
      'f0cd300195da4f4b9ac8aa55d312af0c'
    );
  });

  it('rejects non-hex input', () => {
    expect(() => normalizeUuid('zz29')).toThrow('Invalid UUID: zz29');
  });

  it('rejects unknown widths', () => {
    expect(() => normalizeUuid('2a290')).toThrow('Invalid UUID length: 2a290');
  });
});

describe('uuidEquals', () => {
  it('matches short and full forms of the same attribute', () => {
    expect(uuidEquals('2a29', '00002a29-0000-1000-8000-00805f9b34fb')).toBe(true);
  });

  it('distinguishes different attributes', () => {
    expect(uuidEquals('2a29', '2a24')).toBe(false);
  });

  it('treats unparseable UUIDs as unequal instead of throwing', () => {
    expect(uuidEquals('not-a-uuid', '2a29')).toBe(false);
    expect(uuidEquals('2a29', 'not-a-uuid')).toBe(false);
  });
});

describe('tryNormalizeUuid', () => {
  it('normalizes valid UUIDs', () => {
    expect(tryNormalizeUuid('2A29')).toBe('00002a2900001000800000805f9b34fb');
  });

  it('returns undefined for unparseable UUIDs', () => {
    expect(tryNormalizeUuid('not-a-uuid')).toBeUndefined();
    expect(tryNormalizeUuid('12345')).toBeUndefined();
  });
});

describe('toNobleUuid', () => {
  it('collapses 16-bit UUIDs on the Bluetooth base to short form', () => {
    expect(toNobleUuid('0000fce0-0000-1000-8000-00805f9b34fb')).toBe('fce0');
    expect(toNobleUuid('0x2A29')).toBe('2a29');
  });

  it('keeps vendor UUIDs as undashed 128-bit', () => {
    expect(toNobleUuid('F0CD3001-95DA-4F4B-9AC8-AA55D312AF0C')).toBe(
      'f0cd300195da4f4b9ac8aa55d312af0c'
    );
  });

  it('keeps 32-bit UUIDs on the Bluetooth base in full', () => {
    expect(toNobleUuid('1234fce0')).toBe('1234fce000001000800000805f9b34fb');
  });
});
