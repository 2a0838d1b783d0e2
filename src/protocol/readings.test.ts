import { describe, it, expect } from 'vitest';
import { DecodeError } from '../exceptions';
import { Status } from '../models/enums';
import { parseCurrentReadings } from './readings';

const WORKED_PAYLOAD = Uint8Array.from([
  0xe8, 0x03, 0x80, 0x1b, 0x20, 0x03, 0x32, 0x64, 0x01, 0x3c, 0x00, 0x05, 0x00,
]);

function encodeReadings(fields: {
  co2: number;
  temperature: number;
  pressure: number;
  humidity: number;
  battery: number;
  status: number;
  interval: number;
  age: number;
}): Uint8Array {
  const data = new Uint8Array(13);
  const view = new DataView(data.buffer);
  view.setUint16(0, fields.co2, true);
  view.setUint16(2, fields.temperature, true);
  view.setUint16(4, fields.pressure, true);
  view.setUint8(6, fields.humidity);
  view.setUint8(7, fields.battery);
  view.setUint8(8, fields.status);
  view.setUint16(9, fields.interval, true);
  view.setUint16(11, fields.age, true);
  return data;
}

describe('parseCurrentReadings', () => {
  it('decodes the documented payload', () => {
    expect(parseCurrentReadings(WORKED_PAYLOAD)).toEqual({
      co2Ppm: 1000,
      temperatureC: 352,
      pressureHpa: 80,
      humidityPercent: 50,
      batteryPercent: 100,
      status: Status.GREEN,
      intervalSeconds: 60,
      sinceLastUpdateSeconds: 5,
    });
  });

  it('keeps fractional temperatures', () => {
    const data = encodeReadings({
      co2: 612, temperature: 443, pressure: 10132, humidity: 41,
      battery: 87, status: 1, interval: 300, age: 120,
    });

    const reading = parseCurrentReadings(data);

    expect(reading.temperatureC).toBe(22.15);
    expect(reading.pressureHpa).toBe(1013);
  });

  it('truncates pressure to whole hPa', () => {
    const data = encodeReadings({
      co2: 400, temperature: 400, pressure: 10139, humidity: 30,
      battery: 50, status: 1, interval: 60, age: 0,
    });

    expect(parseCurrentReadings(data).pressureHpa).toBe(1013);
  });

  it('reproduces the integer fields it was given', () => {
    const fields = {
      co2: 0xffff, temperature: 0xfff0, pressure: 0x1234, humidity: 0xff,
      battery: 0, status: 3, interval: 0xffff, age: 0x0102,
    };

    const reading = parseCurrentReadings(encodeReadings(fields));

    expect(reading.co2Ppm).toBe(fields.co2);
    expect(reading.temperatureC * 20).toBe(fields.temperature);
    expect(reading.pressureHpa).toBe(Math.floor(fields.pressure / 10));
    expect(reading.humidityPercent).toBe(fields.humidity);
    expect(reading.batteryPercent).toBe(fields.battery);
    expect(reading.status).toBe(Status.RED);
    expect(reading.intervalSeconds).toBe(fields.interval);
    expect(reading.sinceLastUpdateSeconds).toBe(fields.age);
  });

  it('maps status 2 to AMBER', () => {
    const data = WORKED_PAYLOAD.slice();
    data[8] = 2;

    expect(parseCurrentReadings(data).status).toBe(Status.AMBER);
  });

  it.each([0, 4, 255])('rejects status byte %i', (value) => {
    const data = WORKED_PAYLOAD.slice();
    data[8] = value;

    expect(() => parseCurrentReadings(data)).toThrow(DecodeError);
    expect(() => parseCurrentReadings(data)).toThrow(
      `Invalid status value: ${value} (expected 1, 2 or 3)`
    );
  });

  it.each([0, 1, 9, 12])('rejects a %i byte payload', (length) => {
    const data = WORKED_PAYLOAD.subarray(0, length);

    expect(() => parseCurrentReadings(data)).toThrow(
      `Current readings too short: ${length} bytes (need 13)`
    );
  });

  it('reports short payloads as io errors', () => {
    let error: unknown;
    try {
      parseCurrentReadings(new Uint8Array(7));
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ kind: 'io' });
  });

  it('ignores trailing bytes', () => {
    const data = new Uint8Array(16);
    data.set(WORKED_PAYLOAD);
    data.set([0xaa, 0xbb, 0xcc], 13);

    expect(parseCurrentReadings(data).sinceLastUpdateSeconds).toBe(5);
  });

  it('reads from a view into a larger buffer', () => {
    const backing = new Uint8Array(20);
    backing.set(WORKED_PAYLOAD, 4);

    const reading = parseCurrentReadings(backing.subarray(4, 17));

    expect(reading.co2Ppm).toBe(1000);
    expect(reading.sinceLastUpdateSeconds).toBe(5);
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(parseCurrentReadings(WORKED_PAYLOAD))).toBe(true);
  });
});
