/**
 * Enums for Aranet4 readings.
 */

/**
 * CO2 concentration status, as shown by the device's indicator.
 */
export enum Status {
  GREEN = 1,
  AMBER = 2,
  RED = 3,
}

export type StatusResult =
  | { ok: true; status: Status }
  | { ok: false; value: number };

/**
 * Map a status byte to {@link Status}.
 *
 * Only 1, 2 and 3 are valid; anything else is reported back, never defaulted.
 */
export function parseStatus(value: number): StatusResult {
  switch (value) {
    case Status.GREEN:
      return { ok: true, status: Status.GREEN };
    case Status.AMBER:
      return { ok: true, status: Status.AMBER };
    case Status.RED:
      return { ok: true, status: Status.RED };
    default:
      return { ok: false, value };
  }
}
