// src/drivers/pressure-units.ts

import { OutOfRangeError } from '../errors.js';

/**
 * Pressure units. The numeric code of each unit differs per controller family,
 * so the wire code is always looked up through the family's table.
 */
export enum PressureUnit {
  unknown = 'unknown',
  mBar = 'mBar',
  Pa = 'Pa',
  Torr = 'Torr',
}

/** Units indexed by their wire code */
export type PressureUnitTable = readonly PressureUnit[];

export const IPC_MINI_PRESSURE_UNITS: PressureUnitTable = Object.freeze([
  PressureUnit.Torr,
  PressureUnit.mBar,
  PressureUnit.Pa,
]);

export const TWIS_TORR_PRESSURE_UNITS: PressureUnitTable = Object.freeze([
  PressureUnit.mBar,
  PressureUnit.Pa,
  PressureUnit.Torr,
]);

/**
 * @throws OutOfRangeError for a code the table does not list
 */
export function unitFromCode(table: PressureUnitTable, code: number): PressureUnit {
  const unit = Number.isInteger(code) ? table[code] : undefined;
  if (unit === undefined) {
    throw new OutOfRangeError(`Pressure unit code ${code} not in [0, ${table.length - 1}]`);
  }
  return unit;
}

/**
 * @throws OutOfRangeError for a unit the table does not list
 */
export function codeFromUnit(table: PressureUnitTable, unit: PressureUnit): number {
  const code = table.indexOf(unit);
  if (code === -1) {
    throw new OutOfRangeError(`Pressure unit ${unit} not supported (${table.join(', ')})`);
  }
  return code;
}
