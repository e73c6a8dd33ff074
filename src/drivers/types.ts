// src/drivers/types.ts

import type { PressureUnit } from './pressure-units.js';

/** Callback run at the end of `connect()` for site-specific configuration */
export type ConnectHook = () => void | Promise<void>;

/**
 * What every pump driver offers, whatever its controller family.
 */
export interface PumpDriver {
  /** Probes the controller and brings it to a known state */
  connect(): Promise<void>;
  getPressure(): Promise<number>;
  getPressureUnit(): Promise<PressureUnit>;
  onConnect: ConnectHook | null;
}

export interface PumpDriverOptions {
  /** RS485 device address (default: the client's address) */
  address?: number;
  /** Unit set on connect; `unknown` reads the controller's setting instead */
  pressureUnit?: PressureUnit;
  onConnect?: ConnectHook;
}
