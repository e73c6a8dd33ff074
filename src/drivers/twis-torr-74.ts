// src/drivers/twis-torr-74.ts

import { WindowClient } from '../client.js';
import { DataType } from '../constants/constants.js';
import { defineWindow } from '../framers/window-descriptor.js';
import { createLogger } from '../logger.js';
import { createTransport } from '../transport/factory.js';
import type { TransportConfig, WindowClientOptions } from '../types/window-types.js';
import { ERROR_CODE_WINDOW, STATUS_WINDOW, describeErrorFlags, toEnumMember } from './common.js';
import {
  PressureUnit,
  TWIS_TORR_PRESSURE_UNITS,
  codeFromUnit,
  unitFromCode,
} from './pressure-units.js';
import { toFloat, toInteger, toLogic } from './response-values.js';
import type { ConnectHook, PumpDriver, PumpDriverOptions } from './types.js';

const logger = createLogger('twis-torr-74');

export const TWIS_TORR_WINDOWS = Object.freeze({
  // read only while the controller is in remote mode
  START_STOP: defineWindow(0, true, DataType.Logic, 'Start/Stop'),
  REMOTE: defineWindow(8, true, DataType.Logic, 'Mode, remote or serial configuration'),
  SOFT_START: defineWindow(100, true, DataType.Logic, 'Soft start (write only in stop condition)'),
  R1_SET_POINT_TYPE: defineWindow(101, true, DataType.Numeric, 'R1 set point type'),
  R1_SET_POINT: defineWindow(102, true, DataType.Numeric, 'R1 set point value (Hz, W or s)'),
  EXTERNAL_FAN_CONFIG: defineWindow(143, true, DataType.Numeric, 'External fan 0=ON 1=automatic 2=serial'),
  EXTERNAL_FAN_ACTIVATION: defineWindow(144, true, DataType.Logic, 'External fan activation'),
  PRESSURE_UNIT: defineWindow(163, true, DataType.Numeric, 'Unit pressure 0=mBar 1=Pa 2=Torr'),
  STATUS: STATUS_WINDOW,
  ERROR_CODE: ERROR_CODE_WINDOW,
  GAUGE_READ: defineWindow(224, false, DataType.Numeric, 'Pressure reading X.XE-XX'),
  GAUGE_STATUS: defineWindow(257, false, DataType.Numeric, 'Gauge status'),
  GAUGE_POWER: defineWindow(267, true, DataType.Numeric, 'Gauge power'),
});

export enum TwisTorrStatus {
  STOP = 0,
  WAITING = 1,
  STARTING = 2,
  AUTO_TUNING = 3,
  BRAKING = 4,
  NORMAL = 5,
  FAIL = 6,
}

export enum TwisTorrErrorFlag {
  NO_ERROR = 0x00,
  NO_CONNECTION = 0x01,
  PUMP_OVERTEMP = 0x02,
  CONTROLLER_OVERTEMP = 0x04,
  POWER_FAIL = 0x08,
  AUX_FAIL = 0x10,
  OVERVOLTAGE = 0x20,
  SHORT_CIRCUIT = 0x40,
  TOO_HIGH_LOAD = 0x80,
}

/**
 * Driver for the TwisTorr 74 FS turbomolecular pump rack controller.
 */
export class TwisTorr74Driver implements PumpDriver {
  readonly client: WindowClient;
  onConnect: ConnectHook | null;
  private readonly address: number;
  private readonly requestedUnit: PressureUnit;
  private _pressureUnit: PressureUnit = PressureUnit.unknown;

  constructor(client: WindowClient, options: PumpDriverOptions = {}) {
    this.client = client;
    this.address = options.address ?? client.address;
    this.requestedUnit = options.pressureUnit ?? PressureUnit.unknown;
    this.onConnect = options.onConnect ?? null;
  }

  static fromConfig(
    config: TransportConfig,
    options: PumpDriverOptions & WindowClientOptions = {}
  ): TwisTorr74Driver {
    const { pressureUnit, onConnect, ...clientOptions } = options;
    const client = new WindowClient(createTransport(config), clientOptions);
    return new TwisTorr74Driver(client, { address: clientOptions.address, pressureUnit, onConnect });
  }

  get pressureUnit(): PressureUnit {
    return this._pressureUnit;
  }

  async connect(): Promise<void> {
    await this.client.connect();
    const status = await this.getStatus();
    const errors = await this.getError();
    logger.info(
      `status: ${TwisTorrStatus[status]} errors: ${describeErrorFlags(errors, TwisTorrErrorFlag).join('|') || 'NO_ERROR'}`,
      { addr: this.address }
    );

    if (this.requestedUnit === PressureUnit.unknown) {
      await this.getPressureUnit();
    } else {
      await this.setPressureUnit(this.requestedUnit);
    }

    if (this.onConnect) {
      await this.onConnect();
    }
  }

  async getStatus(): Promise<TwisTorrStatus> {
    const value = toInteger(await this.client.read(TWIS_TORR_WINDOWS.STATUS, { address: this.address }));
    return toEnumMember<TwisTorrStatus>(value, TwisTorrStatus, 'TwisTorr status');
  }

  /** Error flags, see TwisTorrErrorFlag */
  async getError(): Promise<number> {
    return toInteger(await this.client.read(TWIS_TORR_WINDOWS.ERROR_CODE, { address: this.address }));
  }

  /** Gauge pressure in the current unit */
  async getPressure(): Promise<number> {
    return toFloat(await this.client.read(TWIS_TORR_WINDOWS.GAUGE_READ, { address: this.address }));
  }

  async getPressureUnit(): Promise<PressureUnit> {
    const code = toInteger(await this.client.read(TWIS_TORR_WINDOWS.PRESSURE_UNIT, { address: this.address }));
    this._pressureUnit = unitFromCode(TWIS_TORR_PRESSURE_UNITS, code);
    return this._pressureUnit;
  }

  async setPressureUnit(unit: PressureUnit): Promise<PressureUnit> {
    const code = codeFromUnit(TWIS_TORR_PRESSURE_UNITS, unit);
    await this.client.write(TWIS_TORR_WINDOWS.PRESSURE_UNIT, code, { address: this.address });
    this._pressureUnit = unit;
    return unit;
  }

  async start(): Promise<void> {
    await this.client.write(TWIS_TORR_WINDOWS.START_STOP, true, { address: this.address });
  }

  async stop(): Promise<void> {
    await this.client.write(TWIS_TORR_WINDOWS.START_STOP, false, { address: this.address });
  }

  async getSoftStart(): Promise<boolean> {
    return toLogic(await this.client.read(TWIS_TORR_WINDOWS.SOFT_START, { address: this.address }));
  }

  /** Accepted by the controller only while the pump is stopped */
  async setSoftStart(enabled: boolean): Promise<void> {
    await this.client.write(TWIS_TORR_WINDOWS.SOFT_START, enabled, { address: this.address });
  }
}
