// src/drivers/ipc-mini.ts

import { WindowClient } from '../client.js';
import { DataType } from '../constants/constants.js';
import { OutOfRangeError } from '../errors.js';
import { defineWindow } from '../framers/window-descriptor.js';
import { createLogger } from '../logger.js';
import { createTransport } from '../transport/factory.js';
import type { TransportConfig, WindowClientOptions } from '../types/window-types.js';
import { ERROR_CODE_WINDOW, STATUS_WINDOW, describeErrorFlags, toEnumMember } from './common.js';
import {
  IPC_MINI_PRESSURE_UNITS,
  PressureUnit,
  codeFromUnit,
  unitFromCode,
} from './pressure-units.js';
import { toFloat, toInteger, toText } from './response-values.js';
import type { ConnectHook, PumpDriver, PumpDriverOptions } from './types.js';

const logger = createLogger('ipc-mini');

const LABEL_MAX_LENGTH = 10;

export const IPC_MINI_WINDOWS = Object.freeze({
  MODE: defineWindow(8, true, DataType.Numeric, 'Mode'),
  HV_ONOFF_CH1: defineWindow(11, true, DataType.Logic, 'HV ON/OFF CH1'),
  STATUS: STATUS_WINDOW,
  ERROR_CODE: ERROR_CODE_WINDOW,
  CONTROLLER_MODEL: defineWindow(319, false, DataType.Alphanumeric, 'Controller model'),
  CONTROLLER_SERIAL_NO: defineWindow(323, false, DataType.Alphanumeric, 'Controller serial number'),
  UNIT_PRESSURE: defineWindow(600, true, DataType.Numeric, 'Unit pressure 0=Torr 1=mBar 2=Pa'),
  V_MEASURED_CH1: defineWindow(810, false, DataType.Numeric, 'V measured CH1 [0, 7000] V'),
  I_MEASURED_CH1: defineWindow(811, false, DataType.Numeric, 'I measured CH1 [1E-10, 9E-1] A'),
  PRESSURE_CH1: defineWindow(812, false, DataType.Numeric, 'Pressure CH1 [X.XE-XX]'),
  LABEL: defineWindow(890, true, DataType.Alphanumeric, 'Label, max 10 characters'),
});

/**
 * Ion pump controller status. 0 is STOP; the controller never reports a separate OK.
 */
export enum IpcMiniStatus {
  STOP = 0,
  NORMAL = 5,
  FAIL = 6,
}

export enum IpcMiniErrorFlag {
  NO_ERROR = 0x00,
  OVER_TEMPERATURE = 0x04,
  INTERLOCK_CABLE = 0x20,
  SHORT_CIRCUIT = 0x40,
  PROTECT = 0x80,
}

/**
 * Driver for the IPCMini ion pump controller.
 */
export class IpcMiniDriver implements PumpDriver {
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

  /**
   * Builds the driver on a new serial or LAN transport.
   */
  static fromConfig(
    config: TransportConfig,
    options: PumpDriverOptions & WindowClientOptions = {}
  ): IpcMiniDriver {
    const { pressureUnit, onConnect, ...clientOptions } = options;
    const client = new WindowClient(createTransport(config), clientOptions);
    return new IpcMiniDriver(client, { address: clientOptions.address, pressureUnit, onConnect });
  }

  /** Last unit read from or written to the controller */
  get pressureUnit(): PressureUnit {
    return this._pressureUnit;
  }

  async connect(): Promise<void> {
    await this.client.connect();
    const status = await this.getStatus();
    const errors = await this.getError();
    logger.info(
      `status: ${IpcMiniStatus[status]} errors: ${describeErrorFlags(errors, IpcMiniErrorFlag).join('|') || 'NO_ERROR'}`,
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

  async getStatus(): Promise<IpcMiniStatus> {
    const value = toInteger(await this.client.read(IPC_MINI_WINDOWS.STATUS, { address: this.address }));
    return toEnumMember<IpcMiniStatus>(value, IpcMiniStatus, 'IPCMini status');
  }

  /** Error flags, see IpcMiniErrorFlag */
  async getError(): Promise<number> {
    return toInteger(await this.client.read(IPC_MINI_WINDOWS.ERROR_CODE, { address: this.address }));
  }

  /** Pressure in the current unit */
  async getPressure(): Promise<number> {
    return toFloat(await this.client.read(IPC_MINI_WINDOWS.PRESSURE_CH1, { address: this.address }));
  }

  async getPressureUnit(): Promise<PressureUnit> {
    const code = toInteger(await this.client.read(IPC_MINI_WINDOWS.UNIT_PRESSURE, { address: this.address }));
    this._pressureUnit = unitFromCode(IPC_MINI_PRESSURE_UNITS, code);
    return this._pressureUnit;
  }

  async setPressureUnit(unit: PressureUnit): Promise<PressureUnit> {
    const code = codeFromUnit(IPC_MINI_PRESSURE_UNITS, unit);
    await this.client.write(IPC_MINI_WINDOWS.UNIT_PRESSURE, code, { address: this.address });
    this._pressureUnit = unit;
    return unit;
  }

  /** Switches high voltage on */
  async start(): Promise<void> {
    await this.client.write(IPC_MINI_WINDOWS.HV_ONOFF_CH1, true, { address: this.address });
  }

  async stop(): Promise<void> {
    await this.client.write(IPC_MINI_WINDOWS.HV_ONOFF_CH1, false, { address: this.address });
  }

  /** Measured voltage (V) */
  async readVoltage(): Promise<number> {
    return toInteger(await this.client.read(IPC_MINI_WINDOWS.V_MEASURED_CH1, { address: this.address }));
  }

  /** Measured current (A) */
  async readCurrent(): Promise<number> {
    return toFloat(await this.client.read(IPC_MINI_WINDOWS.I_MEASURED_CH1, { address: this.address }));
  }

  async getModel(): Promise<string> {
    return toText(await this.client.read(IPC_MINI_WINDOWS.CONTROLLER_MODEL, { address: this.address }));
  }

  async getSerialNumber(): Promise<string> {
    return toText(await this.client.read(IPC_MINI_WINDOWS.CONTROLLER_SERIAL_NO, { address: this.address }));
  }

  async getLabel(): Promise<string> {
    return toText(await this.client.read(IPC_MINI_WINDOWS.LABEL, { address: this.address }));
  }

  /**
   * @throws OutOfRangeError for a label longer than 10 characters
   */
  async setLabel(label: string): Promise<void> {
    if (label.length > LABEL_MAX_LENGTH) {
      throw new OutOfRangeError(`Label must be at most ${LABEL_MAX_LENGTH} characters, got ${label.length}`);
    }
    await this.client.write(IPC_MINI_WINDOWS.LABEL, label, { address: this.address });
  }
}
