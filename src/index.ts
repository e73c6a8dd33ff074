// src/index.ts

export { WindowClient } from './client.js';
export type { ReadOptions } from './client.js';
export {
  ADDRESS_RANGE,
  DataType,
  FRAME,
  RESULT_CODE_MESSAGES,
  ResultCode,
  WINDOW_RANGE,
  isResultCode,
} from './constants/constants.js';
export * from './errors.js';
export {
  decodeAddress,
  decodeResponse,
  describeFrame,
  encodeAddress,
  encodeRequest,
} from './framers/window-framer.js';
export { compareWindows, defineWindow } from './framers/window-descriptor.js';
export { encodeWindowValue } from './framers/window-values.js';
export { calcChecksum, formatChecksum, validateChecksum } from './utils/checksum.js';
export { default as Logger, createLogger, rootLogger } from './logger.js';
export { Diagnostics } from './utils/diagnostics.js';
export { TransportSession } from './transport/transport-session.js';
export { createTransport } from './transport/factory.js';
export { NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { NodeTcpTransport, DEFAULT_TCP_PORT } from './transport/node-transports/node-tcp-transport.js';
export { ControllerEmulator, EmulatorTransport } from './controller-emulator/controller-emulator.js';
export type {
  ControllerEmulatorOptions,
  EmulatorTransportOptions,
  ForcedResultCode,
} from './controller-emulator/controller-emulator.js';
export {
  IPC_MINI_PRESSURE_UNITS,
  PressureUnit,
  TWIS_TORR_PRESSURE_UNITS,
  codeFromUnit,
  unitFromCode,
} from './drivers/pressure-units.js';
export type { PressureUnitTable } from './drivers/pressure-units.js';
export { toFloat, toInteger, toLogic, toText } from './drivers/response-values.js';
export { ERROR_CODE_WINDOW, STATUS_WINDOW, describeErrorFlags } from './drivers/common.js';
export {
  IPC_MINI_WINDOWS,
  IpcMiniDriver,
  IpcMiniErrorFlag,
  IpcMiniStatus,
} from './drivers/ipc-mini.js';
export {
  TWIS_TORR_WINDOWS,
  TwisTorr74Driver,
  TwisTorrErrorFlag,
  TwisTorrStatus,
} from './drivers/twis-torr-74.js';
export type { ConnectHook, PumpDriver, PumpDriverOptions } from './drivers/types.js';
export type * from './types/window-types.js';
