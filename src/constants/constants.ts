// src/constants/constants.ts

/**
 * Frame delimiters and layout of the Window Protocol
 */
export const FRAME = {
  STX: 0x02,
  ETX: 0x03,
  ADDRESS_BIAS: 0x80,
  WRITE_FLAG: 0x31, // '1'
  READ_FLAG: 0x30, // '0'
  WINDOW_DIGITS: 3,
  CHECKSUM_LENGTH: 2,
  CONTROL_MESSAGE_LENGTH: 3, // STX ADDR CODE
  MIN_DATA_MESSAGE_LENGTH: 6, // STX ADDR WIN(3) RW
  NUMERIC_WIDTH: 6,
} as const;

export const ADDRESS_RANGE = { MIN: 0, MAX: 31 } as const;
export const WINDOW_RANGE = { MIN: 0, MAX: 999 } as const;

/**
 * Result codes carried by 3-byte control replies
 */
export enum ResultCode {
  ACK = 0x06,
  NACK = 0x15,
  UNKNOWN_WINDOW = 0x32,
  DATA_TYPE_ERROR = 0x33,
  OUT_OF_RANGE = 0x34,
  WIN_DISABLED = 0x35,
}

/**
 * Window data types
 */
export enum DataType {
  Logic = 'logic',
  Numeric = 'numeric',
  Alphanumeric = 'alphanumeric',
}

export const RESULT_CODE_MESSAGES: Record<ResultCode, string> = {
  [ResultCode.ACK]: 'Acknowledged',
  [ResultCode.NACK]: 'Command execution failed',
  [ResultCode.UNKNOWN_WINDOW]: 'The window specified in the command is not a valid window',
  [ResultCode.DATA_TYPE_ERROR]: 'The data type does not match the window requirement',
  [ResultCode.OUT_OF_RANGE]: 'The value written is not within the range of the window',
  [ResultCode.WIN_DISABLED]: 'The window is read only or temporarily disabled',
};

const RESULT_CODES: ReadonlySet<number> = new Set<number>([
  ResultCode.ACK,
  ResultCode.NACK,
  ResultCode.UNKNOWN_WINDOW,
  ResultCode.DATA_TYPE_ERROR,
  ResultCode.OUT_OF_RANGE,
  ResultCode.WIN_DISABLED,
]);

export function isResultCode(value: number): value is ResultCode {
  return RESULT_CODES.has(value);
}
