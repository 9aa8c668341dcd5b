export enum Id57ErrorCode {
  NEGATIVE_VALUE = 'negative_value',
  EMPTY_INPUT = 'empty_input',
  INVALID_CHARACTER = 'invalid_character',
  OVERFLOW = 'overflow',
  NOT_CONVERTIBLE = 'not_convertible',
  CLOCK_ERROR = 'clock_error',
  WIDTH_EXCEEDED = 'width_exceeded',
  INVALID_LENGTH = 'invalid_length'
}

export interface InvalidCharacterInfo {
  character: string;
  position: number;
}

export class Id57Error extends Error {
  readonly code: Id57ErrorCode;
  // Only set for INVALID_CHARACTER
  readonly character?: string;
  readonly position?: number;

  constructor(code: Id57ErrorCode, message: string, info?: InvalidCharacterInfo) {
    super(message);
    this.name = 'Id57Error';
    this.code = code;
    this.character = info?.character;
    this.position = info?.position;
  }
}
