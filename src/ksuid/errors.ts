export enum KsuidErrorCode {
  INVALID_LENGTH = 'invalid_length',
  INVALID_CHARACTER = 'invalid_character',
  VALUE_TOO_LARGE = 'value_too_large',
  BUFFER_TOO_SMALL = 'buffer_too_small',
  TIMESTAMP_OUT_OF_RANGE = 'timestamp_out_of_range'
}

export interface KsuidErrorDetails {
  input?: string;
  character?: string;
  position?: number;
  expected?: number;
  actual?: number;
}

export class KsuidError extends Error {
  readonly code: KsuidErrorCode;
  readonly details: KsuidErrorDetails;

  constructor(code: KsuidErrorCode, message: string, details: KsuidErrorDetails = {}) {
    super(message);
    this.name = 'KsuidError';
    this.code = code;
    this.details = details;
  }

  static invalidLength(what: string, expected: number, actual: number): KsuidError {
    return new KsuidError(
      KsuidErrorCode.INVALID_LENGTH,
      `${what} must have length ${expected}, got ${actual}`,
      { expected, actual }
    );
  }

  static invalidCharacter(alphabet: string, input: string, position: number): KsuidError {
    const character = input.charAt(position);
    return new KsuidError(
      KsuidErrorCode.INVALID_CHARACTER,
      `Invalid ${alphabet} character ${JSON.stringify(character)} at position ${position}`,
      { input, character, position }
    );
  }
}
