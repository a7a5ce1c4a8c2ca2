export type TheoryErrorCode =
  | 'INVALID_NOTE'
  | 'INVALID_CHORD'
  | 'INVALID_INSTRUMENT'
  | 'INVALID_TUNING'
  | 'UNKNOWN_PRESET';

export class TheoryError extends Error {
  readonly code: TheoryErrorCode;

  constructor(code: TheoryErrorCode, message: string) {
    super(message);
    this.name = 'TheoryError';
    this.code = code;
  }
}
