import type { VoicingErrorCode } from './types.js';

export class VoicingError extends Error {
  readonly code: VoicingErrorCode;

  constructor(code: VoicingErrorCode, message: string) {
    super(message);
    this.name = 'VoicingError';
    this.code = code;
  }
}
