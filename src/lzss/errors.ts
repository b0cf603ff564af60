/**
 * Decode failures. Every error is terminal for the decode call that raised it.
 */
export type LzssErrorCode = 'InvalidHeader' | 'UnexpectedEof' | 'InvalidBackReference' | 'OutputLimitExceeded' | 'InvalidSize';

export class LzssError extends Error {
  readonly code: LzssErrorCode;
  /** Input position at which the fault was detected */
  readonly offset: number;

  constructor(code: LzssErrorCode, message: string, offset: number) {
    super(message);
    this.name = 'LzssError';
    this.code = code;
    this.offset = offset;
  }
}

export function isLzssError(err: unknown, code?: LzssErrorCode): err is LzssError {
  return err instanceof LzssError && (code === undefined || err.code === code);
}
