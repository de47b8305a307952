import type { ErrorCode } from '../enums';

/**
 * Adorn Error
 * @description The base error of every failure raised while decorating a class
 */
export class AdornError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);

    this.name = new.target.name;
    this.code = code;
  }
}
