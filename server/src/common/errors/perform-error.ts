/**
 * Atrium Roomserver - Perform Error
 *
 * Structured error raised at the point a perform operation fails. Anything
 * else that escapes a perform operation is wrapped with `toPerformError`.
 */

import { PerformErrorCode } from '../enums/perform-error-code.enum';

export interface PerformErrorBody {
  code: PerformErrorCode;
  msg: string;
}

export class PerformError extends Error {
  constructor(readonly code: PerformErrorCode, readonly msg: string) {
    super(msg);
    this.name = 'PerformError';
  }

  static badRequest(msg: string): PerformError {
    return new PerformError(PerformErrorCode.BAD_REQUEST, msg);
  }

  static notAllowed(msg: string): PerformError {
    return new PerformError(PerformErrorCode.NOT_ALLOWED, msg);
  }

  static internal(msg: string): PerformError {
    return new PerformError(PerformErrorCode.INTERNAL, msg);
  }

  toJSON(): PerformErrorBody {
    return { code: this.code, msg: this.msg };
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toPerformError(err: unknown): PerformError {
  if (err instanceof PerformError) {
    return err;
  }
  return PerformError.internal(describeError(err));
}
