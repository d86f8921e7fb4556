export enum CasinoErrorCode {
  INVALID_PARAMETERS = "INVALID_PARAMETERS",
  INSUFFICIENT_FUNDS = "INSUFFICIENT_FUNDS",
  INVALID_STATE = "INVALID_STATE",
  NOT_FOUND = "NOT_FOUND",
  BUSY = "BUSY",
  INTERNAL = "INTERNAL",
}

export interface CasinoErrorPayload {
  error: CasinoErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class CasinoError extends Error {
  constructor(public readonly code: CasinoErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "CasinoError";
  }

  /** Only BUSY is raised before any state is touched, so only BUSY may be retried blindly. */
  get retryable(): boolean {
    return this.code === CasinoErrorCode.BUSY;
  }

  toPayload(): CasinoErrorPayload {
    return casinoErrorPayload(this.code, this.message, this.details);
  }
}

export function casinoErrorPayload(code: CasinoErrorCode, message: string, details?: Record<string, unknown>): CasinoErrorPayload {
  return { error: code, message, details };
}

export function isCasinoError(err: unknown, code?: CasinoErrorCode): err is CasinoError {
  return err instanceof CasinoError && (code === undefined || err.code === code);
}

export function invalidParameters(message: string, details?: Record<string, unknown>): CasinoError {
  return new CasinoError(CasinoErrorCode.INVALID_PARAMETERS, message, details);
}

export const ROLLED_BACK_MESSAGE = "Operation failed and was rolled back";

/**
 * Wraps anything that is not already a CasinoError as INTERNAL. Callers that
 * ran inside a transaction pass ROLLED_BACK_MESSAGE.
 */
export function toCasinoError(err: unknown, message = "Operation failed"): CasinoError {
  if (err instanceof CasinoError) {
    return err;
  }
  const cause = err instanceof Error ? err.message : String(err);
  return new CasinoError(CasinoErrorCode.INTERNAL, message, { cause });
}
