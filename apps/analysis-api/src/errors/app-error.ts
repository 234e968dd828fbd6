import { ErrorCodes, type ErrorCode, type ErrorPayload } from "@ecu-sim/shared";

export const DEFAULT_STATUS: Record<ErrorCode, number> = {
  [ErrorCodes.VALIDATION_ERROR]: 400,
  [ErrorCodes.NOT_FOUND]: 404,
  [ErrorCodes.RATE_LIMITED]: 429,
  [ErrorCodes.MODEL_UNAVAILABLE]: 503,
  [ErrorCodes.INTERNAL_ERROR]: 500,
  [ErrorCodes.MALFORMED_FRAME]: 400,
  [ErrorCodes.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCodes.ID_OUT_OF_RANGE]: 400,
};

export type AppErrorOptions = {
  /** Overrides the code's default HTTP status. */
  status?: number;
  details?: Record<string, unknown>;
};

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = options.status ?? DEFAULT_STATUS[code];
    this.details = options.details;
  }

  toPayload(requestId: string): ErrorPayload {
    return {
      code: this.code,
      message: this.message,
      details: { ...this.details, request_id: requestId },
    };
  }
}
