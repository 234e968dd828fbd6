export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  RATE_LIMITED: "RATE_LIMITED",
  MODEL_UNAVAILABLE: "MODEL_UNAVAILABLE",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  MALFORMED_FRAME: "MALFORMED_FRAME",
  PAYLOAD_TOO_LARGE: "PAYLOAD_TOO_LARGE",
  ID_OUT_OF_RANGE: "ID_OUT_OF_RANGE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorPayload = {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
};
