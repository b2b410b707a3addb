export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  UNAUTHORIZED: "UNAUTHORIZED",
  FORBIDDEN: "FORBIDDEN",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  RATE_LIMITED: "RATE_LIMITED",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
  INTERNAL_SERVER_ERROR: "INTERNAL_SERVER_ERROR",
  AMOUNT_REQUIRED: "AMOUNT_REQUIRED",
  INVALID_AMOUNT: "INVALID_AMOUNT",
  AMOUNT_EXCEEDS_BALANCE: "AMOUNT_EXCEEDS_BALANCE",
  INVOICE_TENANT_MISMATCH: "INVOICE_TENANT_MISMATCH",
  INVOICE_NOT_PAYABLE: "INVOICE_NOT_PAYABLE",
  DUPLICATE_REFERENCE: "DUPLICATE_REFERENCE",
  RETRYABLE_FAILURE: "RETRYABLE_FAILURE",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
