/**
 * Purchase Client Errors
 */

export type PurchaseClientErrorCode =
  | "INVALID_QUANTITY"
  | "INVALID_USER_TOKEN"
  | "PRODUCTS_REQUEST_FAILED";

export class PurchaseClientError extends Error {
  readonly code: PurchaseClientErrorCode;

  constructor(code: PurchaseClientErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PurchaseClientError";
    this.code = code;
  }
}

export function isPurchaseClientError(error: unknown): error is PurchaseClientError {
  return error instanceof PurchaseClientError;
}

/**
 * Normalize a thrown or rejected value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === "string") return new Error(value);
  if (value && typeof value === "object" && "message" in value && typeof value.message === "string") {
    return new Error(value.message);
  }
  return new Error(String(value));
}
