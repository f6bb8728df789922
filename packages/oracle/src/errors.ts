/**
 * @bondline/oracle — Errors.
 */

export type OracleErrorCode =
  | "STALE_PRICE"
  | "INVALID_PRICE_VALUE"
  | "PRICE_FEEDS_TIME_MISMATCH"
  | "ROUND_NOT_FOUND"
  | "ZERO_ADDRESS"
  | "MALFORMED_PAYLOAD";

/**
 * Structured error from a price feed or its consumers.
 */
export class OracleError extends Error {
  public readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string) {
    super(message);
    this.name = "OracleError";
    this.code = code;
  }
}
