/**
 * @bondline/vault — Errors.
 *
 * Grouped by kind:
 * - authorization: ONLY_DEBTOR, ONLY_DEBTOR_OR_CREDITOR, ONLY_ADMIN, NOT_BOND_OWNER
 * - state preconditions: PRINCIPAL_ALREADY_PAID, PRINCIPAL_NOT_PAID
 * - parameters: ZERO_ADDRESS, ZERO_AMOUNT, INVALID_PRINCIPAL_AMOUNT,
 *   EXCESSIVE_VAULT_FEES, INVALID_BOND_MATURITY
 * - slippage and limits: INSUFFICIENT_ASSETS, EXCEEDS_MAX_WITHDRAW
 * - disabled entry points: NOT_SUPPORTED
 * - registry: BOND_NOT_FOUND, BOND_ALREADY_EXISTS
 */

export type VaultErrorCode =
  | "ONLY_DEBTOR"
  | "ONLY_DEBTOR_OR_CREDITOR"
  | "ONLY_ADMIN"
  | "NOT_BOND_OWNER"
  | "PRINCIPAL_ALREADY_PAID"
  | "PRINCIPAL_NOT_PAID"
  | "ZERO_ADDRESS"
  | "ZERO_AMOUNT"
  | "INVALID_PRINCIPAL_AMOUNT"
  | "EXCESSIVE_VAULT_FEES"
  | "INVALID_BOND_MATURITY"
  | "INSUFFICIENT_ASSETS"
  | "EXCEEDS_MAX_WITHDRAW"
  | "NOT_SUPPORTED"
  | "BOND_NOT_FOUND"
  | "BOND_ALREADY_EXISTS";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
