/**
 * @bondline/ledger — Types for the balance ledger.
 *
 * Rules:
 * - Balances are never negative
 * - Total supply always equals the sum of balances
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@bondline/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "ZERO_ADDRESS"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * One non-zero balance.
 */
export interface Holding {
  readonly account: Address;
  readonly balance: bigint;
}

// ─── Checkpoint Types ────────────────────────────────────────────────────

/**
 * Opaque copy of ledger state, used to roll back a failed operation.
 */
export interface LedgerCheckpoint {
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly allowances: ReadonlyMap<string, bigint>;
  readonly totalSupply: bigint;
}

// ─── Token Types ─────────────────────────────────────────────────────────

/**
 * Static description of an in-process fungible asset.
 */
export interface AssetTokenConfig {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}
