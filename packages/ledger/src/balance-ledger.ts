/**
 * @bondline/ledger — Balance ledger.
 *
 * Custodial balances, allowances and total supply for one unit of
 * account. Backs both the vault's accounting shares and the in-process
 * fungible asset.
 *
 * API surface:
 * - mint() / burn() — change supply
 * - transfer() — move balance between accounts
 * - approve() / spendAllowance() — delegated spending
 * - checkpoint() / restore() — roll back a failed multi-step operation
 *
 * Addresses are normalized to their checksummed form, so lookups are
 * case-insensitive.
 */

import { getAddress, isAddress, maxUint256, zeroAddress } from "viem";
import type { Address } from "@bondline/types";
import { assertAmount } from "./unit-math.js";
import type { Holding, LedgerCheckpoint } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Normalize an address to its checksummed form.
 * Throws LedgerError for malformed input.
 */
export function normalizeAddress(address: string): Address {
  if (!isAddress(address, { strict: false })) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${address}"`);
  }
  return getAddress(address);
}

export class BalanceLedger {
  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<string, bigint>();
  private _totalSupply = 0n;

  /** Unit name used in error messages (e.g. "shares", "USDC") */
  readonly unit: string;

  constructor(unit = "units") {
    this.unit = unit;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this._balances.get(normalizeAddress(account)) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  /**
   * All accounts with a non-zero balance, in first-credit order.
   */
  holdings(): readonly Holding[] {
    const result: Holding[] = [];
    for (const [account, balance] of this._balances) {
      if (balance > 0n) {
        result.push({ account, balance });
      }
    }
    return result;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(to: Address, amount: bigint): void {
    assertAmount(amount);
    const account = this.requireNonZero(to, "mint to");
    this._balances.set(account, (this._balances.get(account) ?? 0n) + amount);
    this._totalSupply += amount;
  }

  burn(from: Address, amount: bigint): void {
    assertAmount(amount);
    const account = this.requireNonZero(from, "burn from");
    this.debit(account, amount);
    this._totalSupply -= amount;
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const source = this.requireNonZero(from, "transfer from");
    const target = this.requireNonZero(to, "transfer to");
    this.debit(source, amount);
    this._balances.set(target, (this._balances.get(target) ?? 0n) + amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    this.requireNonZero(owner, "approve owner");
    this.requireNonZero(spender, "approve spender");
    this._allowances.set(allowanceKey(owner, spender), amount);
  }

  /**
   * Consume `amount` of the allowance `owner` granted to `spender`.
   * An allowance of maxUint256 is treated as unlimited and never decreases.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    assertAmount(amount);
    const key = allowanceKey(owner, spender);
    const current = this._allowances.get(key) ?? 0n;
    if (current === maxUint256) {
      return;
    }
    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spender} for ${owner} is ${current.toString()} ${this.unit}, needs ${amount.toString()}`,
      );
    }
    this._allowances.set(key, current - amount);
  }

  // ─── Checkpoints ─────────────────────────────────────────────────────

  checkpoint(): LedgerCheckpoint {
    return {
      balances: new Map(this._balances),
      allowances: new Map(this._allowances),
      totalSupply: this._totalSupply,
    };
  }

  restore(checkpoint: LedgerCheckpoint): void {
    this._balances = new Map(checkpoint.balances);
    this._allowances = new Map(checkpoint.allowances);
    this._totalSupply = checkpoint.totalSupply;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private debit(account: Address, amount: bigint): void {
    const balance = this._balances.get(account) ?? 0n;
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of ${account} is ${balance.toString()} ${this.unit}, needs ${amount.toString()}`,
      );
    }
    this._balances.set(account, balance - amount);
  }

  private requireNonZero(address: Address, role: string): Address {
    const normalized = normalizeAddress(address);
    if (normalized === zeroAddress) {
      throw new LedgerError("ZERO_ADDRESS", `Cannot ${role} the zero address`);
    }
    return normalized;
  }
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${normalizeAddress(owner)}:${normalizeAddress(spender)}`;
}
