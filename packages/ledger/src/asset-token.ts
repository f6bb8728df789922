/**
 * @bondline/ledger — In-process fungible asset.
 *
 * A standard custodial token (transfer / transferFrom / approve /
 * balanceOf) over a BalanceLedger. Stands in for the external asset
 * in the service and in tests; the vault only sees the AssetToken
 * interface.
 */

import type { Address, AssetToken } from "@bondline/types";
import { BalanceLedger } from "./balance-ledger.js";
import type { AssetTokenConfig, Holding } from "./types.js";
import { LedgerError } from "./types.js";

export class InMemoryAssetToken implements AssetToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  private readonly ledger: BalanceLedger;

  constructor(config: AssetTokenConfig) {
    if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 36) {
      throw new LedgerError("INVALID_AMOUNT", `Token decimals must be an integer in 0..36, got: ${String(config.decimals)}`);
    }
    this.address = config.address;
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    this.ledger = new BalanceLedger(config.symbol);
  }

  get totalSupply(): bigint {
    return this.ledger.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(owner, spender);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.ledger.approve(owner, spender, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.ledger.transfer(from, to, amount);
  }

  /**
   * Move `amount` from `from` to `to` on behalf of `spender`,
   * consuming the allowance `from` granted to `spender`.
   *
   * Balance is checked before the allowance is consumed, so a failed
   * transfer leaves the allowance untouched.
   */
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void {
    const balance = this.ledger.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Balance of ${from} is ${balance.toString()} ${this.symbol}, needs ${amount.toString()}`,
      );
    }
    this.ledger.spendAllowance(from, spender, amount);
    this.ledger.transfer(from, to, amount);
  }

  /**
   * Issue new units to an account (faucet / issuance).
   */
  mint(to: Address, amount: bigint): void {
    this.ledger.mint(to, amount);
  }

  holdings(): readonly Holding[] {
    return this.ledger.holdings();
  }
}
