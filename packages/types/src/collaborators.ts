/**
 * Collaborator Types
 *
 * Contracts the core depends on but does not implement:
 * - The bond ownership registry (who is the creditor right now)
 * - The fungible asset the vault custodies
 *
 * In-process implementations live in @bondline/vault and @bondline/ledger.
 */

import type { Address } from "./chain.js";

/**
 * Ownership lookup for transferable bond tokens.
 *
 * `ownerOf` must throw when the token does not exist.
 * Callers resolve ownership on every check; results are never cached.
 */
export interface OwnershipRegistry {
  ownerOf(tokenId: bigint): Address;
}

/**
 * A custodial balance ledger for one fungible asset.
 *
 * `spender`/`from` are explicit because there is no ambient caller:
 * whoever invokes the method states on whose behalf it acts.
 */
export interface AssetToken {
  readonly address: Address;
  readonly symbol: string;
  readonly decimals: number;

  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(owner: Address, spender: Address, amount: bigint): void;
  transfer(from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): void;
}
