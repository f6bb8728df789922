/**
 * @bondline/vault — Types.
 *
 * Rules:
 * - principalRepaid never exceeds debtAmount
 * - principalPaid goes false → true once and never back
 * - feesBips stays within 0..MAX_FEES_BIPS
 * - One share per asset unit, always
 */

import type { Logger } from "pino";
import type {
  Address,
  AssetToken,
  Clock,
  OwnershipRegistry,
  RoundDataFeed,
} from "@bondline/types";
import type { EventStore } from "@bondline/event-store";

/** Upper bound on the vault fee rate (10%). */
export const MAX_FEES_BIPS = 1_000;

// =============================================================================
// Configuration
// =============================================================================

export interface RepaymentVaultConfig {
  /** Address the vault custodies assets at */
  readonly address: Address;

  readonly admin: Address;

  /** Resolves the current creditor from the bond token */
  readonly ownershipRegistry: OwnershipRegistry;
  readonly bondId: bigint;

  readonly debtor: Address;
  readonly asset: AssetToken;

  /** Principal, in value units */
  readonly debtAmount: bigint;

  /** Unix seconds. Informational only. */
  readonly bondMaturity: bigint;

  /** Default: false */
  readonly initialPrincipalPaid?: boolean;

  /** Value units already repaid. Default: 0 */
  readonly initialPrincipalRepaid?: bigint;

  readonly feesBips: number;
  readonly feesRecipient: Address;

  /** ValuationOracle or PriceAggregator */
  readonly priceFeed: RoundDataFeed;

  readonly clock?: Clock;
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
}

// =============================================================================
// Results & Snapshots
// =============================================================================

export interface DepositResult {
  /** Total shares minted across all recipients */
  readonly shares: bigint;

  /** Assets pulled from the caller */
  readonly assetsUsed: bigint;
}

/**
 * Assets a deposit of some value needs at the current price.
 */
export interface DepositQuote {
  readonly price: bigint;
  readonly requiredAssets: bigint;
}

export interface VaultState {
  readonly address: Address;
  readonly asset: Address;
  readonly priceFeed: Address;
  readonly admin: Address;
  readonly bondId: bigint;
  readonly debtor: Address;
  readonly creditor: Address;
  readonly debtAmount: bigint;
  readonly bondMaturity: bigint;
  readonly principalPaid: boolean;
  readonly principalRepaid: bigint;
  readonly feesBips: number;
  readonly feesRecipient: Address;
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;
}

// =============================================================================
// Tokenized Vault Interface
// =============================================================================

/**
 * Share accounting common to custodial vaults.
 */
export interface ShareToken {
  readonly address: Address;
  totalSupply(): bigint;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(owner: Address, spender: Address, shares: bigint): void;
  transfer(from: Address, to: Address, shares: bigint): void;
  transferFrom(spender: Address, from: Address, to: Address, shares: bigint): void;
}

/**
 * Redemption side of a tokenized vault.
 */
export interface RedeemableVault extends ShareToken {
  readonly asset: AssetToken;
  totalAssets(): bigint;
  convertToShares(assets: bigint): bigint;
  convertToAssets(shares: bigint): bigint;
  maxWithdraw(owner: Address): bigint;
  maxRedeem(owner: Address): bigint;
  previewWithdraw(assets: bigint): bigint;
  previewRedeem(shares: bigint): bigint;

  /** @returns shares burned */
  withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): bigint;

  /** @returns assets sent */
  redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): bigint;
}

/**
 * A tokenized vault whose generic inflows are sealed off: assets can only
 * enter through the vault's own priced entry point, so the standard
 * deposit/mint-to-receiver paths have no reachable result.
 */
export interface SealedTokenizedVault extends RedeemableVault {
  /** Always 0 */
  maxDeposit(receiver: Address): 0n;

  /** Always 0 */
  maxMint(receiver: Address): 0n;

  depositFor(assets: bigint, receiver: Address): never;
  mintFor(shares: bigint, receiver: Address): never;
}
