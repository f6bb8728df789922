/**
 * @bondline/vault — Repayment vault.
 *
 * Custodies one fungible asset on behalf of a single bond and enforces
 * its payment protocol:
 *
 * - Principal funding: the creditor pays exactly `debtAmount` (in value
 *   units) once; shares go to the debtor.
 * - Principal repayment: the debtor repays up to the outstanding
 *   principal; shares go to the creditor.
 * - Interest: the debtor pays any value; a `feesBips` cut goes to the
 *   fees recipient, the rest to the creditor.
 *
 * The creditor is whoever holds the bond token at call time. Value is
 * converted to assets at the price feed's latest fresh round, and every
 * asset unit mints one share. Shares redeem for assets 1:1 through
 * withdraw/redeem, with no further access control.
 *
 * Every operation is all-or-nothing: a failure at any step leaves
 * state, share balances and the event log as they were.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { isAddressEqual, zeroAddress } from "viem";
import type {
  Address,
  AssetToken,
  Clock,
  DomainEvent,
  OwnershipRegistry,
  RoundDataFeed,
} from "@bondline/types";
import { systemClock } from "@bondline/types";
import type { BondEventPayloads, BondEventType, EventStore } from "@bondline/event-store";
import { createBondEvent, streamIdFor } from "@bondline/event-store";
import type { LedgerCheckpoint } from "@bondline/ledger";
import { BalanceLedger, applyBips, assertAmount, normalizeAddress } from "@bondline/ledger";
import { VaultError } from "./errors.js";
import type {
  DepositQuote,
  DepositResult,
  RepaymentVaultConfig,
  SealedTokenizedVault,
  VaultState,
} from "./types.js";
import { MAX_FEES_BIPS } from "./types.js";
import { assetsForValue, latestPrice, valueOfAssets } from "./valuation.js";

interface MutableState {
  principalPaid: boolean;
  principalRepaid: bigint;
  feesBips: number;
  feesRecipient: Address;
  admin: Address;
}

interface Checkpoint {
  readonly state: MutableState;
  readonly shares: LedgerCheckpoint;
}

interface ShareCredit {
  readonly to: Address;
  readonly shares: bigint;
}

export class RepaymentVault implements SealedTokenizedVault {
  readonly address: Address;
  readonly asset: AssetToken;
  readonly priceFeed: RoundDataFeed;
  readonly bondId: bigint;
  readonly debtor: Address;
  readonly debtAmount: bigint;
  readonly bondMaturity: bigint;

  private readonly registry: OwnershipRegistry;
  private readonly shares = new BalanceLedger("shares");
  private readonly clock: Clock;
  private readonly eventStore: EventStore | undefined;
  private readonly logger: Logger;
  private current: MutableState;

  constructor(config: RepaymentVaultConfig) {
    const initialPrincipalPaid = config.initialPrincipalPaid ?? false;
    const initialPrincipalRepaid = config.initialPrincipalRepaid ?? 0n;

    this.debtor = requireNonZero(config.debtor, "debtor");
    const admin = requireNonZero(config.admin, "admin");
    const feesRecipient = requireNonZero(config.feesRecipient, "feesRecipient");
    requireNonZero(config.priceFeed.address, "priceFeed");
    this.address = requireNonZero(config.address, "vault");

    if (config.debtAmount <= 0n) {
      throw new VaultError("ZERO_AMOUNT", "debtAmount must be positive");
    }
    requireFeesBips(config.feesBips);
    if (config.bondMaturity <= 0n) {
      throw new VaultError("INVALID_BOND_MATURITY", `bondMaturity must be positive, got ${config.bondMaturity.toString()}`);
    }
    if (initialPrincipalRepaid < 0n || initialPrincipalRepaid > config.debtAmount) {
      throw new VaultError(
        "INVALID_PRINCIPAL_AMOUNT",
        `initialPrincipalRepaid ${initialPrincipalRepaid.toString()} is outside 0..${config.debtAmount.toString()}`,
      );
    }
    if (initialPrincipalRepaid > 0n && !initialPrincipalPaid) {
      throw new VaultError("PRINCIPAL_NOT_PAID", "Principal cannot be repaid before it is paid");
    }

    this.registry = config.ownershipRegistry;
    this.bondId = config.bondId;
    try {
      this.registry.ownerOf(config.bondId);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new VaultError("BOND_NOT_FOUND", `Bond ${config.bondId.toString()} lookup failed: ${reason}`);
    }

    this.asset = config.asset;
    this.priceFeed = config.priceFeed;
    this.debtAmount = config.debtAmount;
    this.bondMaturity = config.bondMaturity;
    this.clock = config.clock ?? systemClock;
    this.eventStore = config.eventStore;
    this.logger = config.logger ?? pino({ level: "silent" });
    this.current = {
      principalPaid: initialPrincipalPaid,
      principalRepaid: initialPrincipalRepaid,
      feesBips: config.feesBips,
      feesRecipient,
      admin,
    };
  }

  // ─── Bond state ──────────────────────────────────────────────────────

  /** Current bond holder. Resolved on every call. */
  creditor(): Address {
    return normalizeAddress(this.registry.ownerOf(this.bondId));
  }

  principalPaid(): boolean {
    return this.current.principalPaid;
  }

  principalRepaid(): bigint {
    return this.current.principalRepaid;
  }

  feesBips(): number {
    return this.current.feesBips;
  }

  feesRecipient(): Address {
    return this.current.feesRecipient;
  }

  admin(): Address {
    return this.current.admin;
  }

  state(): VaultState {
    return {
      address: this.address,
      asset: this.asset.address,
      priceFeed: this.priceFeed.address,
      admin: this.current.admin,
      bondId: this.bondId,
      debtor: this.debtor,
      creditor: this.creditor(),
      debtAmount: this.debtAmount,
      bondMaturity: this.bondMaturity,
      principalPaid: this.current.principalPaid,
      principalRepaid: this.current.principalRepaid,
      feesBips: this.current.feesBips,
      feesRecipient: this.current.feesRecipient,
      totalAssets: this.totalAssets(),
      totalSupply: this.totalSupply(),
    };
  }

  // ─── Valuation ───────────────────────────────────────────────────────

  /**
   * Assets needed to deposit `targetValue` at the current price.
   * Callers pass `requiredAssets` (or more) back as `maxAssets`.
   */
  quoteDeposit(targetValue: bigint): DepositQuote {
    assertAmount(targetValue, "targetValue");
    const price = latestPrice(this.priceFeed, this.clock);
    return { price, requiredAssets: assetsForValue(targetValue, price, this.asset.decimals) };
  }

  /** Custodied assets in value units at the current price. */
  totalValue(): bigint {
    const price = latestPrice(this.priceFeed, this.clock);
    return valueOfAssets(this.totalAssets(), price, this.asset.decimals);
  }

  // ─── Priced deposit ──────────────────────────────────────────────────

  /**
   * Pay principal or interest worth `targetValue`, spending at most
   * `maxAssets` of the caller's asset allowance to this vault.
   *
   * When the caller is both creditor and debtor, a principal deposit
   * funds the principal.
   */
  deposit(caller: Address, maxAssets: bigint, targetValue: bigint, principal: boolean): DepositResult {
    const from = normalizeAddress(caller);
    assertAmount(maxAssets, "maxAssets");
    if (targetValue <= 0n) {
      throw new VaultError("ZERO_AMOUNT", "targetValue must be positive");
    }

    const creditor = this.creditor();
    const price = latestPrice(this.priceFeed, this.clock);
    const requiredAssets = assetsForValue(targetValue, price, this.asset.decimals);
    if (requiredAssets > maxAssets) {
      throw new VaultError(
        "INSUFFICIENT_ASSETS",
        `Deposit needs ${requiredAssets.toString()} assets, caller allows ${maxAssets.toString()}`,
      );
    }

    const isCreditor = isAddressEqual(from, creditor);
    const isDebtor = isAddressEqual(from, this.debtor);
    const next: MutableState = { ...this.current };
    const credits: ShareCredit[] = [];
    const events: DomainEvent[] = [];
    const context = { from, correlationId: randomUUID() };
    const assets = requiredAssets.toString();
    const value = targetValue.toString();

    if (principal) {
      if (isCreditor) {
        if (targetValue !== this.debtAmount) {
          throw new VaultError(
            "INVALID_PRINCIPAL_AMOUNT",
            `Principal must be exactly ${this.debtAmount.toString()}, got ${value}`,
          );
        }
        if (next.principalPaid) {
          throw new VaultError("PRINCIPAL_ALREADY_PAID", "Principal has already been paid");
        }
        next.principalPaid = true;
        events.push(this.event("vault.principal.paid", context, { assets, value, creditor, debtor: this.debtor }));
        credits.push({ to: this.debtor, shares: requiredAssets });
      } else if (isDebtor) {
        if (!next.principalPaid) {
          throw new VaultError("PRINCIPAL_NOT_PAID", "Principal has not been paid yet");
        }
        const outstanding = this.debtAmount - next.principalRepaid;
        if (targetValue > outstanding) {
          throw new VaultError(
            "INVALID_PRINCIPAL_AMOUNT",
            `Repayment of ${value} exceeds outstanding principal ${outstanding.toString()}`,
          );
        }
        next.principalRepaid += targetValue;
        events.push(this.event("vault.principal.repaid", context, { assets, value, debtor: this.debtor, creditor }));
        credits.push({ to: creditor, shares: requiredAssets });
      } else {
        throw new VaultError("ONLY_DEBTOR_OR_CREDITOR", `${from} is neither the debtor nor the creditor`);
      }
    } else {
      if (!isDebtor) {
        throw new VaultError("ONLY_DEBTOR", `${from} is not the debtor`);
      }
      const fees = applyBips(requiredAssets, next.feesBips);
      const net = requiredAssets - fees;
      events.push(
        this.event("vault.interest.paid", context, {
          assets,
          value,
          debtor: this.debtor,
          creditor,
          fees: fees.toString(),
          feesRecipient: next.feesRecipient,
        }),
      );
      credits.push({ to: next.feesRecipient, shares: fees }, { to: creditor, shares: net });
    }

    // A zero fee (or a dust deposit) credits nobody.
    const minted = credits.filter((c) => c.shares > 0n);
    for (const credit of minted) {
      events.push(
        this.event("vault.deposit", context, {
          caller: from,
          owner: credit.to,
          assets: credit.shares.toString(),
          shares: credit.shares.toString(),
        }),
      );
    }

    let pulled = false;
    this.atomically(
      () => {
        this.current = next;
        this.asset.transferFrom(this.address, from, this.address, requiredAssets);
        pulled = true;
        for (const credit of minted) {
          this.shares.mint(credit.to, credit.shares);
        }
        this.publish(events);
      },
      () => {
        if (pulled) {
          this.asset.transfer(this.address, from, requiredAssets);
        }
      },
    );

    this.logger.info(
      { caller: from, principal, targetValue: value, requiredAssets: assets, price: price.toString() },
      principal ? "Principal deposit" : "Interest deposit",
    );
    return { shares: requiredAssets, assetsUsed: requiredAssets };
  }

  // ─── Sealed entry points ─────────────────────────────────────────────

  maxDeposit(_receiver: Address): 0n {
    return 0n;
  }

  maxMint(_receiver: Address): 0n {
    return 0n;
  }

  depositFor(_assets: bigint, _receiver: Address): never {
    throw new VaultError("NOT_SUPPORTED", "Deposits must go through the priced deposit entry point");
  }

  mintFor(_shares: bigint, _receiver: Address): never {
    throw new VaultError("NOT_SUPPORTED", "Deposits must go through the priced deposit entry point");
  }

  // ─── Redemption ──────────────────────────────────────────────────────

  totalAssets(): bigint {
    return this.asset.balanceOf(this.address);
  }

  convertToShares(assets: bigint): bigint {
    return assets;
  }

  convertToAssets(shares: bigint): bigint {
    return shares;
  }

  maxWithdraw(owner: Address): bigint {
    return this.convertToAssets(this.shares.balanceOf(owner));
  }

  maxRedeem(owner: Address): bigint {
    return this.shares.balanceOf(owner);
  }

  previewWithdraw(assets: bigint): bigint {
    return this.convertToShares(assets);
  }

  previewRedeem(shares: bigint): bigint {
    return this.convertToAssets(shares);
  }

  withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): bigint {
    assertAmount(assets, "assets");
    const max = this.maxWithdraw(owner);
    if (assets > max) {
      throw new VaultError(
        "EXCEEDS_MAX_WITHDRAW",
        `Withdraw of ${assets.toString()} exceeds max ${max.toString()} for ${owner}`,
      );
    }
    const shares = this.previewWithdraw(assets);
    this.exit(caller, receiver, owner, assets, shares);
    return shares;
  }

  redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): bigint {
    assertAmount(shares, "shares");
    const max = this.maxRedeem(owner);
    if (shares > max) {
      throw new VaultError(
        "EXCEEDS_MAX_WITHDRAW",
        `Redeem of ${shares.toString()} exceeds max ${max.toString()} for ${owner}`,
      );
    }
    const assets = this.previewRedeem(shares);
    this.exit(caller, receiver, owner, assets, shares);
    return assets;
  }

  // ─── Shares ──────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this.shares.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.shares.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.shares.allowance(owner, spender);
  }

  approve(owner: Address, spender: Address, shares: bigint): void {
    this.shares.approve(owner, spender, shares);
  }

  transfer(from: Address, to: Address, shares: bigint): void {
    this.shares.transfer(from, to, shares);
  }

  transferFrom(spender: Address, from: Address, to: Address, shares: bigint): void {
    this.atomically(() => {
      this.shares.spendAllowance(from, spender, shares);
      this.shares.transfer(from, to, shares);
    });
  }

  // ─── Admin ───────────────────────────────────────────────────────────

  setFeesBips(caller: Address, bips: number): void {
    this.requireAdmin(caller);
    requireFeesBips(bips);
    this.current = { ...this.current, feesBips: bips };
    this.publish([this.event("vault.fees.set", { from: caller, correlationId: randomUUID() }, { bips })]);
    this.logger.info({ bips }, "Vault fees set");
  }

  setFeesRecipient(caller: Address, recipient: Address): void {
    this.requireAdmin(caller);
    const normalized = requireNonZero(recipient, "feesRecipient");
    this.current = { ...this.current, feesRecipient: normalized };
    this.publish([
      this.event("vault.fees_recipient.set", { from: caller, correlationId: randomUUID() }, { recipient: normalized }),
    ]);
    this.logger.info({ recipient: normalized }, "Vault fees recipient set");
  }

  transferAdmin(caller: Address, newAdmin: Address): void {
    this.requireAdmin(caller);
    const previousAdmin = this.current.admin;
    const normalized = requireNonZero(newAdmin, "admin");
    this.current = { ...this.current, admin: normalized };
    this.publish([
      this.event(
        "vault.admin.transferred",
        { from: caller, correlationId: randomUUID() },
        { previousAdmin, newAdmin: normalized },
      ),
    ]);
    this.logger.info({ previousAdmin, newAdmin: normalized }, "Vault admin transferred");
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private exit(caller: Address, receiver: Address, owner: Address, assets: bigint, shares: bigint): void {
    const by = normalizeAddress(caller);
    const from = normalizeAddress(owner);
    const to = requireNonZero(receiver, "receiver");

    this.atomically(() => {
      if (!isAddressEqual(by, from)) {
        this.shares.spendAllowance(from, by, shares);
      }
      this.shares.burn(from, shares);
      this.asset.transfer(this.address, to, assets);
      this.publish([
        this.event(
          "vault.withdraw",
          { from: by, correlationId: randomUUID() },
          { caller: by, receiver: to, owner: from, assets: assets.toString(), shares: shares.toString() },
        ),
      ]);
    });

    this.logger.info({ caller: by, owner: from, receiver: to, assets: assets.toString() }, "Withdraw");
  }

  /**
   * Run `fn`; if it throws, run `undo` for external effects and put
   * state and share balances back as they were before rethrowing.
   */
  private atomically(fn: () => void, undo?: () => void): void {
    const checkpoint = this.checkpoint();
    try {
      fn();
    } catch (err) {
      undo?.();
      this.restore(checkpoint);
      this.logger.warn({ err }, "Vault operation rolled back");
      throw err;
    }
  }

  private checkpoint(): Checkpoint {
    return { state: { ...this.current }, shares: this.shares.checkpoint() };
  }

  private restore(checkpoint: Checkpoint): void {
    this.current = { ...checkpoint.state };
    this.shares.restore(checkpoint.shares);
  }

  private requireAdmin(caller: Address): void {
    if (!isAddressEqual(normalizeAddress(caller), this.current.admin)) {
      throw new VaultError("ONLY_ADMIN", `${caller} is not the vault admin`);
    }
  }

  private event<T extends BondEventType>(
    type: T,
    context: { readonly from: Address; readonly correlationId: string },
    payload: BondEventPayloads[T],
  ): DomainEvent {
    return createBondEvent(
      type,
      { source: "vault", actor: context.from, correlationId: context.correlationId },
      payload,
    );
  }

  private publish(events: readonly DomainEvent[]): void {
    if (this.eventStore !== undefined && events.length > 0) {
      this.eventStore.append(streamIdFor("vault", this.address), events);
    }
  }
}

function requireNonZero(address: Address, role: string): Address {
  const normalized = normalizeAddress(address);
  if (normalized === zeroAddress) {
    throw new VaultError("ZERO_ADDRESS", `${role} cannot be the zero address`);
  }
  return normalized;
}

function requireFeesBips(bips: number): void {
  if (!Number.isInteger(bips) || bips < 0 || bips > MAX_FEES_BIPS) {
    throw new VaultError("EXCESSIVE_VAULT_FEES", `feesBips must be an integer in 0..${MAX_FEES_BIPS}, got ${bips}`);
  }
}
