/**
 * BondService — Composition root for one bond deployment.
 *
 * Wires two domains over a single in-process relay channel:
 *
 *   source domain:       ManualPriceFeed → PriceRelayer
 *   destination domain:  ValuationOracle (→ PriceAggregator) → RepaymentVault
 *
 * plus the asset, the bond registry and a shared event store.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly.
 */

import pino from "pino";
import type { Logger } from "pino";
import { maxUint256 } from "viem";
import type { Address, Clock, DomainId, Hex, PriceRound, RoundDataFeed } from "@bondline/types";
import { systemClock } from "@bondline/types";
import { InMemoryEventStore, createBondCatalog } from "@bondline/event-store";
import type { EventStoreIntegrityResult, StoredEvent, StreamOwner } from "@bondline/event-store";
import { InMemoryAssetToken } from "@bondline/ledger";
import { InProcessRelayChannel } from "@bondline/relay";
import type { DeliveryReceipt, RelayMessage } from "@bondline/relay";
import { ManualPriceFeed, PriceAggregator, PriceRelayer, ValuationOracle } from "@bondline/oracle";
import { InMemoryBondRegistry, MAX_PRICE_AGE, RepaymentVault } from "@bondline/vault";
import type { DepositQuote, DepositResult, VaultState } from "@bondline/vault";
import type { AppConfig } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BondServiceConfig {
  readonly sourceDomain: DomainId;
  readonly destinationDomain: DomainId;

  readonly relay: {
    readonly feeToken: Address;
    readonly feeAmount: bigint;
    readonly gasLimit: bigint;
  };

  readonly addresses: {
    readonly sourceFeed: Address;
    readonly relayer: Address;
    readonly oracle: Address;
    readonly vault: Address;
    readonly asset: Address;
  };

  readonly parties: {
    readonly admin: Address;
    readonly debtor: Address;
    readonly creditor: Address;
    readonly feesRecipient: Address;
  };

  readonly bond: {
    readonly id: bigint;
    readonly debtAmount: bigint;
    readonly maturity: bigint;
    readonly feesBips: number;
  };

  readonly asset: {
    readonly symbol: string;
    readonly decimals: number;
    /** Minted to the debtor and the creditor, who approve the vault for it */
    readonly initialBalance: bigint;
  };

  readonly price: {
    readonly decimals: number;
    /** Published by the source feed at startup */
    readonly initialAnswer: bigint;

    /**
     * When set, the vault is priced by an aggregator dividing the
     * relayed price by a local quote feed with this answer.
     */
    readonly quoteAnswer?: bigint;
  };

  readonly clock?: Clock;
  readonly logger?: Logger;
}

/** Where the events endpoint reads from. */
export interface EventQuery {
  readonly owner?: StreamOwner;
  readonly afterPosition?: number;
  readonly limit: number;
}

export interface AccountBalances {
  readonly shares: bigint;
  readonly assets: bigint;
  readonly allowance: bigint;
}

const QUOTE_FEED_ADDRESS: Address = "0x0000000000000000000000000000000000002004";
const AGGREGATOR_ADDRESS: Address = "0x0000000000000000000000000000000000002005";

// =============================================================================
// Service
// =============================================================================

export class BondService {
  readonly eventStore: InMemoryEventStore;
  readonly channel: InProcessRelayChannel;
  readonly sourceFeed: ManualPriceFeed;
  readonly relayer: PriceRelayer;
  readonly oracle: ValuationOracle;
  readonly priceFeed: RoundDataFeed;
  readonly registry: InMemoryBondRegistry;
  readonly asset: InMemoryAssetToken;
  readonly vault: RepaymentVault;

  private readonly config: BondServiceConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: BondServiceConfig) {
    this.config = config;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? pino({ level: "silent" });
    this.eventStore = new InMemoryEventStore({ catalog: createBondCatalog() });
    this.channel = new InProcessRelayChannel({ logger: this.logger.child({ component: "relay" }) });

    // ─── Source domain ───────────────────────────────────────────────
    this.channel.addDomain(config.sourceDomain);
    this.sourceFeed = new ManualPriceFeed({
      address: config.addresses.sourceFeed,
      decimals: config.price.decimals,
      initialAnswer: config.price.initialAnswer,
      clock: this.clock,
    });
    this.relayer = new PriceRelayer({
      address: config.addresses.relayer,
      domain: config.sourceDomain,
      feed: this.sourceFeed,
      messenger: this.channel,
      eventStore: this.eventStore,
      logger: this.logger.child({ component: "relayer" }),
    });

    // ─── Destination domain ──────────────────────────────────────────
    this.oracle = new ValuationOracle({
      address: config.addresses.oracle,
      allowedSource: { domain: config.sourceDomain, address: config.addresses.relayer },
      decimals: config.price.decimals,
      eventStore: this.eventStore,
      logger: this.logger.child({ component: "oracle" }),
    });
    this.channel.register(config.destinationDomain, config.addresses.oracle, this.oracle);

    this.priceFeed =
      config.price.quoteAnswer === undefined
        ? this.oracle
        : new PriceAggregator({
            address: AGGREGATOR_ADDRESS,
            feed1: this.oracle,
            feed2: new ManualPriceFeed({
              address: QUOTE_FEED_ADDRESS,
              decimals: config.price.decimals,
              description: "Quote Price Feed",
              initialAnswer: config.price.quoteAnswer,
              clock: this.clock,
            }),
            decimals: config.price.decimals,
          });

    this.registry = new InMemoryBondRegistry();
    this.registry.mint(config.bond.id, config.parties.creditor);

    this.asset = new InMemoryAssetToken({
      address: config.addresses.asset,
      name: config.asset.symbol,
      symbol: config.asset.symbol,
      decimals: config.asset.decimals,
    });
    if (config.asset.initialBalance > 0n) {
      for (const holder of [config.parties.debtor, config.parties.creditor]) {
        this.asset.mint(holder, config.asset.initialBalance);
        this.asset.approve(holder, config.addresses.vault, maxUint256);
      }
    }

    this.vault = new RepaymentVault({
      address: config.addresses.vault,
      admin: config.parties.admin,
      ownershipRegistry: this.registry,
      bondId: config.bond.id,
      debtor: config.parties.debtor,
      asset: this.asset,
      debtAmount: config.bond.debtAmount,
      bondMaturity: config.bond.maturity,
      feesBips: config.bond.feesBips,
      feesRecipient: config.parties.feesRecipient,
      priceFeed: this.priceFeed,
      clock: this.clock,
      eventStore: this.eventStore,
      logger: this.logger.child({ component: "vault" }),
    });

    this.logger.info(
      { vault: this.vault.address, oracle: this.oracle.address, bondId: config.bond.id.toString() },
      "Bond deployment ready",
    );
  }

  static fromConfig(config: AppConfig, options: { clock?: Clock; logger?: Logger } = {}): BondService {
    return new BondService({
      sourceDomain: config.SOURCE_DOMAIN,
      destinationDomain: config.DESTINATION_DOMAIN,
      relay: {
        feeToken: config.RELAY_FEE_TOKEN,
        feeAmount: config.RELAY_FEE_AMOUNT,
        gasLimit: config.RELAY_GAS_LIMIT,
      },
      addresses: {
        sourceFeed: config.SOURCE_FEED_ADDRESS,
        relayer: config.RELAYER_ADDRESS,
        oracle: config.ORACLE_ADDRESS,
        vault: config.VAULT_ADDRESS,
        asset: config.ASSET_ADDRESS,
      },
      parties: {
        admin: config.ADMIN_ADDRESS,
        debtor: config.DEBTOR_ADDRESS,
        creditor: config.CREDITOR_ADDRESS,
        feesRecipient: config.FEES_RECIPIENT_ADDRESS,
      },
      bond: {
        id: config.BOND_ID,
        debtAmount: config.DEBT_AMOUNT,
        maturity: config.BOND_MATURITY,
        feesBips: config.FEES_BIPS,
      },
      asset: {
        symbol: config.ASSET_SYMBOL,
        decimals: config.ASSET_DECIMALS,
        initialBalance: config.INITIAL_BALANCE,
      },
      price: {
        decimals: config.PRICE_DECIMALS,
        initialAnswer: config.INITIAL_PRICE,
      },
      ...options,
    });
  }

  // ─── Vault ─────────────────────────────────────────────────────────

  vaultState(): VaultState {
    return this.vault.state();
  }

  quote(targetValue: bigint): DepositQuote {
    return this.vault.quoteDeposit(targetValue);
  }

  balances(account: Address): AccountBalances {
    return {
      shares: this.vault.balanceOf(account),
      assets: this.asset.balanceOf(account),
      allowance: this.asset.allowance(account, this.vault.address),
    };
  }

  deposit(caller: Address, maxAssets: bigint, targetValue: bigint, principal: boolean): DepositResult {
    return this.vault.deposit(caller, maxAssets, targetValue, principal);
  }

  withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): bigint {
    return this.vault.withdraw(caller, assets, receiver, owner);
  }

  redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): bigint {
    return this.vault.redeem(caller, shares, receiver, owner);
  }

  setFeesBips(caller: Address, bips: number): void {
    this.vault.setFeesBips(caller, bips);
  }

  setFeesRecipient(caller: Address, recipient: Address): void {
    this.vault.setFeesRecipient(caller, recipient);
  }

  /** Let the vault pull up to `amount` of the caller's asset. */
  approveVault(caller: Address, amount: bigint): void {
    this.asset.approve(caller, this.vault.address, amount);
  }

  // ─── Oracle ────────────────────────────────────────────────────────

  latestRound(): PriceRound {
    return this.oracle.latestRoundData();
  }

  round(roundId: bigint): PriceRound {
    return this.oracle.getRoundData(roundId);
  }

  /** The oracle holds a round recent enough for the vault to use. */
  hasFreshPrice(): boolean {
    const { roundId, updatedAt } = this.oracle.latestRoundData();
    return roundId !== 0n && this.clock.now() - updatedAt <= MAX_PRICE_AGE;
  }

  // ─── Source domain & relay ─────────────────────────────────────────

  /** Publish a new source-domain round. */
  setSourcePrice(answer: bigint): PriceRound {
    const roundId = this.sourceFeed.updateAnswer(answer);
    return this.sourceFeed.getRoundData(roundId);
  }

  relayLatestRound(): Hex {
    const { relay, destinationDomain, addresses } = this.config;
    return this.relayer.sendLatestRoundData(
      destinationDomain,
      addresses.oracle,
      relay.feeToken,
      relay.feeAmount,
      relay.gasLimit,
    );
  }

  pendingMessages(): readonly RelayMessage[] {
    return this.channel.pending();
  }

  deliver(messageId: Hex): DeliveryReceipt {
    return this.channel.deliver(messageId);
  }

  deliverAll(): readonly DeliveryReceipt[] {
    return this.channel.deliverAll();
  }

  // ─── Events ────────────────────────────────────────────────────────

  events(query: EventQuery): readonly StoredEvent[] {
    const all = this.eventStore.readAll(
      query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
    );
    const owner = query.owner;
    const matching = owner === undefined ? all : all.filter((e) => e.streamId.startsWith(`${owner}:`));
    return matching.slice(0, query.limit);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
