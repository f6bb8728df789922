import type { Address, Clock } from "@bondline/types";
import { InMemoryEventStore, createBondCatalog } from "@bondline/event-store";
import { InMemoryAssetToken, LedgerError } from "@bondline/ledger";
import { ManualPriceFeed, OracleError } from "@bondline/oracle";
import { RelayError } from "@bondline/relay";
import { InMemoryBondRegistry } from "../src/bond-registry.js";
import { RepaymentVault } from "../src/repayment-vault.js";
import { VaultError } from "../src/errors.js";
import type { RepaymentVaultConfig } from "../src/types.js";

export const VAULT: Address = "0x4000000000000000000000000000000000000001";
export const ADMIN: Address = "0x5000000000000000000000000000000000000001";
export const DEBTOR: Address = "0x6000000000000000000000000000000000000001";
export const CREDITOR: Address = "0x7000000000000000000000000000000000000001";
export const FEES: Address = "0x8000000000000000000000000000000000000001";
export const STRANGER: Address = "0x9000000000000000000000000000000000000001";
export const ASSET: Address = "0x1100000000000000000000000000000000000001";
export const FEED: Address = "0x1200000000000000000000000000000000000001";
export const ZERO: Address = "0x0000000000000000000000000000000000000000";

export const BOND_ID = 1n;
export const DEBT_AMOUNT = 100n;
export const MATURITY = 1_800_000_000n;
export const T0 = 1_700_000_000n;

/** 1.0 at 8 decimals */
export const ONE = 100_000_000n;

/** Starting asset balance of the debtor and the creditor */
export const FUNDS = 1_000_000n;

export class ManualClock implements Clock {
  constructor(public time: bigint = T0) {}

  now(): bigint {
    return this.time;
  }

  advance(seconds: bigint): void {
    this.time += seconds;
  }
}

export interface VaultFixture {
  readonly vault: RepaymentVault;
  readonly asset: InMemoryAssetToken;
  readonly registry: InMemoryBondRegistry;
  readonly feed: ManualPriceFeed;
  readonly clock: ManualClock;
  readonly store: InMemoryEventStore;
}

/**
 * A vault over an 8-decimal asset priced at 1.0, with a 1% fee.
 * Debtor and creditor are funded and have approved the vault.
 */
export function setupVault(overrides: Partial<RepaymentVaultConfig> = {}): VaultFixture {
  const clock = new ManualClock();
  const store = new InMemoryEventStore({ catalog: createBondCatalog() });
  const asset = new InMemoryAssetToken({ address: ASSET, name: "Test Dollar", symbol: "TUSD", decimals: 8 });
  const registry = new InMemoryBondRegistry();
  const feed = new ManualPriceFeed({ address: FEED, decimals: 8, initialAnswer: ONE, clock });

  registry.mint(BOND_ID, CREDITOR);
  for (const holder of [DEBTOR, CREDITOR]) {
    asset.mint(holder, FUNDS);
    asset.approve(holder, VAULT, FUNDS);
  }

  const vault = new RepaymentVault({
    address: VAULT,
    admin: ADMIN,
    ownershipRegistry: registry,
    bondId: BOND_ID,
    debtor: DEBTOR,
    asset,
    debtAmount: DEBT_AMOUNT,
    bondMaturity: MATURITY,
    feesBips: 100,
    feesRecipient: FEES,
    priceFeed: feed,
    clock,
    eventStore: store,
    ...overrides,
  });

  return { vault, asset, registry, feed, clock, store };
}

export function vaultEventTypes(store: InMemoryEventStore): string[] {
  return store.read(`vault:${VAULT}`).map((e) => e.event.type);
}

/** The error code thrown by `fn`, or undefined if it returns. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (
      err instanceof VaultError ||
      err instanceof OracleError ||
      err instanceof LedgerError ||
      err instanceof RelayError
    ) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
