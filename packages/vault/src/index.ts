/**
 * @bondline/vault — Bond repayment vault.
 *
 * Custodies the bond's asset and enforces its payment protocol:
 * - Principal funding by the creditor (the current bond holder)
 * - Principal repayment and interest by the debtor
 * - A fee skim on interest, paid to the fees recipient in shares
 *
 * Design rules:
 * - The creditor is looked up on every check, never cached
 * - Every priced operation reads a fresh price (25h staleness window)
 * - One share per asset unit; generic deposit/mint entry points are sealed
 * - All-or-nothing: a failed asset pull rolls everything back
 */

export { RepaymentVault } from "./repayment-vault.js";
export { InMemoryBondRegistry } from "./bond-registry.js";
export { MAX_PRICE_AGE, latestPrice, assetsForValue, valueOfAssets } from "./valuation.js";

export { VaultError } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";

export { MAX_FEES_BIPS } from "./types.js";
export type {
  RepaymentVaultConfig,
  DepositResult,
  DepositQuote,
  VaultState,
  ShareToken,
  RedeemableVault,
  SealedTokenizedVault,
} from "./types.js";
