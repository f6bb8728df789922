/**
 * @bondline/ledger — Custodial balance ledger.
 *
 * A pure TypeScript balance ledger:
 * - Balances, allowances and total supply per unit of account
 * - Checkpoint / restore for all-or-nothing operations
 * - An in-process fungible asset built on top
 * - Integer unit math (bigint only, floor division, basis points)
 *
 * Design rules:
 * - Balances are never negative
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Core ledger
export { BalanceLedger, normalizeAddress } from "./balance-ledger.js";

// In-process asset
export { InMemoryAssetToken } from "./asset-token.js";

// Unit math
export {
  BIPS_DENOMINATOR,
  parseAmount,
  formatAmount,
  pow10,
  mulDiv,
  applyBips,
  assertAmount,
} from "./unit-math.js";

// Types
export type {
  LedgerErrorCode,
  Holding,
  LedgerCheckpoint,
  AssetTokenConfig,
} from "./types.js";

export { LedgerError } from "./types.js";
