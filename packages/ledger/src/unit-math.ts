/**
 * @bondline/ledger — Integer unit arithmetic.
 *
 * Amounts are bigint base units. Decimal strings exist only at the
 * edges (configuration, HTTP), converted here.
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors (rounds toward zero for non-negative operands)
 * - Amounts must be valid decimal strings
 */

import { LedgerError } from "./types.js";

/** Basis points in one whole. */
export const BIPS_DENOMINATOR = 10_000n;

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * 10^decimals as a bigint.
 */
export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
  }
  return 10n ** BigInt(decimals);
}

/**
 * Floor of a * b / denominator.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  return (a * b) / denominator;
}

/**
 * The `bips` share of `amount`, floored.
 *
 * applyBips(100n, 100) → 1n
 */
export function applyBips(amount: bigint, bips: number): bigint {
  return mulDiv(amount, BigInt(bips), BIPS_DENOMINATOR);
}

/**
 * Assert an amount is a non-negative bigint.
 */
export function assertAmount(amount: bigint, label = "amount"): void {
  if (typeof amount !== "bigint" || amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a non-negative bigint, got: ${String(amount)}`);
  }
}
