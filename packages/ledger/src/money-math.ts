/**
 * @txledger/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling
 * at a fixed precision of four fractional digits.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/** Fractional digits carried by every amount. */
export const AMOUNT_DECIMALS = 4;

const AMOUNT_FORMAT = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string amount into a bigint scaled by AMOUNT_DECIMALS.
 *
 * "100.5" → 1005000n
 * "0.0001" → 1n
 * "-50.25" → -502500n
 */
export function parseAmount(amount: string): bigint {
  const trimmed = amount.trim();

  if (trimmed === "" || !AMOUNT_FORMAT.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(AMOUNT_DECIMALS)} are supported`,
    );
  }

  const combined = intPart + fracPart.padEnd(AMOUNT_DECIMALS, "0");
  const value = BigInt(combined);

  return negative ? -value : value;
}

/**
 * Parse an amount, returning undefined instead of throwing.
 */
export function tryParseAmount(amount: string | undefined): bigint | undefined {
  if (amount === undefined) {
    return undefined;
  }
  try {
    return parseAmount(amount);
  } catch (err: unknown) {
    if (err instanceof LedgerError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1005000n → "100.5000"
 * 1n → "0.0001"
 * -502500n → "-50.2500"
 */
export function formatAmount(scaled: bigint): string {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
  const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
