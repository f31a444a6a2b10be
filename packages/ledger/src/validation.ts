/**
 * @txledger/ledger — Record validation helpers.
 *
 * Deposits and withdrawals need a well-formed, strictly positive amount.
 * Disputes, resolves and chargebacks ignore the amount field entirely.
 */

import type { TransactionKind, TransactionRecord } from "@txledger/types";
import { tryParseAmount } from "./money-math.js";

/** Kinds that move money and therefore carry an amount. */
export type FundsKind = Extract<TransactionKind, "deposit" | "withdrawal">;

/** Kinds that act on a previously retained deposit. */
export type DisputeKind = Exclude<TransactionKind, FundsKind>;

export function isFundsKind(kind: TransactionKind): kind is FundsKind {
  return kind === "deposit" || kind === "withdrawal";
}

/**
 * The scaled amount of a deposit or withdrawal, or undefined when it is
 * missing, malformed, zero or negative.
 */
export function positiveAmount(record: TransactionRecord): bigint | undefined {
  const amount = tryParseAmount(record.amount);
  if (amount === undefined || amount <= 0n) {
    return undefined;
  }
  return amount;
}
