/**
 * Runtime Type Guards
 *
 * Narrowing functions for txledger domain types.
 * These enable safe runtime validation at system boundaries
 * (decoded rows, deserialized data).
 */

import type {
  ClientId,
  TransactionId,
  TransactionKind,
  TransactionRecord,
} from "./transaction.js";

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TRANSACTION_ID = 0xffff_ffff;

export const TRANSACTION_KINDS: readonly TransactionKind[] = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
];

const KINDS = new Set<string>(TRANSACTION_KINDS);

function isBoundedInteger(value: unknown, max: number): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= max
  );
}

export function isClientId(value: unknown): value is ClientId {
  return isBoundedInteger(value, MAX_CLIENT_ID);
}

export function isTransactionId(value: unknown): value is TransactionId {
  return isBoundedInteger(value, MAX_TRANSACTION_ID);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

/**
 * Structural check only: the amount is not required to be well-formed here.
 * Amount validation belongs to the ledger, which discards bad amounts.
 */
export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTransactionKind(v.type) &&
    isClientId(v.client) &&
    isTransactionId(v.tx) &&
    (v.amount === undefined || typeof v.amount === "string")
  );
}
