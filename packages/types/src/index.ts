/**
 * @txledger/types — Shared domain types for the txledger stack.
 *
 * These types are used across all txledger packages:
 * - Transaction records as decoded from a transaction log
 * - Dispute lifecycle states
 * - Account views reported by a ledger snapshot
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Meaning lives in the ledger, not in the types
 */

export type {
  ClientId,
  TransactionId,
  TransactionKind,
  TransactionRecord,
  DisputeState,
  AccountView,
} from "./transaction.js";

// Runtime type guards
export {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  TRANSACTION_KINDS,
  isClientId,
  isTransactionId,
  isTransactionKind,
  isTransactionRecord,
} from "./guards.js";
