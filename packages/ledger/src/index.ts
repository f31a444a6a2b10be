/**
 * @txledger/ledger — Client transaction ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Applies deposits, withdrawals, disputes, resolves and chargebacks
 * to per-client accounts:
 * - available never goes negative
 * - held is derived from deposits under dispute, never stored
 * - total = available + held
 * - a chargeback freezes the account for good
 * - all monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Records that cannot be applied are discarded, never thrown
 * - Discarded records leave no trace in balances or history
 * - Zero runtime dependencies
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { ApplyObserver } from "./ledger.js";

// Account state
export { Account } from "./account.js";
export { DepositHistory } from "./deposit-history.js";

// Balance computation
export { computeAccountView, computeHeldByClient } from "./balance-calculator.js";

// Validation
export { isFundsKind, positiveAmount } from "./validation.js";
export type { FundsKind, DisputeKind } from "./validation.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  parseAmount,
  tryParseAmount,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  StoredDeposit,
  RejectionReason,
  ApplyResult,
  ApplySummary,
  LedgerOptions,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, DISPUTE_TRANSITIONS } from "./types.js";
