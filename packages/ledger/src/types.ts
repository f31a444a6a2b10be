/**
 * @txledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @txledger/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All exported types are readonly
 * - Rejected records never throw; they come back as an ApplyResult
 */

import type {
  ClientId,
  DisputeState,
  TransactionId,
  TransactionKind,
} from "@txledger/types";

// ─── Deposit History ─────────────────────────────────────────────────────

/**
 * A deposit retained so that later disputes can find it.
 * Withdrawals are never retained and cannot be disputed.
 */
export interface StoredDeposit {
  readonly client: ClientId;
  readonly tx: TransactionId;
  /** Scaled amount (1/10000 units). */
  readonly amount: bigint;
  readonly state: DisputeState;
}

/**
 * Allowed moves of a stored deposit's dispute state.
 *
 * - none → disputed (dispute)
 * - disputed → resolved (resolve), chargedBack (chargeback)
 * - disputed → none (resolve, only under `redisputeResolved`)
 * - resolved, chargedBack → nothing
 */
export const DISPUTE_TRANSITIONS: Readonly<Record<DisputeState, readonly DisputeState[]>> = {
  none: ["disputed"],
  disputed: ["resolved", "chargedBack", "none"],
  resolved: [],
  chargedBack: [],
} as const;

// ─── Apply Results ───────────────────────────────────────────────────────

/** Why a record was discarded. */
export type RejectionReason =
  | "INVALID_AMOUNT"
  | "ACCOUNT_FROZEN"
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "INVALID_DISPUTE_STATE";

/**
 * Outcome of applying one record.
 * A rejected record left every account and deposit untouched.
 */
export type ApplyResult =
  | { readonly applied: true; readonly kind: TransactionKind }
  | {
      readonly applied: false;
      readonly kind: TransactionKind;
      readonly reason: RejectionReason;
    };

/**
 * Totals for a batch of records fed through applyAll().
 */
export interface ApplySummary {
  readonly applied: number;
  readonly discarded: number;
  readonly discardedByReason: Readonly<Partial<Record<RejectionReason, number>>>;
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface LedgerOptions {
  /**
   * When true, a resolve returns the deposit to `none` so it may be
   * disputed again. When false (default), `resolved` is terminal.
   */
  readonly redisputeResolved?: boolean | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for misuse of the ledger helpers. */
export type LedgerErrorCode = "INVALID_AMOUNT" | "INVALID_TRANSITION";

/**
 * Structured error from the ledger helpers.
 * Ledger.apply() catches what it can recover from and never throws
 * for a single bad record.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
