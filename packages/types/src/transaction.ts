/**
 * Transaction Types
 *
 * The records a client transaction log is made of, and the account view
 * the ledger reports at the end of a run.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Records are immutable once decoded
 */

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier. */
export type TransactionId = number;

/**
 * The five kinds of record a transaction log may contain.
 */
export type TransactionKind =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/**
 * A single decoded line of the transaction log.
 */
export interface TransactionRecord {
  /** What the record does */
  readonly type: TransactionKind;

  /** Client whose account the record targets */
  readonly client: ClientId;

  /**
   * For deposits and withdrawals, the id of this transaction.
   * For disputes, resolves and chargebacks, the id of the deposit referenced.
   */
  readonly tx: TransactionId;

  /**
   * Decimal string (e.g., "12.5", "0.0001").
   * Required for deposits and withdrawals, ignored otherwise.
   */
  readonly amount?: string | undefined;
}

/**
 * Where a retained deposit stands in the dispute lifecycle.
 *
 * none → disputed → resolved | chargedBack
 */
export type DisputeState = "none" | "disputed" | "resolved" | "chargedBack";

/**
 * Final balances of one client, as reported by a ledger snapshot.
 */
export interface AccountView {
  readonly client: ClientId;

  /** Funds the client may withdraw now (4 fractional digits) */
  readonly available: string;

  /** Funds under an open dispute (4 fractional digits) */
  readonly held: string;

  /** available + held (4 fractional digits) */
  readonly total: string;

  /** True once a chargeback has frozen the account */
  readonly locked: boolean;
}
