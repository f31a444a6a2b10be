/**
 * @txledger/ledger — Deposit history.
 *
 * Every accepted deposit is retained here, keyed by transaction id,
 * so disputes, resolves and chargebacks can find it later.
 *
 * Rules:
 * - No duplicate transaction ids (first deposit wins)
 * - Entries are replaced, never mutated in place
 * - State changes follow DISPUTE_TRANSITIONS
 */

import type { ClientId, DisputeState, TransactionId } from "@txledger/types";
import type { StoredDeposit } from "./types.js";
import { DISPUTE_TRANSITIONS, LedgerError } from "./types.js";

export class DepositHistory {
  private readonly _deposits: Map<TransactionId, StoredDeposit> = new Map();

  /**
   * Retain a new deposit in state `none`.
   * Returns false if the transaction id is already taken.
   */
  record(client: ClientId, tx: TransactionId, amount: bigint): boolean {
    if (this._deposits.has(tx)) {
      return false;
    }
    this._deposits.set(tx, { client, tx, amount, state: "none" });
    return true;
  }

  get(tx: TransactionId): StoredDeposit | undefined {
    return this._deposits.get(tx);
  }

  has(tx: TransactionId): boolean {
    return this._deposits.has(tx);
  }

  /**
   * Move a deposit to a new dispute state.
   * Throws if the deposit is unknown or the move is not allowed.
   */
  transition(tx: TransactionId, to: DisputeState): StoredDeposit {
    const deposit = this._deposits.get(tx);
    if (deposit === undefined) {
      throw new LedgerError("INVALID_TRANSITION", `Unknown deposit: ${String(tx)}`);
    }
    if (!DISPUTE_TRANSITIONS[deposit.state].includes(to)) {
      throw new LedgerError(
        "INVALID_TRANSITION",
        `Deposit ${String(tx)} cannot move from "${deposit.state}" to "${to}"`,
      );
    }

    const next: StoredDeposit = { ...deposit, state: to };
    this._deposits.set(tx, next);
    return next;
  }

  /**
   * All retained deposits, in insertion order.
   */
  getAll(): readonly StoredDeposit[] {
    return [...this._deposits.values()];
  }

  get count(): number {
    return this._deposits.size;
  }
}
