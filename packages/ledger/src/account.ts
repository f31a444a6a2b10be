/**
 * @txledger/ledger — Per-client balance state.
 *
 * An Account only knows its available balance and whether it is frozen.
 * Held funds are not tracked here: they are derived from the deposit
 * history (see balance-calculator.ts), so held always equals the sum of
 * the deposits currently under dispute.
 *
 * Rules:
 * - available never goes below zero
 * - A frozen account is never unfrozen
 */

import type { ClientId } from "@txledger/types";

export class Account {
  readonly client: ClientId;
  private _available = 0n;
  private _frozen = false;

  constructor(client: ClientId) {
    this.client = client;
  }

  /** Scaled available balance (1/10000 units). */
  get available(): bigint {
    return this._available;
  }

  get frozen(): boolean {
    return this._frozen;
  }

  /**
   * Check whether `amount` can leave the available balance.
   */
  covers(amount: bigint): boolean {
    return this._available >= amount;
  }

  /**
   * Add funds to the available balance (deposit, resolve).
   */
  credit(amount: bigint): void {
    this._available += amount;
  }

  /**
   * Take funds from the available balance (withdrawal, dispute).
   * Returns false and changes nothing when the balance does not cover it.
   */
  debit(amount: bigint): boolean {
    if (!this.covers(amount)) {
      return false;
    }
    this._available -= amount;
    return true;
  }

  /**
   * Lock the account for good after a chargeback.
   */
  freeze(): void {
    this._frozen = true;
  }
}
