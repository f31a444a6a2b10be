/**
 * @txledger/ledger — Core Ledger class.
 *
 * Applies an ordered stream of client transactions to per-client
 * accounts and keeps the deposit history disputes need.
 *
 * API surface:
 * - apply() — Apply one record, or discard it
 * - applyAll() — Apply a (possibly async) sequence of records in order
 * - snapshot() — Views of every known account, in opening order
 * - getAccount() — View of a single account
 * - getDeposit() — A retained deposit by transaction id
 *
 * A record that cannot be applied is discarded without touching any
 * state. apply() never throws for a single bad record.
 */

import type {
  AccountView,
  ClientId,
  TransactionId,
  TransactionRecord,
} from "@txledger/types";
import { Account } from "./account.js";
import { computeAccountView, computeHeldByClient } from "./balance-calculator.js";
import { DepositHistory } from "./deposit-history.js";
import type {
  ApplyResult,
  ApplySummary,
  LedgerOptions,
  RejectionReason,
  StoredDeposit,
} from "./types.js";
import type { DisputeKind, FundsKind } from "./validation.js";
import { isFundsKind, positiveAmount } from "./validation.js";

/** Callback invoked by applyAll() after each record. */
export type ApplyObserver = (record: TransactionRecord, result: ApplyResult) => void;

function applied(kind: TransactionRecord["type"]): ApplyResult {
  return { applied: true, kind };
}

function rejected(kind: TransactionRecord["type"], reason: RejectionReason): ApplyResult {
  return { applied: false, kind, reason };
}

/**
 * In-memory client ledger.
 *
 * Accounts are opened lazily by the first record applied to their
 * client, and live until the ledger is dropped. A discarded record
 * never opens one. A chargeback freezes the account for good.
 */
export class Ledger {
  private readonly _accounts: Map<ClientId, Account> = new Map();
  private readonly _deposits: DepositHistory = new DepositHistory();
  private readonly _redisputeResolved: boolean;

  constructor(options?: LedgerOptions) {
    this._redisputeResolved = options?.redisputeResolved ?? false;
  }

  // ─── Write Operations ────────────────────────────────────────────────

  /**
   * Apply one record.
   *
   * Discard rules (checked in order, first hit wins):
   * - deposit/withdrawal: INVALID_AMOUNT, ACCOUNT_FROZEN, then
   *   DUPLICATE_TRANSACTION (deposit) or INSUFFICIENT_FUNDS (withdrawal)
   * - dispute/resolve/chargeback: UNKNOWN_TRANSACTION, CLIENT_MISMATCH,
   *   ACCOUNT_FROZEN, INVALID_DISPUTE_STATE, then INSUFFICIENT_FUNDS (dispute)
   */
  apply(record: TransactionRecord): ApplyResult {
    const kind = record.type;

    if (isFundsKind(kind)) {
      const amount = positiveAmount(record);
      if (amount === undefined) {
        return rejected(kind, "INVALID_AMOUNT");
      }
      return this._applyFunds(kind, this._lookup(record.client), record.tx, amount);
    }

    return this._applyDispute(kind, this._lookup(record.client), record.tx);
  }

  /**
   * Apply records strictly in order. Each record is applied in full
   * before the next one is pulled from the source.
   */
  async applyAll(
    records: Iterable<TransactionRecord> | AsyncIterable<TransactionRecord>,
    observer?: ApplyObserver,
  ): Promise<ApplySummary> {
    let appliedCount = 0;
    let discardedCount = 0;
    const discardedByReason: Partial<Record<RejectionReason, number>> = {};

    for await (const record of records) {
      const result = this.apply(record);
      if (result.applied) {
        appliedCount++;
      } else {
        discardedCount++;
        discardedByReason[result.reason] = (discardedByReason[result.reason] ?? 0) + 1;
      }
      observer?.(record, result);
    }

    return {
      applied: appliedCount,
      discarded: discardedCount,
      discardedByReason,
    };
  }

  /**
   * The client's account, or a fresh unregistered one for an unseen
   * client. It only joins the ledger through _commit().
   */
  private _lookup(client: ClientId): Account {
    return this._accounts.get(client) ?? new Account(client);
  }

  private _commit(account: Account, kind: TransactionRecord["type"]): ApplyResult {
    if (!this._accounts.has(account.client)) {
      this._accounts.set(account.client, account);
    }
    return applied(kind);
  }

  private _applyFunds(
    kind: FundsKind,
    account: Account,
    tx: TransactionId,
    amount: bigint,
  ): ApplyResult {
    if (account.frozen) {
      return rejected(kind, "ACCOUNT_FROZEN");
    }

    if (kind === "deposit") {
      if (!this._deposits.record(account.client, tx, amount)) {
        return rejected(kind, "DUPLICATE_TRANSACTION");
      }
      account.credit(amount);
      return this._commit(account, kind);
    }

    if (!account.debit(amount)) {
      return rejected(kind, "INSUFFICIENT_FUNDS");
    }
    return this._commit(account, kind);
  }

  private _applyDispute(kind: DisputeKind, account: Account, tx: TransactionId): ApplyResult {
    const deposit = this._deposits.get(tx);
    if (deposit === undefined) {
      return rejected(kind, "UNKNOWN_TRANSACTION");
    }
    if (deposit.client !== account.client) {
      return rejected(kind, "CLIENT_MISMATCH");
    }
    if (account.frozen) {
      return rejected(kind, "ACCOUNT_FROZEN");
    }

    switch (kind) {
      case "dispute":
        if (deposit.state !== "none") {
          return rejected(kind, "INVALID_DISPUTE_STATE");
        }
        // The disputed funds may already have been withdrawn.
        if (!account.debit(deposit.amount)) {
          return rejected(kind, "INSUFFICIENT_FUNDS");
        }
        this._deposits.transition(tx, "disputed");
        return this._commit(account, kind);

      case "resolve":
        if (deposit.state !== "disputed") {
          return rejected(kind, "INVALID_DISPUTE_STATE");
        }
        account.credit(deposit.amount);
        this._deposits.transition(tx, this._redisputeResolved ? "none" : "resolved");
        return this._commit(account, kind);

      case "chargeback":
        if (deposit.state !== "disputed") {
          return rejected(kind, "INVALID_DISPUTE_STATE");
        }
        this._deposits.transition(tx, "chargedBack");
        account.freeze();
        return this._commit(account, kind);
    }
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Views of every known account, in the order they were opened.
   */
  snapshot(): readonly AccountView[] {
    const held = computeHeldByClient(this._deposits.getAll());
    return [...this._accounts.values()].map((account) =>
      computeAccountView(account, held.get(account.client) ?? 0n),
    );
  }

  /**
   * View of one account, or undefined if the client was never seen.
   */
  getAccount(client: ClientId): AccountView | undefined {
    const account = this._accounts.get(client);
    if (account === undefined) {
      return undefined;
    }
    const held = computeHeldByClient(this._deposits.getAll());
    return computeAccountView(account, held.get(client) ?? 0n);
  }

  /**
   * A retained deposit, or undefined if no deposit with this id was accepted.
   */
  getDeposit(tx: TransactionId): StoredDeposit | undefined {
    return this._deposits.get(tx);
  }

  /**
   * Number of known clients.
   */
  get accountCount(): number {
    return this._accounts.size;
  }

  /**
   * Number of retained deposits.
   */
  get depositCount(): number {
    return this._deposits.count;
  }
}
