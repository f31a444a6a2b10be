/**
 * @txledger/ledger — Balance calculation.
 *
 * Derives held and total balances from the deposit history and renders
 * account views. Held is never stored: it is recomputed from the set of
 * deposits currently in state `disputed`.
 */

import type { AccountView, ClientId } from "@txledger/types";
import type { Account } from "./account.js";
import type { StoredDeposit } from "./types.js";
import { formatAmount } from "./money-math.js";

/**
 * Sum disputed deposits per client.
 * Clients with nothing under dispute are absent from the map.
 */
export function computeHeldByClient(
  deposits: readonly StoredDeposit[],
): Map<ClientId, bigint> {
  const held = new Map<ClientId, bigint>();

  for (const deposit of deposits) {
    if (deposit.state !== "disputed") {
      continue;
    }
    held.set(deposit.client, (held.get(deposit.client) ?? 0n) + deposit.amount);
  }

  return held;
}

/**
 * Render one account with its derived held amount.
 */
export function computeAccountView(account: Account, held: bigint): AccountView {
  return {
    client: account.client,
    available: formatAmount(account.available),
    held: formatAmount(held),
    total: formatAmount(account.available + held),
    locked: account.frozen,
  };
}
