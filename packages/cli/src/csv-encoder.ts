/**
 * @txledger/cli — Account report encoding.
 *
 * One header line, then one line per account, in the order the
 * ledger reports them.
 */

import type { AccountView } from "@txledger/types";

export const ACCOUNT_CSV_HEADER = "client,available,held,total,locked";

export function encodeAccountRow(view: AccountView): string {
  return [
    String(view.client),
    view.available,
    view.held,
    view.total,
    String(view.locked),
  ].join(",");
}

/**
 * Encode a full report, newline-terminated.
 */
export function encodeAccounts(views: readonly AccountView[]): string {
  const lines = [ACCOUNT_CSV_HEADER, ...views.map(encodeAccountRow)];
  return `${lines.join("\n")}\n`;
}
