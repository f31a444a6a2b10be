/**
 * @txledger/cli — One ledger run.
 *
 * Decodes the transaction log, applies every record in order and
 * writes the account report. Nothing is written unless the whole log
 * decoded: a malformed row aborts the run before any output.
 */

import type { Readable, Writable } from "node:stream";
import { Ledger } from "@txledger/ledger";
import type { ApplySummary, LedgerOptions } from "@txledger/ledger";
import { encodeAccounts } from "./csv-encoder.js";
import { readTransactions } from "./csv-decoder.js";
import type { Logger } from "./logger.js";

export interface RunOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly logger: Logger;
  readonly ledger?: LedgerOptions | undefined;
}

export interface RunResult {
  readonly summary: ApplySummary;
  readonly accounts: number;
}

function write(output: Writable, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(chunk, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

export async function runLedger(options: RunOptions): Promise<RunResult> {
  const { input, output, logger } = options;
  const ledger = new Ledger(options.ledger);

  logger.info(
    { redisputeResolved: options.ledger?.redisputeResolved ?? false },
    "Ledger run started",
  );

  const summary = await ledger.applyAll(readTransactions(input), (record, result) => {
    if (!result.applied) {
      logger.debug(
        { type: record.type, client: record.client, tx: record.tx, reason: result.reason },
        "Record discarded",
      );
    }
  });

  const accounts = ledger.snapshot();
  await write(output, encodeAccounts(accounts));

  logger.info(
    {
      applied: summary.applied,
      discarded: summary.discarded,
      discardedByReason: summary.discardedByReason,
      accounts: accounts.length,
    },
    "Ledger run complete",
  );

  return { summary, accounts: accounts.length };
}
