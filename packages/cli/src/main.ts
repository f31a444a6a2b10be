#!/usr/bin/env tsx
/**
 * @txledger/cli — Entry point.
 *
 * Usage: txledger <transactions.csv> > accounts.csv
 *
 * Exit codes: 0 on success, 1 when the run fails (unreadable file,
 * malformed record), 2 on bad usage.
 */

import type { Readable } from "node:stream";
import chalk from "chalk";
import { loadConfig } from "./config.js";
import { RecordDecodeError } from "./csv-decoder.js";
import { TransactionLogError, isReadError, openTransactionLog } from "./input.js";
import { createLogger } from "./logger.js";
import { runLedger } from "./run.js";

async function main(argv: readonly string[]): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config);

  const [path] = argv;
  if (path === undefined) {
    process.stderr.write(
      `${chalk.yellow("Usage:")} ${chalk.white("txledger <transactions.csv> > accounts.csv")}\n`,
    );
    return 2;
  }

  const cannotRead = (err: unknown): number => {
    logger.error({ err, path }, "Cannot read transaction log");
    process.stderr.write(`${chalk.red("✗")} Cannot read ${path}\n`);
    return 1;
  };

  let input: Readable;
  try {
    input = await openTransactionLog(path);
  } catch (err: unknown) {
    if (err instanceof TransactionLogError) {
      return cannotRead(err);
    }
    throw err;
  }

  try {
    await runLedger({
      input,
      output: process.stdout,
      logger,
      ledger: { redisputeResolved: config.TXLEDGER_REDISPUTE_RESOLVED },
    });
    return 0;
  } catch (err: unknown) {
    if (err instanceof RecordDecodeError) {
      logger.error({ line: err.line, issues: err.issues }, "Malformed record, run aborted");
      process.stderr.write(`${chalk.red("✗")} ${err.message}\n`);
      return 1;
    }
    if (isReadError(err)) {
      return cannotRead(err);
    }
    throw err;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    process.exit(1);
  });
