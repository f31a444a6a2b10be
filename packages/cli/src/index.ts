/**
 * @txledger/cli — CSV driver for the txledger engine.
 *
 * Reads a transaction log, runs it through @txledger/ledger and
 * reports the final account balances. The `txledger` binary lives in
 * main.ts; everything it is built from is exported here.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  RecordDecodeError,
  TransactionRowSchema,
  splitFields,
  parseHeader,
  decodeRow,
  readTransactions,
} from "./csv-decoder.js";
export type { DecodeIssue } from "./csv-decoder.js";
export { ACCOUNT_CSV_HEADER, encodeAccountRow, encodeAccounts } from "./csv-encoder.js";
export { TransactionLogError, isReadError, openTransactionLog } from "./input.js";
export { runLedger } from "./run.js";
export type { RunOptions, RunResult } from "./run.js";
