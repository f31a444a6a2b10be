/**
 * @txledger/cli — Opening the transaction log.
 */

import { createReadStream } from "node:fs";
import { access, constants, stat } from "node:fs/promises";
import type { Readable } from "node:stream";

export class TransactionLogError extends Error {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.name = "TransactionLogError";
    this.path = path;
  }
}

/**
 * Open a transaction log for reading. The path must name a readable
 * regular file; anything else is refused before a stream is created.
 */
export async function openTransactionLog(path: string): Promise<Readable> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new TransactionLogError(path, "not a regular file");
    }
    await access(path, constants.R_OK);
  } catch (err: unknown) {
    if (err instanceof TransactionLogError) {
      throw err;
    }
    throw new TransactionLogError(path, "cannot be read", { cause: err });
  }
  return createReadStream(path, { encoding: "utf8" });
}

/**
 * True for an error raised by the file system while a log was being read
 * (a Node system error carries the failing syscall).
 */
export function isReadError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "syscall" in err && typeof err.syscall === "string";
}
