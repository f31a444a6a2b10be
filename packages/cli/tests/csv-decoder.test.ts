/**
 * Tests for the transaction log decoder.
 *
 * Covers:
 * - Field splitting with double-quoted fields
 * - Header parsing and column lookup
 * - Row decoding, trimming and optional amounts
 * - Structural failures with line numbers
 * - Streaming over a Readable
 */

import { Readable } from "node:stream";
import { describe, it, expect } from "vitest";
import type { TransactionRecord } from "@txledger/types";
import {
  RecordDecodeError,
  decodeRow,
  parseHeader,
  readTransactions,
  splitFields,
} from "../src/csv-decoder.js";

const COLUMNS = ["type", "client", "tx", "amount"] as const;

async function collect(csv: string): Promise<TransactionRecord[]> {
  const records: TransactionRecord[] = [];
  for await (const record of readTransactions(Readable.from([csv]))) {
    records.push(record);
  }
  return records;
}

function decodeError(fn: () => unknown): RecordDecodeError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof RecordDecodeError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a RecordDecodeError");
}

// =============================================================================
// splitFields
// =============================================================================

describe("splitFields", () => {
  it("splits and trims plain fields", () => {
    expect(splitFields("dispute, 1 ,1,", 2)).toEqual(["dispute", "1", "1", ""]);
  });

  it("strips the quotes around a field", () => {
    expect(splitFields('"deposit", "1",2 , "1.5"', 2)).toEqual(["deposit", "1", "2", "1.5"]);
  });

  it("keeps commas and doubled quotes inside a quoted field", () => {
    expect(splitFields('"a,b",c', 2)).toEqual(["a,b", "c"]);
    expect(splitFields('a,"say ""hi""",b', 2)).toEqual(["a", 'say "hi"', "b"]);
  });

  it("rejects an unterminated quoted field", () => {
    const err = decodeError(() => splitFields('"deposit,1,1', 7));
    expect(err.message).toBe("Line 7: Unterminated quoted field");
  });

  it("rejects text after a closing quote", () => {
    const err = decodeError(() => splitFields('"deposit"x,1,1', 8));
    expect(err.message).toBe("Line 8: Unexpected text after a quoted field");
  });
});

// =============================================================================
// parseHeader
// =============================================================================

describe("parseHeader", () => {
  it("trims column names", () => {
    expect(parseHeader("type, client ,tx,  amount")).toEqual(["type", "client", "tx", "amount"]);
  });

  it("accepts quoted column names", () => {
    expect(parseHeader('"type","client","tx","amount"')).toEqual(["type", "client", "tx", "amount"]);
  });

  it("accepts a header without an amount column", () => {
    expect(parseHeader("type,client,tx")).toEqual(["type", "client", "tx"]);
  });

  it("rejects a header missing a required column", () => {
    const err = decodeError(() => parseHeader("type,client,amount"));
    expect(err.line).toBe(1);
    expect(err.message).toBe('Line 1: Header is missing the "tx" column');
  });
});

// =============================================================================
// decodeRow
// =============================================================================

describe("decodeRow", () => {
  it("decodes a deposit", () => {
    expect(decodeRow(COLUMNS, "deposit, 1, 1, 1.0", 2)).toEqual({
      type: "deposit",
      client: 1,
      tx: 1,
      amount: "1.0",
    });
  });

  it("decodes a fully quoted row", () => {
    expect(decodeRow(COLUMNS, '"deposit","1","2","1.5"', 2)).toEqual({
      type: "deposit",
      client: 1,
      tx: 2,
      amount: "1.5",
    });
  });

  it("drops an empty quoted amount", () => {
    expect(decodeRow(COLUMNS, 'dispute,1,1,""', 2)).toEqual({ type: "dispute", client: 1, tx: 1 });
  });

  it("drops an empty amount", () => {
    expect(decodeRow(COLUMNS, "dispute, 1, 1, ", 2)).toEqual({ type: "dispute", client: 1, tx: 1 });
  });

  it("allows the trailing amount field to be omitted", () => {
    expect(decodeRow(COLUMNS, "resolve,2,5", 2)).toEqual({ type: "resolve", client: 2, tx: 5 });
  });

  it("keeps the amount text for the ledger to judge", () => {
    expect(decodeRow(COLUMNS, "withdrawal,1,2,-3", 2).amount).toBe("-3");
  });

  it("follows the header's column order", () => {
    expect(decodeRow(["client", "amount", "tx", "type"], "9,2.5,4,deposit", 2)).toEqual({
      type: "deposit",
      client: 9,
      tx: 4,
      amount: "2.5",
    });
  });

  it("accepts the largest ids", () => {
    expect(decodeRow(COLUMNS, "deposit,65535,4294967295,1", 2)).toEqual({
      type: "deposit",
      client: 65535,
      tx: 4294967295,
      amount: "1",
    });
  });

  it("rejects an unknown type", () => {
    const err = decodeError(() => decodeRow(COLUMNS, "transfer,1,1,1.0", 3));
    expect(err.line).toBe(3);
    expect(err.issues.map((i) => i.path)).toEqual(["type"]);
  });

  it("rejects a client outside u16", () => {
    const err = decodeError(() => decodeRow(COLUMNS, "deposit,65536,1,1.0", 4));
    expect(err.issues.map((i) => i.path)).toEqual(["client"]);
  });

  it("rejects a negative transaction id", () => {
    const err = decodeError(() => decodeRow(COLUMNS, "deposit,1,-1,1.0", 4));
    expect(err.issues.map((i) => i.path)).toEqual(["tx"]);
  });

  it("rejects a missing client", () => {
    const err = decodeError(() => decodeRow(COLUMNS, "deposit,,1,1.0", 5));
    expect(err.issues.map((i) => i.path)).toEqual(["client"]);
  });

  it("rejects extra fields", () => {
    const err = decodeError(() => decodeRow(COLUMNS, "deposit,1,1,1.0,oops", 6));
    expect(err.message).toBe("Line 6: Expected at most 4 fields, got 5");
  });
});

// =============================================================================
// readTransactions
// =============================================================================

describe("readTransactions", () => {
  it("yields records in file order", async () => {
    const records = await collect(
      "type,client,tx,amount\ndeposit,1,1,1.0\nwithdrawal,1,2,0.5\ndispute,1,1,\n",
    );
    expect(records).toEqual([
      { type: "deposit", client: 1, tx: 1, amount: "1.0" },
      { type: "withdrawal", client: 1, tx: 2, amount: "0.5" },
      { type: "dispute", client: 1, tx: 1 },
    ]);
  });

  it("reads a log written with quoted fields", async () => {
    const records = await collect('"type","client","tx","amount"\n"withdrawal","3","9","0.25"\n');
    expect(records).toEqual([{ type: "withdrawal", client: 3, tx: 9, amount: "0.25" }]);
  });

  it("handles CRLF line endings and blank lines", async () => {
    const records = await collect("type,client,tx,amount\r\n\r\ndeposit,1,1,2\r\n");
    expect(records).toEqual([{ type: "deposit", client: 1, tx: 1, amount: "2" }]);
  });

  it("yields nothing for an empty log", async () => {
    expect(await collect("")).toEqual([]);
    expect(await collect("type,client,tx,amount\n")).toEqual([]);
  });

  it("reports the physical line of a malformed row", async () => {
    const promise = collect("type,client,tx,amount\ndeposit,1,1,1\n\ndeposit,x,2,1\n");
    await expect(promise).rejects.toBeInstanceOf(RecordDecodeError);
    await expect(promise).rejects.toMatchObject({ line: 4 });
  });
});
