/**
 * @txledger/cli — Transaction log decoding.
 *
 * Turns CSV lines into TransactionRecord values. The first non-blank line
 * is the header; columns are found by name, so their order is free.
 * Fields are trimmed and blank lines skipped. A field may be wrapped in
 * double quotes, with "" standing for a literal quote inside it.
 *
 * A row that does not decode is a structural failure: the decoder
 * throws RecordDecodeError and the whole run is aborted.
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";
import type { ZodError } from "zod";
import type { TransactionRecord } from "@txledger/types";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID, isTransactionRecord } from "@txledger/types";

// =============================================================================
// Errors
// =============================================================================

export interface DecodeIssue {
  readonly path: string;
  readonly message: string;
}

export class RecordDecodeError extends Error {
  public readonly line: number;
  public readonly issues: readonly DecodeIssue[];

  constructor(line: number, message: string, issues: readonly DecodeIssue[] = []) {
    super(`Line ${String(line)}: ${message}`);
    this.name = "RecordDecodeError";
    this.line = line;
    this.issues = issues;
  }
}

function formatZodErrors(error: ZodError): readonly DecodeIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

// =============================================================================
// Schema
// =============================================================================

function unsignedInteger(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "Expected an unsigned integer")
    .transform(Number)
    .pipe(z.number().int().max(max));
}

export const TransactionRowSchema = z.object({
  type: z.enum(["deposit", "withdrawal", "dispute", "resolve", "chargeback"]),
  client: unsignedInteger(MAX_CLIENT_ID),
  tx: unsignedInteger(MAX_TRANSACTION_ID),
  amount: z
    .string()
    .optional()
    .transform((v) => (v === "" ? undefined : v)),
});

const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

// =============================================================================
// Decoding
// =============================================================================

/**
 * Split one line into trimmed fields, honouring double-quoted fields.
 */
export function splitFields(line: string, lineNumber: number): readonly string[] {
  const fields: string[] = [];
  let index = 0;

  for (;;) {
    while (line[index] === " " || line[index] === "\t") {
      index++;
    }

    if (line[index] === '"') {
      let value = "";
      index++;
      for (;;) {
        const close = line.indexOf('"', index);
        if (close === -1) {
          throw new RecordDecodeError(lineNumber, "Unterminated quoted field");
        }
        value += line.slice(index, close);
        index = close + 1;
        if (line[index] !== '"') {
          break;
        }
        value += '"';
        index++;
      }
      const comma = line.indexOf(",", index);
      const rest = comma === -1 ? line.slice(index) : line.slice(index, comma);
      if (rest.trim() !== "") {
        throw new RecordDecodeError(lineNumber, "Unexpected text after a quoted field");
      }
      fields.push(value.trim());
      if (comma === -1) {
        return fields;
      }
      index = comma + 1;
      continue;
    }

    const comma = line.indexOf(",", index);
    if (comma === -1) {
      fields.push(line.slice(index).trim());
      return fields;
    }
    fields.push(line.slice(index, comma).trim());
    index = comma + 1;
  }
}

/**
 * Column names of a header line, trimmed.
 */
export function parseHeader(line: string, lineNumber = 1): readonly string[] {
  const columns = splitFields(line, lineNumber);
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) {
      throw new RecordDecodeError(lineNumber, `Header is missing the "${required}" column`);
    }
  }
  return columns;
}

/**
 * Decode one data line against the header columns.
 * A row may omit trailing empty fields, but not carry extra ones.
 */
export function decodeRow(
  columns: readonly string[],
  line: string,
  lineNumber: number,
): TransactionRecord {
  const fields = splitFields(line, lineNumber);
  if (fields.length > columns.length) {
    throw new RecordDecodeError(
      lineNumber,
      `Expected at most ${String(columns.length)} fields, got ${String(fields.length)}`,
    );
  }

  const row: Record<string, string> = {};
  columns.forEach((column, index) => {
    const field = fields[index];
    if (field !== undefined) {
      row[column] = field;
    }
  });

  const result = TransactionRowSchema.safeParse(row);
  if (!result.success) {
    throw new RecordDecodeError(lineNumber, "Malformed transaction record", formatZodErrors(result.error));
  }

  const { type, client, tx, amount } = result.data;
  const record = amount === undefined ? { type, client, tx } : { type, client, tx, amount };
  if (!isTransactionRecord(record)) {
    throw new RecordDecodeError(lineNumber, "Malformed transaction record");
  }
  return record;
}

/**
 * Lazily decode a CSV transaction log, one record per data line.
 */
export async function* readTransactions(
  input: Readable,
): AsyncGenerator<TransactionRecord> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let columns: readonly string[] | undefined;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === "") {
      continue;
    }
    if (columns === undefined) {
      columns = parseHeader(line, lineNumber);
      continue;
    }
    yield decodeRow(columns, line, lineNumber);
  }
}
