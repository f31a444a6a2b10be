/**
 * Tests for the account report encoder.
 */

import { describe, it, expect } from "vitest";
import {
  ACCOUNT_CSV_HEADER,
  encodeAccountRow,
  encodeAccounts,
} from "../src/csv-encoder.js";

describe("encodeAccountRow", () => {
  it("joins the fields in report order", () => {
    expect(
      encodeAccountRow({ client: 3, available: "1.5000", held: "2.0000", total: "3.5000", locked: true }),
    ).toBe("3,1.5000,2.0000,3.5000,true");
  });
});

describe("encodeAccounts", () => {
  it("writes only the header for no accounts", () => {
    expect(encodeAccounts([])).toBe(`${ACCOUNT_CSV_HEADER}\n`);
  });

  it("writes one line per account", () => {
    expect(
      encodeAccounts([
        { client: 1, available: "1.0000", held: "0.0000", total: "1.0000", locked: false },
        { client: 2, available: "0.0000", held: "0.0000", total: "0.0000", locked: true },
      ]),
    ).toBe(
      "client,available,held,total,locked\n" +
        "1,1.0000,0.0000,1.0000,false\n" +
        "2,0.0000,0.0000,0.0000,true\n",
    );
  });
});
