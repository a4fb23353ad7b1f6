import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { formatLocalDate, generateRecordId, normalizeCoin, RECORD_ID_LENGTH } from "./recordUtils";

describe("record utilities", () => {
  it("generates short lowercase hex identifiers", () => {
    const id = generateRecordId();
    assert.equal(id.length, RECORD_ID_LENGTH);
    assert.match(id, /^[0-9a-f]{8}$/);
  });

  it("formats dates using the local calendar", () => {
    assert.equal(formatLocalDate(new Date(2024, 0, 5, 23, 59)), "2024-01-05");
    assert.equal(formatLocalDate(new Date(2023, 11, 31, 0, 0)), "2023-12-31");
  });

  it("upper-cases coin symbols", () => {
    assert.equal(normalizeCoin("eth"), "ETH");
    assert.equal(normalizeCoin("Usdt"), "USDT");
  });
});
