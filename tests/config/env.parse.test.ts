/**
 * Table-driven tests covering the environment parsing helpers. Every reader
 * takes an explicit source so the cases never touch `process.env`.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readEnum, readOptionalBool, readOptionalEnum } from "../../src/config/env.js";

const MODES = ["fast", "thorough"] as const;

describe("config/env helpers", () => {
  it("interprets boolean flags case-insensitively", () => {
    expect(readBool("TEST_BOOL", false, { TEST_BOOL: "YES" })).to.equal(true);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "off" })).to.equal(false);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: " 1 " })).to.equal(true);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "  " })).to.equal(undefined);
  });

  it("falls back to defaults when booleans are ambiguous or missing", () => {
    expect(readBool("TEST_BOOL", true, { TEST_BOOL: "maybe" })).to.equal(true);
    expect(readOptionalBool("TEST_BOOL", { TEST_BOOL: "maybe" })).to.equal(undefined);
    expect(readBool("TEST_BOOL", false, {})).to.equal(false);
  });

  it("returns the canonical spelling of enum values", () => {
    expect(readOptionalEnum("TEST_ENUM", MODES, { TEST_ENUM: "Thorough" })).to.equal("thorough");
    expect(readEnum("TEST_ENUM", MODES, "fast", { TEST_ENUM: " FAST " })).to.equal("fast");
  });

  it("falls back when enum values are unknown or blank", () => {
    expect(readOptionalEnum("TEST_ENUM", MODES, { TEST_ENUM: "sloppy" })).to.equal(undefined);
    expect(readEnum("TEST_ENUM", MODES, "thorough", { TEST_ENUM: "sloppy" })).to.equal("thorough");
    expect(readEnum("TEST_ENUM", MODES, "fast", { TEST_ENUM: "" })).to.equal("fast");
  });
});
