/**
 * Tests for coded error narrowing.
 */

import { describe, it, expect } from "vitest";
import { DelegationError, StoreError, hasErrorCode } from "../src/errors.js";

describe("hasErrorCode", () => {
  it("matches errors carrying the code", () => {
    expect(hasErrorCode(new DelegationError("REVOCATION_FAILED", "timeout", "t-1"), "REVOCATION_FAILED")).toBe(true);
    expect(hasErrorCode(new StoreError("NAME_CONFLICT", "taken"), "NAME_CONFLICT")).toBe(true);
  });

  it("rejects other codes and uncoded values", () => {
    expect(hasErrorCode(new DelegationError("ALREADY_REVOKED", "gone"), "REVOCATION_FAILED")).toBe(false);
    expect(hasErrorCode(new Error("plain"), "REVOCATION_FAILED")).toBe(false);
    expect(hasErrorCode({ code: "REVOCATION_FAILED" }, "REVOCATION_FAILED")).toBe(false);
    expect(hasErrorCode(undefined, "REVOCATION_FAILED")).toBe(false);
  });
});
