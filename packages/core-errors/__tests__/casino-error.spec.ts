import { describe, expect, it } from "vitest";
import { CasinoError, CasinoErrorCode, casinoErrorPayload, isCasinoError, ROLLED_BACK_MESSAGE, toCasinoError } from "../src";

describe("CasinoError", () => {
  it("renders the wire payload", () => {
    const err = new CasinoError(CasinoErrorCode.INSUFFICIENT_FUNDS, "Insufficient balance", { balance: "50" });
    expect(err.toPayload()).toEqual({
      error: "INSUFFICIENT_FUNDS",
      message: "Insufficient balance",
      details: { balance: "50" },
    });
    expect(casinoErrorPayload(CasinoErrorCode.BUSY, "try later")).toEqual({
      error: "BUSY",
      message: "try later",
      details: undefined,
    });
  });

  it("marks only BUSY as retryable", () => {
    expect(new CasinoError(CasinoErrorCode.BUSY, "locked").retryable).toBe(true);
    expect(new CasinoError(CasinoErrorCode.INTERNAL, "boom").retryable).toBe(false);
  });

  it("matches by code", () => {
    const err = new CasinoError(CasinoErrorCode.NOT_FOUND, "missing");
    expect(isCasinoError(err)).toBe(true);
    expect(isCasinoError(err, CasinoErrorCode.NOT_FOUND)).toBe(true);
    expect(isCasinoError(err, CasinoErrorCode.BUSY)).toBe(false);
    expect(isCasinoError(new Error("plain"))).toBe(false);
  });

  it("wraps foreign errors as INTERNAL and passes domain errors through", () => {
    const wrapped = toCasinoError(new Error("connection reset"));
    expect(wrapped.code).toBe(CasinoErrorCode.INTERNAL);
    expect(wrapped.message).toBe("Operation failed");
    expect(wrapped.details).toEqual({ cause: "connection reset" });
    expect(toCasinoError("weird").details).toEqual({ cause: "weird" });

    expect(toCasinoError(new Error("disk full"), ROLLED_BACK_MESSAGE).message).toBe("Operation failed and was rolled back");

    const domain = new CasinoError(CasinoErrorCode.INVALID_STATE, "already approved");
    expect(toCasinoError(domain)).toBe(domain);
  });
});
