import { describe, expect, it } from "vitest";
import { bankDeclineReason, classifySale, type SaleSignals } from "../src/domain/sale-classification.js";

const approved: SaleSignals = {
  httpStatus: 200,
  responseCode: "GTW_1000",
  responseCodeType: "SUCCESS",
  responseMessage: "Transaction approved",
  bankResponseCode: "BNK_2000",
};

describe("classifySale", () => {
  it("approves only when no decline signal is present", () => {
    expect(classifySale(approved)).toEqual({ approved: true, signals: [], declineReason: null });
  });

  it("declines when any single signal flips", () => {
    const cases: Array<[Partial<SaleSignals>, string]> = [
      [{ httpStatus: 402 }, "http_status"],
      [{ responseCodeType: "SOFT_DECLINE" }, "response_code_type"],
      [{ responseMessage: "Do not honor" }, "decline_message"],
      [{ bankResponseCode: "BNK_3001" }, "bank_prefixed_code"],
    ];
    for (const [override, signal] of cases) {
      const result = classifySale({ ...approved, ...override });
      expect(result.approved).toBe(false);
      expect(result.signals).toEqual([signal]);
    }
  });

  it("flags a non-approval response code", () => {
    const result = classifySale({ ...approved, responseCode: "GTW_2001" });
    expect(result.approved).toBe(false);
    expect(result.signals).toEqual(["response_code"]);
  });

  it("flags a bank-prefixed response code on the gateway code itself", () => {
    const result = classifySale({ ...approved, responseCode: "BNK_3005" });
    expect(result.signals).toEqual(["response_code", "bank_prefixed_code"]);
  });

  it("treats a missing response code as declined", () => {
    expect(classifySale({ ...approved, responseCode: null }).signals).toEqual(["response_code"]);
  });

  it("maps known bank decline codes to a reason", () => {
    const result = classifySale({ ...approved, bankResponseCode: "51" });
    expect(result).toEqual({
      approved: false,
      signals: ["bank_decline_code"],
      declineReason: "Insufficient funds",
    });
  });
});

describe("bankDeclineReason", () => {
  it("returns null for unknown or absent codes", () => {
    expect(bankDeclineReason(null)).toBeNull();
    expect(bankDeclineReason("99")).toBeNull();
    expect(bankDeclineReason(" 05 ")).toBe("Card declined by issuing bank");
  });
});
