import { describe, expect, it } from "vitest";
import { PurchaseClientError, isPurchaseClientError, toError } from "../errors";

describe("toError", () => {
  it("returns errors unchanged", () => {
    const error = new Error("boom");
    expect(toError(error)).toBe(error);
  });

  it("wraps strings and message-bearing objects", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError({ message: "bridge said no", code: "UNAVAILABLE" }).message).toBe("bridge said no");
  });

  it("stringifies anything else", () => {
    expect(toError(42).message).toBe("42");
  });
});

describe("isPurchaseClientError", () => {
  it("narrows client errors only", () => {
    const error = new PurchaseClientError("INVALID_QUANTITY", "bad quantity");

    expect(isPurchaseClientError(error)).toBe(true);
    expect(error.name).toBe("PurchaseClientError");
    expect(isPurchaseClientError(new Error("bad quantity"))).toBe(false);
  });
});
