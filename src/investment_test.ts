import { describe, expect, it } from "vitest";
import { Either } from "effect";
import { editInvestment, makeInvestment, type InvestmentInput } from "./investment.ts";

const bitcoin: InvestmentInput = {
  id: "btc-1",
  assetClass: "crypto",
  displayName: "  Bitcoin ",
  entryDate: new Date("2024-01-10T00:00:00Z"),
  entryPrice: 20000,
  amountInvested: 2000,
};

describe("makeInvestment", () => {
  it("derives quantity from amount and entry price", () => {
    const result = makeInvestment(bitcoin);
    expect(Either.isRight(result)).toBe(true);
    if (Either.isRight(result)) {
      expect(result.right.quantity).toBe(0.1);
      expect(result.right.quantity * result.right.entryPrice).toBeCloseTo(2000, 9);
    }
  });

  it("trims the name and defaults the risk level", () => {
    const inv = Either.getOrThrow(makeInvestment(bitcoin));
    expect(inv.displayName).toBe("Bitcoin");
    expect(inv.riskLevel).toBe("medium");
    expect(inv.id).toBe("btc-1");
  });

  it("generates an id when none is given", () => {
    const { id: _id, ...withoutId } = bitcoin;
    const a = Either.getOrThrow(makeInvestment(withoutId));
    const b = Either.getOrThrow(makeInvestment(withoutId));
    expect(a.id.length).toBeGreaterThan(0);
    expect(a.id).not.toBe(b.id);
  });

  it("keeps a non-blank resolved symbol, drops a blank one", () => {
    const kept = Either.getOrThrow(makeInvestment({ ...bitcoin, resolvedSymbol: " btc " }));
    expect(kept.resolvedSymbol).toBe("btc");
    const dropped = Either.getOrThrow(makeInvestment({ ...bitcoin, resolvedSymbol: "  " }));
    expect("resolvedSymbol" in dropped).toBe(false);
  });

  it.each([
    ["displayName", { displayName: "   " }],
    ["entryPrice", { entryPrice: 0 }],
    ["entryPrice", { entryPrice: Number.NaN }],
    ["amountInvested", { amountInvested: -5 }],
    ["entryDate", { entryDate: new Date("not a date") }],
  ] as const)("rejects a bad %s", (field, patch) => {
    const result = makeInvestment({ ...bitcoin, ...patch });
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("InvalidInvestment");
      expect(result.left.field).toBe(field);
    }
  });
});

describe("editInvestment", () => {
  it("recomputes quantity and keeps the id", () => {
    const inv = Either.getOrThrow(makeInvestment(bitcoin));
    const edited = Either.getOrThrow(editInvestment(inv, { amountInvested: 5000 }));
    expect(edited.id).toBe("btc-1");
    expect(edited.quantity).toBe(0.25);
    expect(edited.entryPrice).toBe(20000);
  });

  it("rejects an edit that breaks validation", () => {
    const inv = Either.getOrThrow(makeInvestment(bitcoin));
    const result = editInvestment(inv, { entryPrice: -1 });
    expect(Either.isLeft(result)).toBe(true);
  });
});
