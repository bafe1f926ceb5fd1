import { describe, expect, it } from "vitest";
import { Error as PlatformError, FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { decodeHoldings, HoldingsStore, HoldingsFileLive } from "./holdings-store.ts";

const document = JSON.stringify({
  investments: [
    {
      id: "apple-1",
      assetClass: "stock",
      name: "Apple",
      entryDate: "2024-03-01",
      entryPrice: 180,
      amountInvested: 1800,
      riskLevel: "low",
    },
    {
      assetClass: "crypto",
      name: "Acme Coin (ACM)",
      symbol: "ACM",
      entryDate: "2024-01-10T00:00:00Z",
      entryPrice: 0.5,
      amountInvested: 200,
    },
  ],
});

const loadFrom = (readFileString: FileSystem.FileSystem["readFileString"]) =>
  Effect.gen(function* () {
    const store = yield* HoldingsStore;
    return yield* store.load;
  }).pipe(
    Effect.provide(HoldingsFileLive("holdings.json")),
    Effect.provide(FileSystem.layerNoop({ readFileString })),
  );

describe("decodeHoldings", () => {
  it("builds investments in file order", async () => {
    const investments = await Effect.runPromise(decodeHoldings(document, "holdings.json"));
    expect(investments).toHaveLength(2);

    const [apple, coin] = investments;
    expect(apple).toMatchObject({
      id: "apple-1",
      assetClass: "stock",
      displayName: "Apple",
      entryPrice: 180,
      amountInvested: 1800,
      quantity: 10,
      riskLevel: "low",
    });
    expect(apple.entryDate.toISOString()).toBe("2024-03-01T00:00:00.000Z");
    expect(coin.resolvedSymbol).toBe("ACM");
    expect(coin.riskLevel).toBe("medium");
    expect(coin.quantity).toBe(400);
  });

  it("reports malformed JSON as a file error", async () => {
    const error = await Effect.runPromise(Effect.flip(decodeHoldings("{ not json", "h.json")));
    expect(error).toMatchObject({ _tag: "HoldingsFileError", path: "h.json" });
  });

  it("reports an unknown asset class as a file error", async () => {
    const text = JSON.stringify({
      investments: [
        { assetClass: "art", name: "Painting", entryDate: "2024-01-01", entryPrice: 1, amountInvested: 1 },
      ],
    });
    const error = await Effect.runPromise(Effect.flip(decodeHoldings(text, "h.json")));
    expect(error._tag).toBe("HoldingsFileError");
  });

  it("rejects a record that breaks the investment rules", async () => {
    const text = JSON.stringify({
      investments: [
        { assetClass: "stock", name: "Apple", entryDate: "2024-01-01", entryPrice: 0, amountInvested: 100 },
      ],
    });
    const error = await Effect.runPromise(Effect.flip(decodeHoldings(text, "h.json")));
    expect(error).toMatchObject({ _tag: "InvalidInvestment", field: "entryPrice" });
  });
});

describe("HoldingsFileLive", () => {
  it("reads the configured path", async () => {
    const paths: string[] = [];
    const investments = await Effect.runPromise(
      loadFrom((path) =>
        Effect.sync(() => {
          paths.push(path);
          return document;
        }),
      ),
    );
    expect(paths).toEqual(["holdings.json"]);
    expect(investments.map((inv) => inv.displayName)).toEqual(["Apple", "Acme Coin (ACM)"]);
  });

  it("reports an unreadable file", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        loadFrom((path) =>
          Effect.fail(
            new PlatformError.SystemError({
              reason: "NotFound",
              module: "FileSystem",
              method: "readFileString",
              pathOrDescriptor: path,
            }),
          ),
        ),
      ),
    );
    expect(error).toMatchObject({ _tag: "HoldingsFileError", path: "holdings.json" });
  });
});
