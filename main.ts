import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import { Console, Duration, Effect, Layer } from "effect";
import { formatError, formatSnapshot } from "./src/format.ts";
import { HoldingsFileLive, HoldingsStore, type HoldingsFileError } from "./src/holdings-store.ts";
import type { InvalidInvestment } from "./src/investment.ts";
import { analyzePortfolio } from "./src/portfolio.ts";
import { PriceCacheLive } from "./src/price-cache.ts";
import { PriceFetcherLive } from "./src/price-fetcher.ts";
import { ProviderChainsLive } from "./src/provider-chain.ts";
import { RateLimiterLive } from "./src/rate-limiter.ts";

// --- CLI ---

const file = Options.file("file").pipe(
  Options.withAlias("f"),
  Options.withDescription("Holdings JSON file"),
  Options.withDefault("holdings.json"),
);

const refresh = Options.boolean("refresh").pipe(
  Options.withDescription("Ignore cached prices"),
);

const deadline = Options.integer("deadline").pipe(
  Options.withDescription("Seconds to wait for each holding's price"),
  Options.withDefault(30),
);

const command = Command.make("holdings-pulse", { file, refresh, deadline }).pipe(
  Command.withHandler(({ file, refresh, deadline }) =>
    Effect.gen(function* () {
      const store = yield* HoldingsStore;
      const investments = yield* store.load;
      const snapshot = yield* analyzePortfolio(investments, {
        refresh,
        deadline: Duration.seconds(deadline),
      });
      yield* Console.log(formatSnapshot(snapshot));
    }).pipe(Effect.provide(HoldingsFileLive(file)))
  ),
);

// --- Layers ---
// Set PRICE_PROVIDERS to "live" (default) or "test".

const PriceFetcherMain = PriceFetcherLive.pipe(
  Layer.provide(Layer.mergeAll(ProviderChainsLive, PriceCacheLive, RateLimiterLive)),
  Layer.provide(FetchHttpClient.layer),
);

// --- Run ---

const cli = Command.run(command, {
  name: "holdings-pulse",
  version: "0.1.0",
});

const logError = (e: InvalidInvestment | HoldingsFileError) =>
  Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    InvalidInvestment: logError,
    HoldingsFileError: logError,
  }),
  Effect.provide(PriceFetcherMain),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
