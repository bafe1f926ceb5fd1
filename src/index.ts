export * from "./domain.ts";
export * from "./investment.ts";
export * from "./symbol-resolver.ts";
export * from "./price-api.ts";
export * from "./config.ts";
export * from "./rate-limiter.ts";
export * from "./price-cache.ts";
export * from "./provider-chain.ts";
export * from "./price-fetcher.ts";
export * from "./analytics.ts";
export * from "./portfolio.ts";
export * from "./holdings-store.ts";
export * from "./format.ts";
export { sampleProvider } from "./providers/mock.ts";
