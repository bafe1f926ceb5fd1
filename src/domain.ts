// Pure domain types and constants: no framework dependency, no I/O.

import type { Option } from "effect";

export const ASSET_CLASSES = [
  "stock",
  "crypto",
  "bond",
  "real_estate",
  "other",
] as const;

export type AssetClass = (typeof ASSET_CLASSES)[number];

export const RISK_LEVELS = ["low", "medium", "high"] as const;

export type RiskLevel = (typeof RISK_LEVELS)[number];

export const DAY_MS = 24 * 60 * 60 * 1000;

/** A tracked holding. Only `makeInvestment` / `editInvestment` build these,
 *  so `quantity * entryPrice === amountInvested` (to float tolerance). */
export interface Investment {
  readonly id: string;
  readonly assetClass: AssetClass;
  readonly displayName: string;
  readonly resolvedSymbol?: string;
  readonly entryDate: Date;
  readonly entryPrice: number;
  readonly amountInvested: number;
  readonly quantity: number;
  readonly riskLevel: RiskLevel;
}

/** Where a quote came from. "none" marks a fallback quote. */
export type QuoteSource = "yahoo" | "alphavantage" | "coingecko" | "test" | "none";

export interface PriceQuote {
  readonly symbol: string;
  readonly assetClass: AssetClass;
  readonly price: number;
  readonly asOf: number; // epoch ms
  readonly source: QuoteSource;
  readonly isFallback: boolean;
}

/** Stand-in quote at a known price when nothing live answered. */
export const fallbackQuote = (
  symbol: string,
  assetClass: AssetClass,
  price: number,
  asOf: number,
): PriceQuote => ({
  symbol,
  assetClass,
  price,
  asOf,
  source: "none",
  isFallback: true,
});

/** A single price observation as a provider reports it, before the fetcher
 *  stamps asset class and source onto it. */
export interface PricePoint {
  readonly symbol: string;
  readonly price: number;
  readonly timestamp: number; // epoch ms
}

// --- Analytics output ---

export interface HoldingMetrics {
  readonly investmentId: string;
  readonly displayName: string;
  readonly assetClass: AssetClass;
  readonly riskLevel: RiskLevel;
  readonly symbol: string;
  readonly quantity: number;
  readonly amountInvested: number;
  readonly price: number;
  readonly source: QuoteSource;
  readonly isFallback: boolean;
  readonly currentValue: number;
  readonly pnlAbs: number;
  readonly pnlPct: number;
  readonly holdingPeriodDays: number;
  /** None when the position lost more than everything (1 + pnlPct < 0). */
  readonly annualizedReturn: Option.Option<number>;
  /** Share of the portfolio's total current value. */
  readonly weight: number;
}

export type ConcentrationRisk = "low" | "medium" | "high";

export interface PortfolioTotals {
  readonly totalInvested: number;
  readonly totalCurrentValue: number;
  readonly totalPnlAbs: number;
  readonly totalPnlPct: number;
}

export interface PortfolioSnapshot {
  readonly holdings: ReadonlyArray<HoldingMetrics>;
  readonly totals: PortfolioTotals;
  readonly allocationByAssetClass: Readonly<Partial<Record<AssetClass, number>>>;
  readonly allocationByRiskLevel: Readonly<Partial<Record<RiskLevel, number>>>;
  readonly concentration: number;
  readonly largestPosition: number;
  readonly concentrationRisk: ConcentrationRisk;
  readonly winRate: number;
  readonly bestPerformer: Option.Option<HoldingMetrics>;
  readonly worstPerformer: Option.Option<HoldingMetrics>;
  readonly fallbackHoldings: ReadonlyArray<string>;
  readonly insights: ReadonlyArray<string>;
  readonly generatedAt: number; // epoch ms
}
