// Portfolio analytics: pure arithmetic over investments and their quotes.

import { Option } from "effect";
import {
  DAY_MS,
  fallbackQuote,
  type AssetClass,
  type ConcentrationRisk,
  type HoldingMetrics,
  type Investment,
  type PortfolioSnapshot,
  type PortfolioTotals,
  type PriceQuote,
  type RiskLevel,
} from "./domain.ts";

const DAYS_PER_YEAR = 365;

/** Largest-position thresholds for the concentration label. */
const HIGH_CONCENTRATION = 0.25;
const MEDIUM_CONCENTRATION = 0.15;

/** Below this many holdings the report suggests diversifying. */
const MIN_DIVERSIFIED_HOLDINGS = 5;

const ratio = (part: number, whole: number): number => (whole === 0 ? 0 : part / whole);

export function holdingPeriodDays(entryDate: Date, now: number): number {
  return Math.max(0, Math.floor((now - entryDate.getTime()) / DAY_MS));
}

/** `(1 + pnlPct)^(365 / max(days, 1)) - 1`, or None when the base is negative. */
export function annualizedReturn(pnlPct: number, days: number): Option.Option<number> {
  const base = 1 + pnlPct;
  if (base < 0) return Option.none();
  return Option.some(Math.pow(base, DAYS_PER_YEAR / Math.max(days, 1)) - 1);
}

export function concentrationRisk(largestPosition: number): ConcentrationRisk {
  if (largestPosition > HIGH_CONCENTRATION) return "high";
  if (largestPosition > MEDIUM_CONCENTRATION) return "medium";
  return "low";
}

function holdingMetrics(
  investment: Investment,
  quote: PriceQuote,
  now: number,
): Omit<HoldingMetrics, "weight"> {
  const currentValue = investment.quantity * quote.price;
  const pnlAbs = currentValue - investment.amountInvested;
  const pnlPct = ratio(pnlAbs, investment.amountInvested);
  const days = holdingPeriodDays(investment.entryDate, now);
  return {
    investmentId: investment.id,
    displayName: investment.displayName,
    assetClass: investment.assetClass,
    riskLevel: investment.riskLevel,
    symbol: quote.symbol,
    quantity: investment.quantity,
    amountInvested: investment.amountInvested,
    price: quote.price,
    source: quote.source,
    isFallback: quote.isFallback,
    currentValue,
    pnlAbs,
    pnlPct,
    holdingPeriodDays: days,
    annualizedReturn: annualizedReturn(pnlPct, days),
  };
}

// Higher pnlPct wins (or lower, for the worst); ties go to the larger
// position, then to the earlier holding.
function pick(
  holdings: ReadonlyArray<HoldingMetrics>,
  better: (a: number, b: number) => boolean,
): Option.Option<HoldingMetrics> {
  let chosen: HoldingMetrics | undefined;
  for (const h of holdings) {
    if (
      chosen === undefined ||
      better(h.pnlPct, chosen.pnlPct) ||
      (h.pnlPct === chosen.pnlPct && h.amountInvested > chosen.amountInvested)
    ) {
      chosen = h;
    }
  }
  return Option.fromNullable(chosen);
}

function allocate<K extends string>(
  holdings: ReadonlyArray<HoldingMetrics>,
  keyOf: (h: HoldingMetrics) => K,
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const h of holdings) {
    const key = keyOf(h);
    out[key] = (out[key] ?? 0) + h.weight;
  }
  return out;
}

function insightsFor(
  holdings: ReadonlyArray<HoldingMetrics>,
  risk: ConcentrationRisk,
  fallbackCount: number,
): ReadonlyArray<string> {
  if (holdings.length === 0) return ["No holdings to analyze."];

  const insights: string[] = [];
  if (holdings.length < MIN_DIVERSIFIED_HOLDINGS) {
    insights.push(
      `Only ${holdings.length} holding(s): consider diversifying across more positions.`,
    );
  }
  if (risk === "high") {
    insights.push("A single position is more than 25% of the portfolio.");
  }
  if (fallbackCount > 0) {
    insights.push(
      `${fallbackCount} holding(s) priced at entry price: figures are less certain.`,
    );
  }
  return insights;
}

/** Missing quotes are treated as fallback quotes at the entry price. */
export function computeSnapshot(
  investments: ReadonlyArray<Investment>,
  quotes: ReadonlyMap<string, PriceQuote>,
  now: number,
): PortfolioSnapshot {
  const unweighted = investments.map((inv) =>
    holdingMetrics(
      inv,
      quotes.get(inv.id) ?? fallbackQuote(inv.displayName, inv.assetClass, inv.entryPrice, now),
      now,
    ),
  );

  const totalInvested = unweighted.reduce((sum, h) => sum + h.amountInvested, 0);
  const totalCurrentValue = unweighted.reduce((sum, h) => sum + h.currentValue, 0);
  const totalPnlAbs = totalCurrentValue - totalInvested;
  const totals: PortfolioTotals = {
    totalInvested,
    totalCurrentValue,
    totalPnlAbs,
    totalPnlPct: ratio(totalPnlAbs, totalInvested),
  };

  const holdings: ReadonlyArray<HoldingMetrics> = unweighted.map((h) => ({
    ...h,
    weight: ratio(h.currentValue, totalCurrentValue),
  }));

  const largestPosition = holdings.reduce((max, h) => Math.max(max, h.weight), 0);
  const risk = concentrationRisk(largestPosition);
  const fallbackHoldings = holdings.filter((h) => h.isFallback).map((h) => h.investmentId);

  return {
    holdings,
    totals,
    allocationByAssetClass: allocate<AssetClass>(holdings, (h) => h.assetClass),
    allocationByRiskLevel: allocate<RiskLevel>(holdings, (h) => h.riskLevel),
    concentration: holdings.reduce((sum, h) => sum + h.weight * h.weight, 0),
    largestPosition,
    concentrationRisk: risk,
    winRate: ratio(holdings.filter((h) => h.pnlAbs > 0).length, holdings.length),
    bestPerformer: pick(holdings, (a, b) => a > b),
    worstPerformer: pick(holdings, (a, b) => a < b),
    fallbackHoldings,
    insights: insightsFor(holdings, risk, fallbackHoldings.length),
    generatedAt: now,
  };
}
