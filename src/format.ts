// Pure formatting functions: no I/O.

import { Option } from "effect";
import type { HoldingMetrics, PortfolioSnapshot } from "./domain.ts";
import type { HoldingsFileError } from "./holdings-store.ts";
import type { InvalidInvestment } from "./investment.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Numbers ---

const money = (n: number) => n.toFixed(2);
const signed = (n: number) => `${n >= 0 ? "+" : ""}${n.toFixed(2)}`;
const percent = (fraction: number) => `${(fraction * 100).toFixed(1)}%`;
const signedPercent = (fraction: number) =>
  `${fraction >= 0 ? "+" : ""}${(fraction * 100).toFixed(1)}%`;
const tone = (n: number) => (n >= 0 ? GREEN : RED);

// --- Snapshot formatting ---

export function formatHolding(h: HoldingMetrics): string {
  const annualized = Option.match(h.annualizedReturn, {
    onNone: () => "n/a",
    onSome: signedPercent,
  });
  const marker = h.isFallback ? ` ${DIM}(entry price)${RESET}` : "";
  return [
    `  ${h.displayName.padEnd(24)}`,
    `${h.symbol.padEnd(8)}`,
    `${money(h.currentValue).padStart(12)}`,
    `${tone(h.pnlPct)}${signedPercent(h.pnlPct).padStart(8)}${RESET}`,
    `${DIM}${annualized}/yr${RESET}${marker}`,
  ].join(" ");
}

function formatAllocation(allocation: Readonly<Partial<Record<string, number>>>): string[] {
  return Object.entries(allocation).map(
    ([key, share]) => `  ${key.padEnd(12)} ${percent(share ?? 0).padStart(6)}`,
  );
}

export function formatSnapshot(snapshot: PortfolioSnapshot): string {
  const { totals } = snapshot;
  const lines = [
    "",
    `${BOLD}  Portfolio${RESET}`,
    `  Invested     ${money(totals.totalInvested)}`,
    `  Value        ${money(totals.totalCurrentValue)}`,
    `  P/L          ${tone(totals.totalPnlAbs)}${signed(totals.totalPnlAbs)} (${signedPercent(totals.totalPnlPct)})${RESET}`,
    "",
    `${BOLD}  Holdings${RESET}`,
    ...snapshot.holdings.map(formatHolding),
    "",
    `${BOLD}  Allocation${RESET}`,
    ...formatAllocation(snapshot.allocationByAssetClass),
    "",
    `${BOLD}  Risk${RESET}`,
    ...formatAllocation(snapshot.allocationByRiskLevel),
    `  Concentration ${snapshot.concentration.toFixed(3)} (largest ${percent(snapshot.largestPosition)}, ${snapshot.concentrationRisk})`,
    `  Win rate      ${percent(snapshot.winRate)}`,
  ];

  if (Option.isSome(snapshot.bestPerformer)) {
    const best = snapshot.bestPerformer.value;
    lines.push(`  Best          ${best.displayName} ${signedPercent(best.pnlPct)}`);
  }
  if (Option.isSome(snapshot.worstPerformer)) {
    const worst = snapshot.worstPerformer.value;
    lines.push(`  Worst         ${worst.displayName} ${signedPercent(worst.pnlPct)}`);
  }

  if (snapshot.insights.length > 0) {
    lines.push("", ...snapshot.insights.map((text) => `  ${DIM}• ${text}${RESET}`));
  }
  lines.push("");

  return lines.join("\n");
}

// --- Error formatting ---

export function formatError(error: InvalidInvestment | HoldingsFileError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: InvalidInvestment | HoldingsFileError): ClassifiedError {
  switch (error._tag) {
    case "InvalidInvestment":
      return {
        title: `Invalid investment (${error.field})`,
        hint: error.message,
      };
    case "HoldingsFileError":
      return {
        title: "Could not read holdings",
        hint: `${error.path}: ${error.message}`,
      };
  }
}
