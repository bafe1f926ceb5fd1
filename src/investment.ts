// Investment construction and editing: the only way records come to exist.

import { randomUUID } from "node:crypto";
import { Data, Either } from "effect";
import type { AssetClass, Investment, RiskLevel } from "./domain.ts";

export class InvalidInvestment extends Data.TaggedError("InvalidInvestment")<{
  readonly field: string;
  readonly message: string;
}> {}

export interface InvestmentInput {
  readonly id?: string;
  readonly assetClass: AssetClass;
  readonly displayName: string;
  readonly resolvedSymbol?: string;
  readonly entryDate: Date;
  readonly entryPrice: number;
  readonly amountInvested: number;
  readonly riskLevel?: RiskLevel;
}

export type InvestmentEdit = Partial<Omit<InvestmentInput, "id">>;

const invalid = (field: string, message: string) =>
  Either.left(new InvalidInvestment({ field, message }));

export function makeInvestment(
  input: InvestmentInput,
): Either.Either<Investment, InvalidInvestment> {
  const displayName = input.displayName.trim();
  if (displayName.length === 0) {
    return invalid("displayName", "Name cannot be empty");
  }
  if (!Number.isFinite(input.entryPrice) || input.entryPrice <= 0) {
    return invalid("entryPrice", `Entry price must be positive, got ${input.entryPrice}`);
  }
  if (!Number.isFinite(input.amountInvested) || input.amountInvested <= 0) {
    return invalid(
      "amountInvested",
      `Amount invested must be positive, got ${input.amountInvested}`,
    );
  }
  if (Number.isNaN(input.entryDate.getTime())) {
    return invalid("entryDate", "Entry date is not a valid date");
  }

  const resolvedSymbol = input.resolvedSymbol?.trim();

  return Either.right({
    id: input.id ?? randomUUID(),
    assetClass: input.assetClass,
    displayName,
    ...(resolvedSymbol ? { resolvedSymbol } : {}),
    entryDate: input.entryDate,
    entryPrice: input.entryPrice,
    amountInvested: input.amountInvested,
    quantity: input.amountInvested / input.entryPrice,
    riskLevel: input.riskLevel ?? "medium",
  });
}

/** Replace a record wholesale. Quantity is recomputed from the merged
 *  entry price and amount; the id is kept. */
export function editInvestment(
  investment: Investment,
  edit: InvestmentEdit,
): Either.Either<Investment, InvalidInvestment> {
  const { quantity: _quantity, ...current } = investment;
  return makeInvestment({ ...current, ...edit, id: investment.id });
}
