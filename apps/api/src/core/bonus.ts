import { BonusScheme, BonusSource } from "./types";

export function calculateBonus(
  scheme: BonusScheme,
  base: number,
  plan: number,
  actual: number,
): number {
  switch (scheme.kind) {
    case "FIXED":
      return scheme.amount;
    case "PERCENT_OF_BASE":
      return base * 0.1;
    case "PLAN_PERFORMANCE":
      if (plan === 0) {
        return 0;
      }
      return 0.2 * base * (actual / plan);
    default: {
      const unknown: never = scheme;
      throw new Error(`Unhandled bonus scheme: ${JSON.stringify(unknown)}`);
    }
  }
}

export function resolveBonus(
  source: BonusSource,
  base: number,
  plan: number,
  actual: number,
): number {
  if (typeof source === "number") {
    return source;
  }
  return calculateBonus(source, base, plan, actual);
}
