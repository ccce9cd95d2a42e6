import { PaymentScheme } from "./types";

export function calculatePayment(
  scheme: PaymentScheme,
  base: number,
  bonus: number,
  plan: number,
  actual: number,
): number {
  switch (scheme.kind) {
    case "FIXED_SALARY":
      return base + bonus;
    case "PERCENT_PRODUCTION":
      return actual * base + bonus;
    case "PERCENT_PLAN":
      // Without a plan only the bonus is paid.
      if (plan === 0) {
        return bonus;
      }
      return (actual / plan) * base + bonus;
    default: {
      const unknown: never = scheme.kind;
      throw new Error(`Unhandled payment scheme: ${String(unknown)}`);
    }
  }
}
