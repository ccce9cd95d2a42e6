export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.trunc(parsed);
}

export function parseCorsRules(raw = process.env.CORS_ORIGIN): string[] {
  return (raw || "http://localhost:3000")
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isAllowedOrigin(origin: string, rules: string[]): boolean {
  return rules.some((rule) => {
    if (rule === "*") {
      return true;
    }

    if (!rule.includes("*")) {
      return rule === origin;
    }

    const regex = new RegExp(`^${escapeRegex(rule).replace(/\\\*/g, ".*")}$`);
    return regex.test(origin);
  });
}
