import { Transform } from "class-transformer";

// Surrounding whitespace never carries meaning in names and positions.
export function Trim(): PropertyDecorator {
  return Transform(({ value }: { value: unknown }) =>
    typeof value === "string" ? value.trim() : value,
  );
}
