import type { QueryValue } from "../../types";

// Express hands repeated query keys over as arrays and bracketed keys as objects;
// only a plain string counts, and the first one wins
export function firstQueryValue(value: QueryValue): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === "string" ? first : undefined;
}
