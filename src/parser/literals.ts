import type { LiteralName } from "../types"

/** Keyword phrases (lowercased, words joined by "-") → synthetic variable name */
const LITERAL_ALIASES: Record<string, LiteralName> = {
  power: "power",
  tickets: "tickets",
  space: "space",
  resources: "unweighted-resources",
  "unweighted-resources": "unweighted-resources",
  "weighted-resources": "weighted-resources",
  "alternate-recipes": "alternate-recipes",
  byproducts: "byproducts",
}

/** Resolve the source text of a literal subject, or null if it names no literal. */
export function resolveLiteral(source: string): LiteralName | null {
  const key = source
    .trim()
    .toLowerCase()
    .split(/[\s-]+/)
    .join("-")
  return LITERAL_ALIASES[key] ?? null
}
