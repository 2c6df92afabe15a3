import type { Quantity } from "./internal-types"

/** Parse a clause value token (`?`, an integer, `any` or `_`) into a quantity. */
export function parseQuantity(raw: string): Quantity {
  const value = raw.trim().toLowerCase()
  if (value === "?") return { type: "objective" }
  if (/^\d+$/.test(value)) return { type: "amount", amount: Number.parseInt(value, 10) }
  return { type: "any" }
}
