import { expect, test } from "vitest"
import { addElement, createCategories, isStrict } from "../src/query/category"
import { canonicalVariable, compileQueryOrThrow, formatOptimizationQuery, strictFlags } from "../src/index"
import type { QueryVariable } from "../src/index"
import { loadFixtureDatabase } from "./helpers"

const screw: QueryVariable = {
  kind: "entity",
  tag: "item",
  slug: "screw",
  id: canonicalVariable("item", "screw"),
}

test("an empty strict category restricts nothing", () => {
  const categories = createCategories<string>([["recipe", true]])

  expect(isStrict(categories, "recipe")).toBe(false)
  expect(isStrict(categories, "crafter")).toBe(false)
})

test("strictness escalates and never drops", () => {
  const categories = createCategories<string>([])

  addElement(categories, screw, "first", true)
  addElement(categories, screw, "second", false)

  expect(isStrict(categories, "item")).toBe(true)
  expect(categories.get("item")?.elements.get("item:screw")).toBe("second")
})

test("literal includes form their own category", () => {
  const query = compileQueryOrThrow("produce screw using only space", { database: loadFixtureDatabase() })
  if (query.kind !== "optimization") throw new Error("expected an optimization query")

  expect(query.includes.get("space")?.strict).toBe(true)
  expect(strictFlags(query).recipes).toBe(false)
  expect(formatOptimizationQuery(query)).toBe(
    "produce item:screw from ? unweighted-resources using only space",
  )
})
