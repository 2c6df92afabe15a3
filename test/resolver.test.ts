import { describe, expect, test } from "vitest"
import { pluralize, resolveEntities, TYPE_TAGS, tokenize } from "../src/index"
import { simplifyPattern } from "../src/resolver/entity-resolver"
import type { AnyEntity, TypeTag } from "../src/index"
import { loadFixtureDatabase } from "./helpers"

const database = loadFixtureDatabase()

function variables(entities: AnyEntity[]): string[] {
  return entities.map(entity => `${entity.tag}:${entity.slug}`)
}

function resolve(text: string, types: TypeTag[], regexFallback = true): string[] {
  return variables(resolveEntities(text, new Set(types), database, { regexFallback }))
}

describe("tokenize", () => {
  test("lowercases and splits on separators", () => {
    expect(tokenize("  Iron-Plate_x:y ")).toEqual(["iron", "plate", "x", "y"])
  })

  test("drops empty tokens", () => {
    expect(tokenize("recipe: screw")).toEqual(["recipe", "screw"])
    expect(tokenize("")).toEqual([])
  })
})

describe("pluralize", () => {
  test("inflects the last word only", () => {
    expect(pluralize("Iron Plate")).toBe("Iron Plates")
    expect(pluralize("Coal Generator")).toBe("Coal Generators")
    expect(pluralize("Recipe: Battery")).toBe("Recipe: Batteries")
  })

  test("common English endings", () => {
    expect(pluralize("battery")).toBe("batteries")
    expect(pluralize("day")).toBe("days")
    expect(pluralize("glass")).toBe("glasses")
    expect(pluralize("box")).toBe("boxes")
    expect(pluralize("bench")).toBe("benches")
  })

  test("names without a trailing word stay as they are", () => {
    expect(pluralize("42")).toBe("42")
  })
})

describe("resolveEntities", () => {
  test("every entity resolves from its own display name in any case", () => {
    const all = [
      ...database.items(),
      ...database.recipes(),
      ...database.powerRecipes(),
      ...database.crafters(),
      ...database.generators(),
    ]
    for (const entity of all) {
      expect(resolveEntities(entity.name.toUpperCase(), new Set([entity.tag]), database)).toEqual([entity])
    }
  })

  test("plural display names resolve like singular ones", () => {
    expect(resolve("Iron Plates", ["item"])).toEqual(["item:iron-plate"])
    expect(resolve("batteries", ["item"])).toEqual(["item:battery"])
    expect(resolve("smelters", ["crafter"])).toEqual(["crafter:smelter"])
  })

  test("canonical variables and bare slugs", () => {
    expect(resolve("item:iron-plate", ["item"])).toEqual(["item:iron-plate"])
    expect(resolve("iron-plate", ["item"])).toEqual(["item:iron-plate"])
    expect(resolve("iron_plate", ["item"])).toEqual(["item:iron-plate"])
    expect(resolve("coal-generator", ["generator"])).toEqual(["generator:coal-generator"])
  })

  test("allowed types restrict the candidates", () => {
    expect(resolve("iron ingot", ["item"])).toEqual(["item:iron-ingot"])
    expect(resolve("iron ingot", ["recipe"])).toEqual(["recipe:iron-ingot"])
    expect(resolve("iron ingot", [...TYPE_TAGS])).toEqual(["item:iron-ingot", "recipe:iron-ingot"])
  })

  test("resources and items are distinct tags", () => {
    expect(resolve("iron ore", ["item"])).toEqual([])
    expect(resolve("iron ore", ["resource"])).toEqual(["resource:iron-ore"])
  })

  test("regular expressions match whole names in database order", () => {
    expect(resolve("iron.*", ["item", "resource"])).toEqual([
      "resource:iron-ore",
      "item:iron-ingot",
      "item:iron-plate",
      "item:iron-rod",
    ])
  })

  test("regex matching can be switched off", () => {
    expect(resolve("iron.*", ["item", "resource"], false)).toEqual([])
    expect(resolve("iron plate", ["item"], false)).toEqual(["item:iron-plate"])
  })

  test("a span that is not a valid pattern only matches exactly", () => {
    expect(resolve("iron(", ["item"])).toEqual([])
  })

  test("repeated wildcards collapse into one", () => {
    expect(simplifyPattern(".*.*.*plate")).toBe(".*plate")
    expect(simplifyPattern("iron.*")).toBe("iron.*")
    expect(resolve(".*.*.*plate", ["item"])).toEqual(["item:iron-plate"])
  })

  test("spans with too many quantifiers only match exactly", () => {
    expect(resolve(".*o.*o.*e", ["resource"])).toEqual(["resource:iron-ore", "resource:copper-ore"])
    expect(resolve(".*o.*o.*o.*e", ["resource"])).toEqual([])
  })

  test("unknown names match nothing", () => {
    expect(resolve("unobtainium", [...TYPE_TAGS])).toEqual([])
  })
})
