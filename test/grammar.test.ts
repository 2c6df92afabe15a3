import { expect, test } from "vitest"
import { formatCompileError, parseWithOhm } from "../src/index"
import type { OptimizationTree, ParseTree } from "../src/index"

function parse(source: string): ParseTree {
  const result = parseWithOhm(source)
  if (!result.ok) throw new Error(`unexpected parse failure: ${result.error.message}`)
  return result.value
}

function parseOptimization(source: string): OptimizationTree {
  const tree = parse(source)
  if (tree.kind !== "optimization") throw new Error(`expected an optimization query, got ${tree.kind}`)
  return tree
}

test("parses every clause kind with offsets", () => {
  const tree = parse("produce 60 iron plates from iron ore using only smelters without alternate recipes")

  expect(tree).toEqual({
    kind: "optimization",
    outputs: [
      {
        kind: "output",
        strict: false,
        value: { type: "amount", amount: 60 },
        subject: { type: "entity", text: "iron plates", offset: 11 },
        offset: 8,
      },
    ],
    inputs: [
      {
        kind: "input",
        strict: false,
        value: { type: "any" },
        subject: { type: "entity", text: "iron ore", offset: 28 },
        offset: 28,
      },
    ],
    includes: [
      {
        kind: "include",
        strict: true,
        value: { type: "any" },
        subject: { type: "entity", text: "smelters", offset: 48 },
        offset: 43,
      },
    ],
    excludes: [
      {
        kind: "exclude",
        strict: false,
        value: { type: "any" },
        subject: { type: "literal", name: "alternate-recipes", text: "alternate recipes" },
        offset: 65,
      },
    ],
  })
})

test("keywords are case-insensitive", () => {
  const tree = parseOptimization("MAKE ? Screw FROM Iron Ore")

  expect(tree.outputs[0]?.value).toEqual({ type: "objective" })
  expect(tree.outputs[0]?.subject).toEqual({ type: "entity", text: "Screw", offset: 7 })
  expect(tree.inputs[0]?.subject).toEqual({ type: "entity", text: "Iron Ore", offset: 18 })
})

test("all output keywords start an optimization query", () => {
  for (const keyword of ["produce", "make", "create", "output"]) {
    expect(parse(`${keyword} screw`).kind).toBe("optimization")
  }
})

test("any and underscore are wildcards, lists join with and or +", () => {
  const tree = parseOptimization("produce any screw + _ wire and iron rod")

  expect(tree.outputs.map(c => c.value)).toEqual([{ type: "any" }, { type: "any" }, { type: "any" }])
  expect(tree.outputs.map(c => c.subject)).toEqual([
    { type: "entity", text: "screw", offset: 12 },
    { type: "entity", text: "wire", offset: 22 },
    { type: "entity", text: "iron rod", offset: 31 },
  ])
})

test("only marks a clause strict", () => {
  const tree = parseOptimization("produce only 5 screw and 2 iron plate")

  expect(tree.outputs.map(c => c.strict)).toEqual([true, false])
  expect(tree.outputs.map(c => c.value)).toEqual([
    { type: "amount", amount: 5 },
    { type: "amount", amount: 2 },
  ])
})

test("literal subjects", () => {
  const tree = parseOptimization("produce power from weighted resources and space using space")

  expect(tree.outputs[0]?.subject).toEqual({ type: "literal", name: "power", text: "power" })
  expect(tree.inputs.map(c => c.subject)).toEqual([
    { type: "literal", name: "weighted-resources", text: "weighted resources" },
    { type: "literal", name: "space", text: "space" },
  ])
  expect(tree.includes[0]?.subject).toEqual({ type: "literal", name: "space", text: "space" })
})

test("bare and hyphenated resources both mean unweighted resources", () => {
  for (const phrase of ["resources", "unweighted-resources", "Unweighted Resources"]) {
    const tree = parseOptimization(`produce screw from ? ${phrase}`)
    expect(tree.inputs[0]?.subject).toMatchObject({ type: "literal", name: "unweighted-resources" })
  }
})

test("a literal keyword followed by more words is an entity span", () => {
  const tree = parseOptimization("produce power shards")

  expect(tree.outputs[0]?.subject).toEqual({ type: "entity", text: "power shards", offset: 8 })
})

test("excludes join with or, nor and and", () => {
  const tree = parseOptimization("produce screw without recipe:screw or alternate-cast-screw nor byproducts")

  expect(tree.excludes.map(c => c.subject)).toEqual([
    { type: "entity", text: "recipe:screw", offset: 22 },
    { type: "entity", text: "alternate-cast-screw", offset: 38 },
    { type: "literal", name: "byproducts", text: "byproducts" },
  ])
})

test("recipe lookups", () => {
  expect(parse("recipes for iron plate")).toEqual({
    kind: "recipes-for",
    entity: { type: "entity", text: "iron plate", offset: 12 },
  })
  expect(parse("recipe of screw")).toEqual({
    kind: "recipes-for",
    entity: { type: "entity", text: "screw", offset: 10 },
  })
  expect(parse("iron plate recipes")).toEqual({
    kind: "recipes-for",
    entity: { type: "entity", text: "iron plate", offset: 0 },
  })
  expect(parse("recipes from iron ingot")).toEqual({
    kind: "recipes-from",
    entity: { type: "entity", text: "iron ingot", offset: 13 },
  })
  expect(parse("recipes using wire").kind).toBe("recipes-from")
  expect(parse("recipes with wire").kind).toBe("recipes-from")
})

test("a bare entity span asks for entity details", () => {
  expect(parse("iron.*")).toEqual({
    kind: "entity-details",
    entity: { type: "entity", text: "iron.*", offset: 0 },
  })
})

test("missing input clause reports the end of the text", () => {
  const result = parseWithOhm("produce 60 iron plate from")

  expect(result.ok).toBe(false)
  if (result.ok) return
  expect(result.error).toMatchObject({ kind: "grammar", offset: 26, line: 1, column: 27 })
})

test("unexpected character reports its position", () => {
  const result = parseWithOhm("produce ? $")

  expect(result.ok).toBe(false)
  if (result.ok) return
  expect(result.error).toMatchObject({ kind: "grammar", offset: 10, line: 1, column: 11 })
  expect(result.error.message).not.toMatch(/^Line \d+/)
})

test("empty input fails at offset 0", () => {
  const result = parseWithOhm("")

  expect(result.ok).toBe(false)
  if (result.ok) return
  expect(result.error.offset).toBe(0)
})

test("formatCompileError points a caret at the failing column", () => {
  const result = parseWithOhm("produce ? $")
  if (result.ok) throw new Error("expected a parse failure")

  const lines = formatCompileError(result.error).split("\n")

  expect(lines[0]).toBe('"produce ? $" ==> failed parse:')
  expect(lines[1]).toBe(`${" ".repeat(11)}^`)
  expect(lines[2]).toBe(result.error.message)
})
