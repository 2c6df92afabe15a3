import YAML, { YAMLError } from "yaml"
import { z } from "zod"
import type { Crafter, Generator, Item, PowerRecipe, Recipe, RecipeComponent, Result } from "../types"
import { canonicalVariable } from "../variables"
import { InMemoryDatabase } from "./memory"

const slug = z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, "expected a lowercase, hyphenated slug")
const name = z.string().min(1)

const componentSchema = z.object({
  item: slug,
  amount: z.number().positive(),
})

const datasetSchema = z.object({
  items: z
    .array(
      z.object({
        slug,
        name,
        resource: z.boolean().default(false),
        liquid: z.boolean().default(false),
      }),
    )
    .default([]),
  crafters: z
    .array(z.object({ slug, name, powerConsumption: z.number().nonnegative().default(0) }))
    .default([]),
  generators: z
    .array(z.object({ slug, name, powerProduction: z.number().nonnegative().default(0) }))
    .default([]),
  recipes: z
    .array(
      z.object({
        slug,
        name,
        crafter: slug.nullable().default(null),
        duration: z.number().positive(),
        alternate: z.boolean().default(false),
        ingredients: z.array(componentSchema).default([]),
        products: z.array(componentSchema).min(1),
      }),
    )
    .default([]),
  powerRecipes: z
    .array(
      z.object({
        slug,
        name,
        generator: slug,
        fuel: componentSchema,
        byproduct: componentSchema.nullable().default(null),
      }),
    )
    .default([]),
})

export type Dataset = z.infer<typeof datasetSchema>

export interface DatasetError {
  message: string
  issues: string[]
}

function findDuplicates(slugs: string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const s of slugs) {
    if (seen.has(s)) duplicates.add(s)
    seen.add(s)
  }
  return [...duplicates]
}

/**
 * Turn a validated dataset into entities. References between entities are written as
 * slugs in the dataset and become canonical variables here.
 */
export function buildDatabase(dataset: Dataset): Result<InMemoryDatabase, DatasetError> {
  const issues: string[] = []

  for (const [kind, slugs] of [
    ["item", dataset.items.map(i => i.slug)],
    ["crafter", dataset.crafters.map(c => c.slug)],
    ["generator", dataset.generators.map(g => g.slug)],
    ["recipe", dataset.recipes.map(r => r.slug)],
    ["power recipe", dataset.powerRecipes.map(r => r.slug)],
  ] as const) {
    for (const duplicate of findDuplicates([...slugs])) {
      issues.push(`duplicate ${kind} slug '${duplicate}'`)
    }
  }

  const items = dataset.items.map((item): Item => ({
    tag: item.resource ? "resource" : "item",
    slug: item.slug,
    name: item.name,
    isResource: item.resource,
    isLiquid: item.liquid,
  }))
  const itemVariables = new Map(
    items.map((item): [string, string] => [item.slug, canonicalVariable(item.tag, item.slug)]),
  )
  const crafterSlugs = new Set(dataset.crafters.map(c => c.slug))
  const generatorSlugs = new Set(dataset.generators.map(g => g.slug))

  const component = (owner: string, raw: { item: string; amount: number }): RecipeComponent => {
    const variable = itemVariables.get(raw.item)
    if (variable === undefined) issues.push(`${owner} references unknown item '${raw.item}'`)
    return { item: variable ?? raw.item, amount: raw.amount }
  }

  const crafters = dataset.crafters.map((crafter): Crafter => ({
    tag: "crafter",
    ...crafter,
  }))
  const generators = dataset.generators.map((generator): Generator => ({
    tag: "generator",
    ...generator,
  }))

  const recipes = dataset.recipes.map((recipe): Recipe => {
    const owner = `recipe '${recipe.slug}'`
    if (recipe.crafter !== null && !crafterSlugs.has(recipe.crafter)) {
      issues.push(`${owner} references unknown crafter '${recipe.crafter}'`)
    }
    return {
      tag: "recipe",
      slug: recipe.slug,
      name: recipe.name,
      crafter: recipe.crafter === null ? null : canonicalVariable("crafter", recipe.crafter),
      ingredients: recipe.ingredients.map(c => component(owner, c)),
      products: recipe.products.map(c => component(owner, c)),
      alternate: recipe.alternate,
      duration: recipe.duration,
    }
  })

  const powerRecipes = dataset.powerRecipes.map((recipe): PowerRecipe => {
    const owner = `power recipe '${recipe.slug}'`
    if (!generatorSlugs.has(recipe.generator)) {
      issues.push(`${owner} references unknown generator '${recipe.generator}'`)
    }
    return {
      tag: "power-recipe",
      slug: recipe.slug,
      name: recipe.name,
      generator: canonicalVariable("generator", recipe.generator),
      fuel: component(owner, recipe.fuel),
      byproduct: recipe.byproduct === null ? null : component(owner, recipe.byproduct),
    }
  })

  if (issues.length > 0) {
    return { ok: false, error: { message: "Dataset has inconsistent entities", issues } }
  }
  return {
    ok: true,
    value: new InMemoryDatabase({ items, recipes, powerRecipes, crafters, generators }),
  }
}

/** Parse a YAML dataset, validate it and build an in-memory database from it. */
export function loadDatabase(source: string): Result<InMemoryDatabase, DatasetError> {
  let raw: unknown
  try {
    raw = YAML.parse(source)
  } catch (error: unknown) {
    if (!(error instanceof YAMLError)) throw error
    return { ok: false, error: { message: `Invalid YAML dataset: ${error.message}`, issues: [] } }
  }

  const parsed = datasetSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        message: "Dataset does not match the expected shape",
        issues: parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
      },
    }
  }
  return buildDatabase(parsed.data)
}
