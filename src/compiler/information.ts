import type { InformationTree } from "../parser/internal-types"
import { type InformationQuery, uniqueEntities } from "../query/information-query"
import { TYPE_TAGS, type AnyEntity, type Result, type TypeTag } from "../types"
import { canonicalVariable } from "../variables"
import { type BuildContext, INPUT_TYPES, resolveSpan } from "./context"

const RECIPES_FOR_TYPES: ReadonlySet<TypeTag> = new Set(["resource", "item", "crafter", "generator"])
const ANY_TYPE: ReadonlySet<TypeTag> = new Set(TYPE_TAGS)

/**
 * Recipes related to an entity: recipes producing an item, recipes built in a crafter,
 * or power recipes burned in a generator.
 */
function recipesFor(entity: AnyEntity, context: BuildContext): AnyEntity[] {
  const variable = canonicalVariable(entity.tag, entity.slug)
  switch (entity.tag) {
    case "item":
    case "resource":
      return [...context.database.recipesForProduct(variable)]
    case "crafter":
      return context.database.recipes().filter(recipe => recipe.crafter === variable)
    case "generator":
      return context.database.powerRecipes().filter(recipe => recipe.generator === variable)
    default:
      return []
  }
}

export function buildInformationQuery(
  tree: InformationTree,
  context: BuildContext,
): Result<InformationQuery> {
  const allowedTypes =
    tree.kind === "recipes-for"
      ? RECIPES_FOR_TYPES
      : tree.kind === "recipes-from"
        ? INPUT_TYPES
        : ANY_TYPE

  const resolved = resolveSpan(tree.entity, allowedTypes, context)
  if (!resolved.ok) return resolved

  const matches = resolved.value
  let entities: AnyEntity[]
  if (tree.kind === "recipes-for") {
    entities = matches.flatMap(match => recipesFor(match, context))
  } else if (tree.kind === "recipes-from") {
    entities = matches.flatMap(match => [
      ...context.database.recipesForIngredient(canonicalVariable(match.tag, match.slug)),
    ])
  } else {
    entities = matches
  }

  context.logger.debug({ lookup: tree.kind, entities: entities.length }, "built information query")
  return { ok: true, value: { kind: "information", lookup: tree.kind, entities: uniqueEntities(entities) } }
}
