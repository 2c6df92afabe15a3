import type { Logger } from "pino"
import type { AnyEntity, EntityDatabase, TypeTag } from "../types"
import { canonicalVariable } from "../variables"
import { pluralize } from "./inflect"

export interface ResolveOptions {
  logger?: Logger
  regexFallback?: boolean
}

/** Lowercase and split on whitespace, hyphens, underscores and colons. */
export function tokenize(text: string): string[] {
  return text
    .trim()
    .toLowerCase()
    .split(/[\s\-_:]+/)
    .filter(token => token.length > 0)
}

function sameTokens(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i])
}

/** Entities of the allowed types, in database order. */
export function candidatesFor(
  database: EntityDatabase,
  allowedTypes: ReadonlySet<TypeTag>,
): AnyEntity[] {
  const candidates: AnyEntity[] = []
  for (const item of database.items()) {
    if (allowedTypes.has(item.isResource ? "resource" : "item")) candidates.push(item)
  }
  if (allowedTypes.has("recipe")) candidates.push(...database.recipes())
  if (allowedTypes.has("power-recipe")) candidates.push(...database.powerRecipes())
  if (allowedTypes.has("crafter")) candidates.push(...database.crafters())
  if (allowedTypes.has("generator")) candidates.push(...database.generators())
  return candidates
}

/** Spans with more quantifiers than this skip the regex step. */
export const MAX_PATTERN_QUANTIFIERS = 3

/** Collapse repeated `.*` runs, which match nothing a single `.*` would not. */
export function simplifyPattern(text: string): string {
  return text.replace(/(?<!\\)(?:\.\*){2,}/g, ".*")
}

/**
 * Anchored pattern for the regex fallback, or null when the text is not a valid pattern
 * or has too many quantifiers.
 */
function fullMatchPattern(text: string, logger: Logger | undefined): RegExp | null {
  const source = simplifyPattern(text)
  const quantifiers = source.match(/[*+?{]/g)?.length ?? 0
  if (quantifiers > MAX_PATTERN_QUANTIFIERS) {
    logger?.debug({ text, quantifiers }, "entity span has too many quantifiers for regex matching")
    return null
  }
  try {
    return new RegExp(`^(?:${source})$`)
  } catch (error: unknown) {
    logger?.debug(
      { text, reason: error instanceof Error ? error.message : String(error) },
      "entity span is not a regular expression",
    )
    return null
  }
}

/**
 * Entity names the text can refer to, in the order they are tried:
 * display name, its plural, canonical variable, and the variable without its type prefix.
 */
function namesOf(entity: AnyEntity): string[] {
  const singular = entity.name.toLowerCase()
  const variable = canonicalVariable(entity.tag, entity.slug)
  return [singular, pluralize(singular), variable, entity.slug]
}

/**
 * Match a free-text span against the entities of the allowed types.
 * Returns every match in database order; an empty result means nothing matched.
 */
export function resolveEntities(
  text: string,
  allowedTypes: ReadonlySet<TypeTag>,
  database: EntityDatabase,
  options: ResolveOptions = {},
): AnyEntity[] {
  const expr = text.trim().toLowerCase()
  const exprTokens = tokenize(expr)
  const candidates = candidatesFor(database, allowedTypes)

  const exact = candidates.filter(entity =>
    namesOf(entity).some(name => sameTokens(exprTokens, tokenize(name))),
  )

  const regexFallback = options.regexFallback ?? true
  const pattern = regexFallback ? fullMatchPattern(expr, options.logger) : null
  const matches = pattern
    ? candidates.filter(
        entity => exact.includes(entity) || namesOf(entity).some(name => pattern.test(name)),
      )
    : exact

  options.logger?.debug(
    { text, allowedTypes: [...allowedTypes], candidates: candidates.length, matches: matches.length },
    "resolved entity span",
  )
  return matches
}
