import type { Logger } from "pino"
import type { EntitySpan, Subject } from "../parser/internal-types"
import { resolveEntities } from "../resolver/entity-resolver"
import type {
  AnyEntity,
  EntityDatabase,
  QueryVariable,
  ResolutionError,
  Result,
  TypeTag,
} from "../types"
import { entityVariable, literalVariable } from "../variables"

export interface BuildContext {
  database: EntityDatabase
  logger: Logger
  regexFallback: boolean
}

export const OUTPUT_TYPES: ReadonlySet<TypeTag> = new Set(["item"])
export const INPUT_TYPES: ReadonlySet<TypeTag> = new Set(["resource", "item"])
export const BUILDING_TYPES: ReadonlySet<TypeTag> = new Set([
  "recipe",
  "power-recipe",
  "crafter",
  "generator",
])

function resolutionError(span: EntitySpan, allowedTypes: ReadonlySet<TypeTag>): ResolutionError {
  const types = [...allowedTypes]
  return {
    kind: "resolution",
    message: `Could not match '${span.text}' to any ${types.join(" or ")}.`,
    span: span.text,
    offset: span.offset,
    allowedTypes: types,
  }
}

/** Entities an entity span names; matching nothing is an error. */
export function resolveSpan(
  span: EntitySpan,
  allowedTypes: ReadonlySet<TypeTag>,
  context: BuildContext,
): Result<AnyEntity[], ResolutionError> {
  const matches = resolveEntities(span.text, allowedTypes, context.database, {
    logger: context.logger,
    regexFallback: context.regexFallback,
  })
  if (matches.length === 0) {
    return { ok: false, error: resolutionError(span, allowedTypes) }
  }
  return { ok: true, value: matches }
}

/** Variables a clause subject stands for. Literals pass through unresolved. */
export function resolveSubject(
  subject: Subject,
  allowedTypes: ReadonlySet<TypeTag>,
  context: BuildContext,
): Result<QueryVariable[], ResolutionError> {
  if (subject.type === "literal") {
    return { ok: true, value: [literalVariable(subject.name)] }
  }
  const resolved = resolveSpan(subject, allowedTypes, context)
  if (!resolved.ok) return resolved
  return { ok: true, value: resolved.value.map(entityVariable) }
}
