import type { InformationKind } from "../parser/internal-types"
import type { AnyEntity } from "../types"
import { canonicalVariable } from "../variables"

export interface InformationQuery {
  kind: "information"
  lookup: InformationKind
  /** Matched entities in database order, each at most once */
  entities: AnyEntity[]
}

/** Drop repeated entities, keeping the first occurrence. */
export function uniqueEntities<T extends AnyEntity>(entities: Iterable<T>): T[] {
  const seen = new Set<string>()
  const result: T[] = []
  for (const entity of entities) {
    const key = canonicalVariable(entity.tag, entity.slug)
    if (!seen.has(key)) {
      seen.add(key)
      result.push(entity)
    }
  }
  return result
}

export function informationVariables(query: InformationQuery): string[] {
  return query.entities.map(entity => canonicalVariable(entity.tag, entity.slug))
}
