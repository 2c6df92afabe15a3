import type { Entity, LiteralName, QueryVariable, TypeTag } from "./types"

export function canonicalVariable(tag: TypeTag, slug: string): string {
  return `${tag}:${slug}`
}

export function entityVariable(entity: Entity): QueryVariable {
  return {
    kind: "entity",
    tag: entity.tag,
    slug: entity.slug,
    id: canonicalVariable(entity.tag, entity.slug),
  }
}

export function literalVariable(name: LiteralName): QueryVariable {
  return { kind: "literal", name, id: name }
}
