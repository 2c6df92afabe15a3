import type { LiteralName } from "../types"

export type ClauseKind = "output" | "input" | "include" | "exclude"

export type Quantity =
  | { type: "objective" }
  | { type: "amount"; amount: number }
  | { type: "any" }

export interface EntitySpan {
  type: "entity"
  text: string
  offset: number
}

export interface LiteralSubject {
  type: "literal"
  name: LiteralName
  text: string
}

export type Subject = LiteralSubject | EntitySpan

export interface Clause {
  kind: ClauseKind
  strict: boolean
  value: Quantity
  subject: Subject
  offset: number
}

export interface OptimizationTree {
  kind: "optimization"
  outputs: Clause[]
  inputs: Clause[]
  includes: Clause[]
  excludes: Clause[]
}

export type InformationKind = "recipes-for" | "recipes-from" | "entity-details"

export interface InformationTree {
  kind: InformationKind
  entity: EntitySpan
}

export type ParseTree = OptimizationTree | InformationTree
