import type { Quantity } from "../parser/internal-types"
import type { QueryVariable } from "../types"
import { type CategoryMap, forAllElements, isStrict } from "./category"

/** An output or input: a flow of one variable with its requested quantity */
export interface FlowElement {
  variable: QueryVariable
  value: Quantity
}

/** An include or exclude: the variable's presence is all that matters */
export interface PresenceElement {
  variable: QueryVariable
}

export interface Objective {
  maximize: boolean
  /** Canonical variable → coefficient (1 when maximized, -1 when minimized) */
  coefficients: Record<string, number>
}

export interface OptimizationQuery {
  kind: "optimization"
  objective: Objective
  outputs: CategoryMap<FlowElement>
  inputs: CategoryMap<FlowElement>
  includes: CategoryMap<PresenceElement>
  excludes: CategoryMap<PresenceElement>
}

/**
 * Strictness per category. A strict category tells the solver to use only the named
 * members of that type and force every other member to zero.
 */
export interface StrictFlags {
  outputs: boolean
  inputs: boolean
  crafters: boolean
  generators: boolean
  recipes: boolean
  powerRecipes: boolean
}

/** Everything the solver consumes, as plain data */
export interface SolverQuery {
  maximize: boolean
  objective: Record<string, number>
  eq: Record<string, number>
  ge: Record<string, number>
  le: Record<string, number>
  strict: StrictFlags
}

/** Minimize raw resource usage when the command names no inputs. */
export function defaultObjective(): Objective {
  return { maximize: false, coefficients: { "unweighted-resources": -1 } }
}

/** No coefficients: the solver only has to satisfy the constraints. */
export function emptyObjective(): Objective {
  return { maximize: false, coefficients: {} }
}

// ---------------------------------------------------------------------------
// Constraint maps
// ---------------------------------------------------------------------------

/** Exact targets: every exclusion is pinned to zero. */
export function eqConstraints(query: OptimizationQuery): Record<string, number> {
  const result: Record<string, number> = {}
  forAllElements(query.excludes, id => {
    result[id] = 0
  })
  return result
}

/**
 * Lower bounds. Outputs are positive flows, inputs negative ones, so consuming at
 * least N of an input is a lower bound of -N.
 */
export function geConstraints(query: OptimizationQuery): Record<string, number> {
  const result: Record<string, number> = {}
  forAllElements(query.outputs, (id, output) => {
    if (output.value.type === "any") result[id] = 0
    if (output.value.type === "amount") result[id] = output.value.amount
  })
  forAllElements(query.inputs, (id, input) => {
    if (input.value.type === "amount") result[id] = input.value.amount === 0 ? 0 : -input.value.amount
  })
  forAllElements(query.includes, id => {
    result[id] = 0
  })
  return result
}

/** Upper bounds: inputs given without an amount. */
export function leConstraints(query: OptimizationQuery): Record<string, number> {
  const result: Record<string, number> = {}
  forAllElements(query.inputs, (id, input) => {
    if (input.value.type === "any") result[id] = 0
  })
  return result
}

// ---------------------------------------------------------------------------
// Strictness
// ---------------------------------------------------------------------------

export function strictOutputs(query: OptimizationQuery): boolean {
  return isStrict(query.outputs, "item")
}

export function strictInputs(query: OptimizationQuery): boolean {
  return isStrict(query.inputs, "item") || isStrict(query.inputs, "resource")
}

export function strictCrafters(query: OptimizationQuery): boolean {
  return isStrict(query.includes, "crafter")
}

export function strictGenerators(query: OptimizationQuery): boolean {
  return isStrict(query.includes, "generator")
}

export function strictRecipes(query: OptimizationQuery): boolean {
  return isStrict(query.includes, "recipe")
}

export function strictPowerRecipes(query: OptimizationQuery): boolean {
  return isStrict(query.includes, "power-recipe")
}

export function strictFlags(query: OptimizationQuery): StrictFlags {
  return {
    outputs: strictOutputs(query),
    inputs: strictInputs(query),
    crafters: strictCrafters(query),
    generators: strictGenerators(query),
    recipes: strictRecipes(query),
    powerRecipes: strictPowerRecipes(query),
  }
}

export function hasPowerOutput(query: OptimizationQuery): boolean {
  return query.outputs.has("power")
}

export function toSolverQuery(query: OptimizationQuery): SolverQuery {
  return {
    maximize: query.objective.maximize,
    objective: { ...query.objective.coefficients },
    eq: eqConstraints(query),
    ge: geConstraints(query),
    le: leConstraints(query),
    strict: strictFlags(query),
  }
}

// ---------------------------------------------------------------------------
// Enumeration & display
// ---------------------------------------------------------------------------

/** Every variable the query mentions, objective first, each listed once. */
export function queryVariables(query: OptimizationQuery): string[] {
  const variables = new Set(Object.keys(query.objective.coefficients))
  const collect = (id: string) => {
    variables.add(id)
  }
  forAllElements(query.outputs, collect)
  forAllElements(query.inputs, collect)
  forAllElements(query.includes, collect)
  forAllElements(query.excludes, collect)
  return [...variables]
}

function formatFlow(element: FlowElement, strict: boolean): string {
  const only = strict ? "only " : ""
  const amount = element.value.type === "amount" ? `${element.value.amount} ` : ""
  return `${only}${amount}${element.variable.id}`
}

/**
 * Rebuild a command in canonical form, e.g.
 * `produce 60 item:iron-plate from ? unweighted-resources using only crafter:smelter`.
 */
export function formatOptimizationQuery(query: OptimizationQuery): string {
  const outputs: string[] = []
  const inputs: string[] = []
  const includes: string[] = []
  const excludes: string[] = []

  for (const id of Object.keys(query.objective.coefficients)) {
    ;(query.objective.maximize ? outputs : inputs).push(`? ${id}`)
  }

  forAllElements(query.outputs, (_id, output, category) => {
    if (output.value.type !== "objective") outputs.push(formatFlow(output, category.strict))
  })
  forAllElements(query.inputs, (_id, input, category) => {
    if (input.value.type !== "objective") inputs.push(formatFlow(input, category.strict))
  })
  forAllElements(query.includes, (id, _include, category) => {
    includes.push(`${category.strict ? "only " : ""}${id}`)
  })
  forAllElements(query.excludes, id => {
    excludes.push(id)
  })

  const parts = [`produce ${outputs.join(" and ")}`]
  if (inputs.length > 0) parts.push(`from ${inputs.join(" and ")}`)
  if (includes.length > 0) parts.push(`using ${includes.join(" and ")}`)
  if (excludes.length > 0) parts.push(`without ${excludes.join(" or ")}`)
  return parts.join(" ")
}
