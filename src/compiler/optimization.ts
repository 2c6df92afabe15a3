import type { Clause, OptimizationTree } from "../parser/internal-types"
import { addElement, type CategoryMap, createCategories } from "../query/category"
import {
  defaultObjective,
  emptyObjective,
  type FlowElement,
  type Objective,
  type OptimizationQuery,
  type PresenceElement,
} from "../query/optimization-query"
import type { CompileError, QueryVariable, Result, SemanticError, TypeTag } from "../types"
import {
  BUILDING_TYPES,
  type BuildContext,
  INPUT_TYPES,
  OUTPUT_TYPES,
  resolveSubject,
} from "./context"

interface QueryDraft {
  objective: Objective | null
  outputs: CategoryMap<FlowElement>
  inputs: CategoryMap<FlowElement>
  includes: CategoryMap<PresenceElement>
  excludes: CategoryMap<PresenceElement>
}

function semanticError(message: string, offset?: number): SemanticError {
  return offset === undefined ? { kind: "semantic", message } : { kind: "semantic", message, offset }
}

function createDraft(): QueryDraft {
  return {
    objective: null,
    outputs: createCategories([["item", false]]),
    inputs: createCategories([["item", false]]),
    // Naming any building or recipe restricts the solver to the named ones
    includes: createCategories([
      ["crafter", true],
      ["generator", true],
      ["recipe", true],
      ["power-recipe", true],
    ]),
    excludes: createCategories([]),
  }
}

/**
 * Outputs and inputs share one shape: `?` makes the matched variables the objective,
 * anything else records the flow with its quantity.
 */
function addFlowClauses(
  draft: QueryDraft,
  clauses: Clause[],
  target: CategoryMap<FlowElement>,
  allowedTypes: ReadonlySet<TypeTag>,
  context: BuildContext,
): CompileError | null {
  for (const clause of clauses) {
    if (clause.value.type === "amount" && !Number.isSafeInteger(clause.value.amount)) {
      return semanticError(`Amounts may not exceed ${Number.MAX_SAFE_INTEGER}.`, clause.offset)
    }

    const resolved = resolveSubject(clause.subject, allowedTypes, context)
    if (!resolved.ok) return resolved.error

    if (clause.value.type === "objective") {
      if (draft.objective !== null) {
        return semanticError("Only one objective may be specified.", clause.offset)
      }
      // Outputs are maximized, inputs minimized
      const maximize = clause.kind === "output"
      draft.objective = objectiveOf(resolved.value, maximize)
      context.logger.debug(
        { maximize, variables: resolved.value.map(v => v.id) },
        "setting objective",
      )
    }

    for (const variable of resolved.value) {
      context.logger.debug(
        { kind: clause.kind, variable: variable.id, value: clause.value, strict: clause.strict },
        "adding flow",
      )
      addElement(target, variable, { variable, value: clause.value }, clause.strict)
    }
  }
  return null
}

function addPresenceClauses(
  clauses: Clause[],
  target: CategoryMap<PresenceElement>,
  context: BuildContext,
): CompileError | null {
  for (const clause of clauses) {
    const resolved = resolveSubject(clause.subject, BUILDING_TYPES, context)
    if (!resolved.ok) return resolved.error

    for (const variable of resolved.value) {
      context.logger.debug({ kind: clause.kind, variable: variable.id }, "adding presence")
      addElement(target, variable, { variable }, clause.strict)
    }
  }
  return null
}

function objectiveOf(variables: QueryVariable[], maximize: boolean): Objective {
  const coefficient = maximize ? 1 : -1
  return {
    maximize,
    coefficients: Object.fromEntries(variables.map(v => [v.id, coefficient])),
  }
}

/**
 * Assemble an optimization query from the parsed clauses. Outputs, inputs, includes
 * and excludes are applied in that order; the first failure aborts the build.
 * A command without input clauses minimizes raw resources unless it names its own
 * objective; a command with inputs but no `?` leaves the objective empty.
 */
export function buildOptimizationQuery(
  tree: OptimizationTree,
  context: BuildContext,
): Result<OptimizationQuery> {
  if (tree.outputs.length === 0) {
    return { ok: false, error: semanticError("No outputs specified in optimization query.") }
  }

  const draft = createDraft()
  const error =
    addFlowClauses(draft, tree.outputs, draft.outputs, OUTPUT_TYPES, context) ??
    addFlowClauses(draft, tree.inputs, draft.inputs, INPUT_TYPES, context) ??
    addPresenceClauses(tree.includes, draft.includes, context) ??
    addPresenceClauses(tree.excludes, draft.excludes, context)
  if (error) return { ok: false, error }

  return {
    ok: true,
    value: {
      kind: "optimization",
      objective: draft.objective ?? (tree.inputs.length === 0 ? defaultObjective() : emptyObjective()),
      outputs: draft.outputs,
      inputs: draft.inputs,
      includes: draft.includes,
      excludes: draft.excludes,
    },
  }
}
