/**
 * Factory Query - Main API
 *
 * Compiles natural-language production commands into solver queries using Ohm.
 *
 * @example
 * ```ts
 * const database = new InMemoryDatabase(contents)
 * const result = compileQuery("make 60 iron plates", { database })
 *
 * if (result.ok && result.value.kind === "optimization") {
 *   formatOptimizationQuery(result.value)
 *   // "produce 60 item:iron-plate from ? unweighted-resources"
 * }
 * ```
 */

export { compileQuery, compileQueryOrThrow } from "./compile-query"
export type { CompileResult, Query } from "./compile-query"
export { formatCompileError, QueryCompileError } from "./errors"
export { grammar, parseWithOhm } from "./parser/ohm-ast"
export type * from "./parser/internal-types"
export { resolveEntities, tokenize } from "./resolver/entity-resolver"
export { pluralize } from "./resolver/inflect"
export {
  defaultObjective,
  emptyObjective,
  eqConstraints,
  formatOptimizationQuery,
  geConstraints,
  hasPowerOutput,
  leConstraints,
  queryVariables,
  strictCrafters,
  strictFlags,
  strictGenerators,
  strictInputs,
  strictOutputs,
  strictPowerRecipes,
  strictRecipes,
  toSolverQuery,
} from "./query/optimization-query"
export type * from "./query/optimization-query"
export { informationVariables } from "./query/information-query"
export type { InformationQuery } from "./query/information-query"
export type { Category, CategoryMap } from "./query/category"
export { InMemoryDatabase } from "./database/memory"
export type { DatabaseContents } from "./database/memory"
export { buildDatabase, loadDatabase } from "./database/load"
export type { Dataset, DatasetError } from "./database/load"
export { canonicalVariable } from "./variables"
export { TYPE_TAGS } from "./types"
export type * from "./types"

