import { buildInformationQuery } from "./compiler/information"
import { buildOptimizationQuery } from "./compiler/optimization"
import type { BuildContext } from "./compiler/context"
import { QueryCompileError } from "./errors"
import { log } from "./logger"
import { parseWithOhm } from "./parser/ohm-ast"
import type { InformationQuery } from "./query/information-query"
import type { OptimizationQuery } from "./query/optimization-query"
import type { CompileOptions, Result } from "./types"

export type Query = OptimizationQuery | InformationQuery

export type CompileResult = Result<Query>

/**
 * Compile one command into an optimization or information query. Every call builds a
 * fresh query; the database is only read.
 */
export function compileQuery(text: string, options: CompileOptions): CompileResult {
  const logger = options.logger ?? log

  const parsed = parseWithOhm(text)
  if (!parsed.ok) {
    logger.debug({ text, offset: parsed.error.offset }, "query failed to parse")
    return parsed
  }
  logger.debug({ text, tree: parsed.value }, "query parsed")

  const context: BuildContext = {
    database: options.database,
    logger,
    regexFallback: options.regexFallback ?? true,
  }

  const tree = parsed.value
  const result =
    tree.kind === "optimization"
      ? buildOptimizationQuery(tree, context)
      : buildInformationQuery(tree, context)

  if (!result.ok) {
    logger.debug({ text, kind: result.error.kind, message: result.error.message }, "query failed to compile")
  }
  return result
}

/** Like `compileQuery`, but throws a `QueryCompileError` on failure. */
export function compileQueryOrThrow(text: string, options: CompileOptions): Query {
  const result = compileQuery(text, options)
  if (!result.ok) throw new QueryCompileError(result.error)
  return result.value
}
