import type { CompileError } from "./types"

/**
 * Thrown by `compileQueryOrThrow`; carries the structured error unchanged
 */
export class QueryCompileError extends Error {
  readonly error: CompileError

  constructor(error: CompileError) {
    super(formatCompileError(error))
    this.name = "QueryCompileError"
    this.error = error
  }
}

/**
 * Render an error for display. Grammar errors quote the failing line with a caret
 * under the column where parsing stopped.
 */
export function formatCompileError(error: CompileError): string {
  if (error.kind !== "grammar") return error.message

  const line = error.text.split("\n")[error.line - 1] ?? error.text
  // The opening quote shifts the line one column to the right
  const caret = `${" ".repeat(error.column)}^`
  return `"${line}" ==> failed parse:\n${caret}\n${error.message}`
}
