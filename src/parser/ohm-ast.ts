import { readFileSync } from "node:fs"
import * as Ohm from "ohm-js"
import type { GrammarError } from "../types"
import type { Clause, ClauseKind, EntitySpan, LiteralSubject, ParseTree } from "./internal-types"
import { resolveLiteral } from "./literals"
import { parseQuantity } from "./quantity"

const grammarSource = readFileSync(new URL("../../grammars/query.ohm", import.meta.url), "utf8")

const grammar = Ohm.grammar(grammarSource)
const semantics = grammar.createSemantics()

function literalSubject(node: Ohm.Node): LiteralSubject {
  const text = node.sourceString
  const name = resolveLiteral(text)
  if (name === null) {
    throw new Error(`Grammar accepted unknown literal '${text}'`)
  }
  return { type: "literal", name, text }
}

function buildClause(
  kind: ClauseKind,
  onlyOpt: Ohm.Node | null,
  valueOpt: Ohm.Node | null,
  subject: Ohm.Node,
  offset: number,
): Clause {
  return {
    kind,
    strict: onlyOpt !== null && onlyOpt.numChildren > 0,
    value:
      valueOpt !== null && valueOpt.numChildren > 0
        ? parseQuantity(valueOpt.child(0).sourceString)
        : { type: "any" },
    subject: subject.toAST(),
    offset,
  }
}

function listOf(listOpt: Ohm.Node): Clause[] {
  return listOpt.numChildren > 0 ? listOpt.child(0).toAST() : []
}

semantics.addOperation("toAST", {
  Query_optimization(query, _end) {
    return query.toAST()
  },

  Query_recipesFor(query, _end): ParseTree {
    return { kind: "recipes-for", entity: query.toAST() }
  },

  Query_recipesFrom(query, _end): ParseTree {
    return { kind: "recipes-from", entity: query.toAST() }
  },

  Query_entityDetails(entity, _end): ParseTree {
    return { kind: "entity-details", entity: entity.toAST() }
  },

  OptimizationQuery(outputs, inputs, includes, excludes): ParseTree {
    return {
      kind: "optimization",
      outputs: outputs.toAST(),
      inputs: listOf(inputs),
      includes: listOf(includes),
      excludes: listOf(excludes),
    }
  },

  Outputs(_kw, clauses) {
    return clauses.asIteration().children.map(c => c.toAST())
  },

  Inputs(_kw, clauses) {
    return clauses.asIteration().children.map(c => c.toAST())
  },

  Includes(_kw, clauses) {
    return clauses.asIteration().children.map(c => c.toAST())
  },

  Excludes(_kw, clauses) {
    return clauses.asIteration().children.map(c => c.toAST())
  },

  OutputClause(only, value, subject) {
    return buildClause("output", only, value, subject, this.source.startIdx)
  },

  InputClause(only, value, subject) {
    return buildClause("input", only, value, subject, this.source.startIdx)
  },

  IncludeClause(only, subject) {
    return buildClause("include", only, null, subject, this.source.startIdx)
  },

  ExcludeClause(subject) {
    return buildClause("exclude", null, null, subject, this.source.startIdx)
  },

  OutputSubject_literal(literal) {
    return literalSubject(literal)
  },

  InputSubject_literal(literal) {
    return literalSubject(literal)
  },

  IncludeSubject_literal(literal) {
    return literalSubject(literal)
  },

  ExcludeSubject_literal(literal) {
    return literalSubject(literal)
  },

  RecipesForQuery_prefixed(_recipes, _for, entity) {
    return entity.toAST()
  },

  RecipesForQuery_suffixed(entity, _recipes) {
    return entity.toAST()
  },

  RecipesFromQuery(_recipes, _from, entity) {
    return entity.toAST()
  },

  Entity(words): EntitySpan {
    return {
      type: "entity",
      text: words.children.map(w => w.sourceString).join(" "),
      offset: words.child(0).source.startIdx,
    }
  },

  _nonterminal(...children) {
    if (children.length !== 1) return null
    return children[0]?.toAST() ?? null
  },

  _terminal() {
    return null
  },
})

type ParseWithOhmResult = { ok: true; value: ParseTree } | { ok: false; error: GrammarError }

export function parseWithOhm(source: string): ParseWithOhmResult {
  const matchResult = grammar.match(source)

  if (matchResult.failed()) {
    const pos = matchResult.getInterval().getLineAndColumn()
    const shortMsg = (matchResult.shortMessage || "Parse error").replace(
      /^Line \d+, col \d+:\s*/,
      "",
    )

    return {
      ok: false,
      error: {
        kind: "grammar",
        message: shortMsg,
        text: source,
        offset: pos.offset,
        line: pos.lineNum,
        column: pos.colNum,
      },
    }
  }

  return { ok: true, value: semantics(matchResult).toAST() }
}

export { grammar }
