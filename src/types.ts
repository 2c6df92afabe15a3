/**
 * Shared type definitions for the factory query compiler
 */

import type { Logger } from "pino"

// ---------------------------------------------------------------------------
// Domain entities (read-only view of the game database)
// ---------------------------------------------------------------------------

export const TYPE_TAGS = ["item", "resource", "recipe", "power-recipe", "crafter", "generator"] as const

/**
 * Classification of a database entity. It is the prefix of the entity's canonical
 * variable (`<tag>:<slug>`).
 */
export type TypeTag = (typeof TYPE_TAGS)[number]

/**
 * Base shape shared by every queryable entity
 */
export interface Entity {
  tag: TypeTag
  slug: string
  /** Human-readable display name, e.g. "Iron Plate" or "Recipe: Iron Plate" */
  name: string
}

export interface Item extends Entity {
  tag: "item" | "resource"
  isResource: boolean
  isLiquid: boolean
}

/**
 * An item amount consumed or produced by one recipe cycle
 */
export interface RecipeComponent {
  /** Canonical variable of the item */
  item: string
  amount: number
}

export interface Recipe extends Entity {
  tag: "recipe"
  /** Canonical variable of the crafter the recipe runs in, null for hand-only recipes */
  crafter: string | null
  ingredients: RecipeComponent[]
  products: RecipeComponent[]
  alternate: boolean
  /** Seconds per cycle */
  duration: number
}

export interface PowerRecipe extends Entity {
  tag: "power-recipe"
  /** Canonical variable of the generator burning the fuel */
  generator: string
  fuel: RecipeComponent
  byproduct: RecipeComponent | null
}

export interface Crafter extends Entity {
  tag: "crafter"
  /** MW */
  powerConsumption: number
}

export interface Generator extends Entity {
  tag: "generator"
  /** MW */
  powerProduction: number
}

export type AnyEntity = Item | Recipe | PowerRecipe | Crafter | Generator

/**
 * Read-only capability the compiler needs from the game database.
 * Implementations must tolerate concurrent reads; the compiler never mutates it.
 */
export interface EntityDatabase {
  items(): readonly Item[]
  recipes(): readonly Recipe[]
  powerRecipes(): readonly PowerRecipe[]
  crafters(): readonly Crafter[]
  generators(): readonly Generator[]
  recipesForProduct(variable: string): readonly Recipe[]
  recipesForIngredient(variable: string): readonly Recipe[]
}

// ---------------------------------------------------------------------------
// Query variables
// ---------------------------------------------------------------------------

/**
 * Synthetic variables that pass through to the solver without database lookup
 */
export type LiteralName =
  | "power"
  | "tickets"
  | "space"
  | "unweighted-resources"
  | "weighted-resources"
  | "alternate-recipes"
  | "byproducts"

export type QueryVariable =
  | { kind: "entity"; tag: TypeTag; slug: string; id: string }
  | { kind: "literal"; name: LiteralName; id: string }

/** Categories group elements by entity tag, or by the literal itself. */
export type CategoryKey = TypeTag | LiteralName

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Command text did not match any query shape
 */
export interface GrammarError {
  kind: "grammar"
  message: string
  text: string
  offset: number
  line: number
  column: number
}

/**
 * An entity span matched nothing in the database
 */
export interface ResolutionError {
  kind: "resolution"
  message: string
  span: string
  offset: number
  allowedTypes: TypeTag[]
}

/**
 * The command parsed but its clauses contradict each other
 */
export interface SemanticError {
  kind: "semantic"
  message: string
  offset?: number
}

export type CompileError = GrammarError | ResolutionError | SemanticError

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CompileOptions {
  database: EntityDatabase
  /** Defaults to the shared pino logger (level from LOG_LEVEL) */
  logger?: Logger
  /**
   * Also match entity spans as regular expressions against names and variables.
   * Defaults to true.
   */
  regexFallback?: boolean
}

export type Result<T, E = CompileError> = { ok: true; value: T } | { ok: false; error: E }
