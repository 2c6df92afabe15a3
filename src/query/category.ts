import type { CategoryKey, QueryVariable } from "../types"

/**
 * Elements of one clause kind that share a type tag (or literal), with the
 * aggregate strictness of the clauses that added them
 */
export interface Category<T> {
  key: CategoryKey
  strict: boolean
  elements: Map<string, T>
}

export type CategoryMap<T> = Map<CategoryKey, Category<T>>

export function categoryKeyOf(variable: QueryVariable): CategoryKey {
  return variable.kind === "entity" ? variable.tag : variable.name
}

export function createCategories<T>(initial: Array<[CategoryKey, boolean]>): CategoryMap<T> {
  return new Map(
    initial.map(([key, strict]): [CategoryKey, Category<T>] => [
      key,
      { key, strict, elements: new Map() },
    ]),
  )
}

/**
 * Add an element under its variable's category. The same variable overwrites its
 * previous element; strictness only ever escalates.
 */
export function addElement<T>(
  categories: CategoryMap<T>,
  variable: QueryVariable,
  element: T,
  strict: boolean,
): void {
  const key = categoryKeyOf(variable)
  let category = categories.get(key)
  if (!category) {
    category = { key, strict, elements: new Map() }
    categories.set(key, category)
  }
  category.elements.set(variable.id, element)
  category.strict ||= strict
}

/** A strict category only restricts anything when it names at least one element. */
export function isStrict<T>(categories: CategoryMap<T>, key: CategoryKey): boolean {
  const category = categories.get(key)
  return category !== undefined && category.strict && category.elements.size > 0
}

export function forAllElements<T>(
  categories: CategoryMap<T>,
  fn: (id: string, element: T, category: Category<T>) => void,
): void {
  for (const category of categories.values()) {
    for (const [id, element] of category.elements) {
      fn(id, element, category)
    }
  }
}
