import type {
  Crafter,
  EntityDatabase,
  Generator,
  Item,
  PowerRecipe,
  Recipe,
} from "../types"

export interface DatabaseContents {
  items: Item[]
  recipes: Recipe[]
  powerRecipes: PowerRecipe[]
  crafters: Crafter[]
  generators: Generator[]
}

function indexRecipes(
  recipes: readonly Recipe[],
  components: (recipe: Recipe) => Recipe["products"],
): Map<string, Recipe[]> {
  const index = new Map<string, Recipe[]>()
  for (const recipe of recipes) {
    for (const component of components(recipe)) {
      const list = index.get(component.item) ?? []
      if (!list.includes(recipe)) list.push(recipe)
      index.set(component.item, list)
    }
  }
  return index
}

/**
 * `EntityDatabase` over fixed entity lists. Product and ingredient lookups are indexed
 * once at construction; nothing is mutated afterwards.
 */
export class InMemoryDatabase implements EntityDatabase {
  private readonly contents: DatabaseContents
  private readonly byProduct: Map<string, Recipe[]>
  private readonly byIngredient: Map<string, Recipe[]>

  constructor(contents: DatabaseContents) {
    this.contents = contents
    this.byProduct = indexRecipes(contents.recipes, recipe => recipe.products)
    this.byIngredient = indexRecipes(contents.recipes, recipe => recipe.ingredients)
  }

  items(): readonly Item[] {
    return this.contents.items
  }

  recipes(): readonly Recipe[] {
    return this.contents.recipes
  }

  powerRecipes(): readonly PowerRecipe[] {
    return this.contents.powerRecipes
  }

  crafters(): readonly Crafter[] {
    return this.contents.crafters
  }

  generators(): readonly Generator[] {
    return this.contents.generators
  }

  recipesForProduct(variable: string): readonly Recipe[] {
    return this.byProduct.get(variable) ?? []
  }

  recipesForIngredient(variable: string): readonly Recipe[] {
    return this.byIngredient.get(variable) ?? []
  }
}
