import { toUuid } from "../types/recipe.js";
import type { Uuid } from "../types/recipe.js";

/**
 * An ingredient for a recipe. Two ingredients are the same set member
 * when their ids match, whatever their name, unit or measurement say.
 * The id is kept in canonical form, so `A1…` and `a1…` are one id.
 */
export class Ingredient {
  public readonly id: Uuid;

  constructor(
    id: string,
    public readonly name: string,
    public readonly unit: string,
    public readonly measurement: string
  ) {
    this.id = toUuid(id);
    Object.freeze(this);
  }

  get key(): string {
    return this.id;
  }

  equals(other: Ingredient): boolean {
    return this.id === other.id;
  }
}

export const ingredientKey = (ingredient: Ingredient): string => ingredient.key;
