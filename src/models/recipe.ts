import { toDuration, toUuid } from "../types/recipe.js";
import type { Difficulty, RecipeFields, Uuid } from "../types/recipe.js";
import { ingredientKey } from "./ingredient.js";
import type { Ingredient } from "./ingredient.js";
import { tagKey } from "./recipeTag.js";
import type { RecipeTag } from "./recipeTag.js";
import { RecipeBuilder } from "./recipeBuilder.js";
import { KeyedSet } from "../utils/keyedSet.js";

/**
 * A single recipe one would find in a cookbook.
 *
 * Instances are frozen on construction and expose no setters. Use
 * {@link Recipe.builder} to assemble one field at a time; the constructor
 * requires every field up front and holds the id and duration to the same
 * rules as the builder.
 */
export class Recipe {
  readonly id: Uuid;
  readonly name: string;
  readonly difficulty: Difficulty;
  /** Estimated duration in minutes. */
  readonly duration: number;
  readonly description: string;
  /** Unique by ingredient id; order carries no meaning. */
  readonly ingredients: readonly Ingredient[];
  readonly directions: string;
  /** Unique by tag text; order carries no meaning. */
  readonly tags: readonly RecipeTag[];

  private readonly ingredientSet: KeyedSet<Ingredient>;
  private readonly tagSet: KeyedSet<RecipeTag>;
  private readonly picture: Uint8Array;

  constructor(fields: RecipeFields) {
    this.id = toUuid(fields.id);
    this.name = fields.name;
    this.difficulty = fields.difficulty;
    this.duration = toDuration(fields.duration);
    this.description = fields.description;
    this.directions = fields.directions;

    this.ingredientSet = new KeyedSet(ingredientKey, fields.ingredients);
    this.tagSet = new KeyedSet(tagKey, fields.tags);
    this.ingredients = Object.freeze(this.ingredientSet.values());
    this.tags = Object.freeze(this.tagSet.values());

    // typed arrays with elements cannot be frozen, so keep a private copy
    this.picture = Uint8Array.from(fields.img);

    Object.freeze(this);
  }

  static builder(): RecipeBuilder {
    return new RecipeBuilder();
  }

  /** The picture bytes; every read returns a fresh copy. */
  get img(): Uint8Array {
    return this.picture.slice();
  }

  hasIngredient(id: Uuid): boolean {
    return this.ingredientSet.has(id.toLowerCase());
  }

  getIngredient(id: Uuid): Ingredient | undefined {
    return this.ingredientSet.get(id.toLowerCase());
  }

  hasTag(tag: string): boolean {
    return this.tagSet.has(tag);
  }
}
