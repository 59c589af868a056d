import { REQUIRED_FIELDS, toDuration, toUuid } from "../types/recipe.js";
import type { Difficulty, RequiredField, Uuid } from "../types/recipe.js";
import {
  MissingFieldError,
  RecipeBuildError,
  RecipeErrorType,
} from "../types/errors.js";
import { ingredientKey } from "./ingredient.js";
import type { Ingredient } from "./ingredient.js";
import { tagKey } from "./recipeTag.js";
import type { RecipeTag } from "./recipeTag.js";
import { Recipe } from "./recipe.js";
import { KeyedSet } from "../utils/keyedSet.js";

export type BuildResult =
  | { success: true; data: Recipe }
  | { success: false; error: MissingFieldError };

/**
 * Slots for the mandatory scalars. `undefined` means "not yet set"; an
 * empty string is a value like any other.
 */
interface PendingFields {
  id?: Uuid;
  name?: string;
  difficulty?: Difficulty;
  duration?: number;
  description?: string;
  directions?: string;
}

/**
 * Collects recipe fields in any order and turns them into a {@link Recipe}
 * once every mandatory field is present.
 *
 * @example
 * const result = Recipe.builder()
 *   .withId(id)
 *   .withName("Pancakes")
 *   .withDifficulty(Difficulty.Easy)
 *   .withDuration(15)
 *   .withDescription("Fluffy pancakes")
 *   .withDirections("Mix and fry.")
 *   .build();
 */
export class RecipeBuilder {
  private fields: PendingFields = {};
  private ingredients = new KeyedSet(ingredientKey);
  private tags = new KeyedSet(tagKey);
  private img?: Uint8Array;
  private consumed = false;

  /** @throws RangeError when `id` is not a UUID */
  withId(id: string): this {
    this.ensureOpen();
    this.fields.id = toUuid(id);
    return this;
  }

  withName(name: string): this {
    this.ensureOpen();
    this.fields.name = name;
    return this;
  }

  withDifficulty(difficulty: Difficulty): this {
    this.ensureOpen();
    this.fields.difficulty = difficulty;
    return this;
  }

  /**
   * @param minutes - whole minutes in the unsigned 16-bit range
   * @throws RangeError when `minutes` is not such a number
   */
  withDuration(minutes: number): this {
    this.ensureOpen();
    this.fields.duration = toDuration(minutes);
    return this;
  }

  withDescription(description: string): this {
    this.ensureOpen();
    this.fields.description = description;
    return this;
  }

  withDirections(directions: string): this {
    this.ensureOpen();
    this.fields.directions = directions;
    return this;
  }

  withImage(bytes: Uint8Array): this {
    this.ensureOpen();
    this.img = Uint8Array.from(bytes);
    return this;
  }

  /** Re-adding an id replaces the ingredient stored under it. */
  addIngredient(ingredient: Ingredient): this {
    this.ensureOpen();
    this.ingredients.add(ingredient);
    return this;
  }

  addTag(tag: RecipeTag): this {
    this.ensureOpen();
    this.tags.add(tag);
    return this;
  }

  /** Mandatory fields still unset, in the order `build` checks them. */
  missingFields(): RequiredField[] {
    this.ensureOpen();
    return REQUIRED_FIELDS.filter((field) => this.fields[field] === undefined);
  }

  /**
   * Checks id, name, difficulty, duration, description and directions in
   * that order and reports the first one left unset. Either way the builder
   * is consumed: start a new one to try again.
   */
  build(): BuildResult {
    this.ensureOpen();
    this.consumed = true;
    const { id, name, difficulty, duration, description, directions } =
      this.fields;

    if (id === undefined) return missing("id");
    if (name === undefined) return missing("name");
    if (difficulty === undefined) return missing("difficulty");
    if (duration === undefined) return missing("duration");
    if (description === undefined) return missing("description");
    if (directions === undefined) return missing("directions");

    const recipe = new Recipe({
      id,
      name,
      difficulty,
      duration,
      description,
      directions,
      ingredients: this.ingredients,
      tags: this.tags,
      img: this.img ?? new Uint8Array(0),
    });
    return { success: true, data: recipe };
  }

  /** Like {@link build}, but throws the {@link MissingFieldError}. */
  buildOrThrow(): Recipe {
    const result = this.build();
    if (!result.success) throw result.error;
    return result.data;
  }

  private ensureOpen(): void {
    if (this.consumed) {
      throw new RecipeBuildError(
        "Recipe builder was already used to build a recipe",
        RecipeErrorType.BUILDER_CONSUMED
      );
    }
  }
}

function missing(field: RequiredField): BuildResult {
  return { success: false, error: new MissingFieldError(field) };
}
