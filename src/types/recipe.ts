import { validate } from "uuid";
import type { Ingredient } from "../models/ingredient.js";
import type { RecipeTag } from "../models/recipeTag.js";

/**
 * How hard a recipe is to make, from `Easy` to `Expert`.
 * Declaration order is the ordering used for sorting.
 */
export enum Difficulty {
  Easy = "Easy",
  Medium = "Medium",
  Hard = "Hard",
  Expert = "Expert",
}

/** Opaque 128-bit identifier in its canonical (lowercase) UUID text form. */
export type Uuid = string;

/**
 * Canonical form of a UUID, so that two spellings of the same 128-bit
 * value compare equal.
 * @throws RangeError when `text` is not a UUID
 */
export function toUuid(text: string): Uuid {
  if (!validate(text)) {
    throw new RangeError(`Expected a UUID, got "${text}"`);
  }
  return text.toLowerCase();
}

/**
 * Mandatory scalar fields, in the order finalization checks them.
 */
export const REQUIRED_FIELDS = [
  "id",
  "name",
  "difficulty",
  "duration",
  "description",
  "directions",
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export const MAX_DURATION_MINUTES = 65535;

/**
 * Whole minutes in the unsigned 16-bit range; `-0` comes back as `0`.
 * @throws RangeError for anything else
 */
export function toDuration(minutes: number): number {
  if (
    !Number.isInteger(minutes) ||
    minutes < 0 ||
    minutes > MAX_DURATION_MINUTES
  ) {
    throw new RangeError(
      `Duration must be a whole number of minutes between 0 and ${MAX_DURATION_MINUTES}, got ${minutes}`
    );
  }
  return minutes + 0;
}

/**
 * Everything a finished recipe holds. Used to construct a `Recipe`
 * directly; the builder assembles one of these incrementally.
 */
export interface RecipeFields {
  id: Uuid;
  name: string;
  difficulty: Difficulty;
  duration: number; // minutes, 0..65535
  description: string;
  ingredients: Iterable<Ingredient>;
  directions: string;
  tags: Iterable<RecipeTag>;
  img: Uint8Array;
}
