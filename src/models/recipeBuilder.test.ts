import { describe, expect, it } from "vitest";
import { Difficulty, REQUIRED_FIELDS } from "../types/recipe.js";
import type { RequiredField } from "../types/recipe.js";
import {
  MissingFieldError,
  RecipeBuildError,
  RecipeErrorType,
} from "../types/errors.js";
import { Ingredient } from "./ingredient.js";
import { RecipeTag } from "./recipeTag.js";
import { Recipe } from "./recipe.js";
import { RecipeBuilder } from "./recipeBuilder.js";

const RECIPE_ID = "3f2b8c1e-9a4d-4e6f-8b7a-1c2d3e4f5a6b";
const FLOUR_ID = "0a1b2c3d-4e5f-4a6b-8c7d-9e0f1a2b3c4d";
const EGG_ID = "5d6e7f80-1a2b-4c3d-9e4f-5a6b7c8d9e0f";

function setField(builder: RecipeBuilder, field: RequiredField): void {
  switch (field) {
    case "id":
      builder.withId(RECIPE_ID);
      break;
    case "name":
      builder.withName("Pancakes");
      break;
    case "difficulty":
      builder.withDifficulty(Difficulty.Easy);
      break;
    case "duration":
      builder.withDuration(15);
      break;
    case "description":
      builder.withDescription("Fluffy pancakes");
      break;
    case "directions":
      builder.withDirections("Mix and fry.");
      break;
  }
}

function completeBuilder(): RecipeBuilder {
  const builder = Recipe.builder();
  REQUIRED_FIELDS.forEach((field) => setField(builder, field));
  return builder;
}

describe("RecipeBuilder", () => {
  it("builds the pancake recipe with empty defaults", () => {
    const result = Recipe.builder()
      .withId(RECIPE_ID)
      .withName("Pancakes")
      .withDifficulty(Difficulty.Easy)
      .withDuration(15)
      .withDescription("Fluffy pancakes")
      .withDirections("Mix and fry.")
      .build();

    expect(result.success).toBe(true);
    if (!result.success) return;
    const recipe = result.data;
    expect(recipe.id).toBe(RECIPE_ID);
    expect(recipe.name).toBe("Pancakes");
    expect(recipe.difficulty).toBe(Difficulty.Easy);
    expect(recipe.duration).toBe(15);
    expect(recipe.description).toBe("Fluffy pancakes");
    expect(recipe.directions).toBe("Mix and fry.");
    expect(recipe.ingredients).toEqual([]);
    expect(recipe.tags).toEqual([]);
    expect(recipe.img).toEqual(new Uint8Array(0));
  });

  it("reports duration when it is the only field left unset", () => {
    const builder = Recipe.builder();
    REQUIRED_FIELDS.filter((field) => field !== "duration").forEach((field) =>
      setField(builder, field)
    );

    const result = builder.build();

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MissingFieldError);
    expect(result.error.field).toBe("duration");
    expect(result.error.type).toBe(RecipeErrorType.MISSING_FIELD);
    expect(result.error.message).toBe("Cannot build recipe without duration set");
  });

  it("succeeds only when all six mandatory fields are set", () => {
    for (let mask = 0; mask < 1 << REQUIRED_FIELDS.length; mask++) {
      const builder = Recipe.builder();
      const chosen = REQUIRED_FIELDS.filter((_, i) => mask & (1 << i));
      chosen.forEach((field) => setField(builder, field));

      const result = builder.build();
      const firstUnset = REQUIRED_FIELDS.find((field) => !chosen.includes(field));

      if (firstUnset === undefined) {
        expect(result.success).toBe(true);
      } else {
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error.field).toBe(firstUnset);
      }
    }
  });

  it("reports id first on an empty builder, every time", () => {
    const first = Recipe.builder().build();
    const second = Recipe.builder().build();

    expect(first.success || first.error.field).toBe("id");
    expect(second.success || second.error.field).toBe("id");
  });

  it("follows the fixed check order regardless of the order fields are set", () => {
    const builder = Recipe.builder()
      .withDirections("Mix and fry.")
      .withDuration(15)
      .withId(RECIPE_ID);

    expect(builder.missingFields()).toEqual(["name", "difficulty", "description"]);
    const result = builder.build();
    expect(result.success || result.error.field).toBe("name");
  });

  it("keeps the last ingredient added under an id", () => {
    const recipe = completeBuilder()
      .addIngredient(new Ingredient(FLOUR_ID, "flour", "g", "200"))
      .addIngredient(new Ingredient(EGG_ID, "egg", "whole", "2"))
      .addIngredient(new Ingredient(FLOUR_ID, "spelt flour", "cup", "1.5"))
      .buildOrThrow();

    expect(recipe.ingredients).toHaveLength(2);
    const flour = recipe.getIngredient(FLOUR_ID);
    expect(flour?.name).toBe("spelt flour");
    expect(flour?.unit).toBe("cup");
    expect(flour?.measurement).toBe("1.5");
  });

  it("keeps one entry per tag text", () => {
    const recipe = completeBuilder()
      .addTag(new RecipeTag("breakfast"))
      .addTag(new RecipeTag("breakfast"))
      .buildOrThrow();

    expect(recipe.tags).toHaveLength(1);
    expect(recipe.tags[0].tag).toBe("breakfast");
  });

  it("lets the last write win for scalar fields", () => {
    const recipe = completeBuilder()
      .withName("A")
      .withName("B")
      .withDifficulty(Difficulty.Hard)
      .withDuration(90)
      .buildOrThrow();

    expect(recipe.name).toBe("B");
    expect(recipe.difficulty).toBe(Difficulty.Hard);
    expect(recipe.duration).toBe(90);
  });

  it("accepts empty text for every text field", () => {
    const recipe = Recipe.builder()
      .withId(RECIPE_ID)
      .withName("")
      .withDifficulty(Difficulty.Medium)
      .withDuration(0)
      .withDescription("")
      .withDirections("")
      .addTag(new RecipeTag(""))
      .buildOrThrow();

    expect(recipe.name).toBe("");
    expect(recipe.duration).toBe(0);
    expect(recipe.hasTag("")).toBe(true);
  });

  it("copies the image so later changes to the source do not leak in", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const builder = completeBuilder().withImage(bytes);
    bytes[0] = 9;

    expect(builder.buildOrThrow().img).toEqual(new Uint8Array([1, 2, 3]));
  });

  it("takes durations across the whole unsigned 16-bit range", () => {
    expect(completeBuilder().withDuration(65535).buildOrThrow().duration).toBe(
      65535
    );
  });

  it("stores a negative zero duration as zero", () => {
    const recipe = completeBuilder().withDuration(-0).buildOrThrow();

    expect(Object.is(recipe.duration, 0)).toBe(true);
  });

  it("treats differently cased spellings of an ingredient id as one ingredient", () => {
    const recipe = completeBuilder()
      .addIngredient(new Ingredient(FLOUR_ID, "flour", "g", "200"))
      .addIngredient(new Ingredient(FLOUR_ID.toUpperCase(), "rye flour", "g", "150"))
      .buildOrThrow();

    expect(recipe.ingredients).toHaveLength(1);
    expect(recipe.ingredients[0].id).toBe(FLOUR_ID);
    expect(recipe.ingredients[0].name).toBe("rye flour");
  });

  it("keeps the recipe id in lowercase form", () => {
    const recipe = completeBuilder().withId(RECIPE_ID.toUpperCase()).buildOrThrow();

    expect(recipe.id).toBe(RECIPE_ID);
  });

  it("rejects a recipe id that is not a UUID", () => {
    expect(() => Recipe.builder().withId("not a uuid")).toThrow(
      'Expected a UUID, got "not a uuid"'
    );
    expect(() => Recipe.builder().withId("not a uuid")).toThrow(RangeError);
  });

  it.each([-1, 65536, 1.5, Number.NaN])(
    "rejects %s as a duration",
    (minutes) => {
      expect(() => Recipe.builder().withDuration(minutes)).toThrow(RangeError);
    }
  );

  it("throws the missing field from buildOrThrow", () => {
    expect(() => Recipe.builder().withId(RECIPE_ID).buildOrThrow()).toThrow(
      new MissingFieldError("name")
    );
  });

  it("is consumed by a failed build as well", () => {
    const builder = Recipe.builder();
    REQUIRED_FIELDS.filter((field) => field !== "description").forEach(
      (field) => setField(builder, field)
    );

    expect(builder.build().success).toBe(false);
    for (const call of [
      () => builder.withDescription("Fluffy pancakes"),
      () => builder.missingFields(),
      () => builder.build(),
      () => builder.buildOrThrow(),
    ]) {
      expect(call).toThrow(RecipeBuildError);
      try {
        call();
      } catch (error) {
        expect(error).toMatchObject({ type: RecipeErrorType.BUILDER_CONSUMED });
      }
    }
  });

  it("is consumed by a successful build", () => {
    expect.assertions(4);
    const builder = completeBuilder();
    builder.buildOrThrow();

    expect(() => builder.withName("Waffles")).toThrow(RecipeBuildError);
    expect(() => builder.build()).toThrow(
      "Recipe builder was already used to build a recipe"
    );
    try {
      builder.addTag(new RecipeTag("brunch"));
    } catch (error) {
      expect(error).toBeInstanceOf(RecipeBuildError);
      expect(error).toMatchObject({ type: RecipeErrorType.BUILDER_CONSUMED });
    }
  });
});
