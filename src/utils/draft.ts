import { z } from "zod";
import YAML from "yaml";
import { validate as isUuid } from "uuid";
import { MAX_DURATION_MINUTES } from "../types/recipe.js";
import type { RequiredField } from "../types/recipe.js";
import type { DraftFormat } from "../types/config.js";
import {
  MissingFieldError,
  RecipeBuildError,
  RecipeErrorType,
} from "../types/errors.js";
import { parseDifficulty } from "../models/difficulty.js";
import { Ingredient } from "../models/ingredient.js";
import { RecipeTag } from "../models/recipeTag.js";
import { Recipe } from "../models/recipe.js";
import type { RecipeBuilder } from "../models/recipeBuilder.js";
import { debug } from "./debug.js";

const UuidSchema = z.string().refine(isUuid, "Invalid uuid");

const IngredientDraftSchema = z.object({
  id: UuidSchema,
  name: z.string(),
  unit: z.string(),
  measurement: z.string(),
});

/**
 * Shape of a recipe draft file. Every field may be left out: whether the
 * draft is complete is the builder's call, not the schema's.
 */
export const RecipeDraftSchema = z.object({
  id: UuidSchema.optional(),
  name: z.string().optional(),
  difficulty: z
    .string()
    .transform((value, ctx) => {
      const difficulty = parseDifficulty(value);
      if (!difficulty) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown difficulty "${value}" (expected Easy, Medium, Hard or Expert)`,
        });
        return z.NEVER;
      }
      return difficulty;
    })
    .optional(),
  duration: z.number().int().min(0).max(MAX_DURATION_MINUTES).optional(),
  description: z.string().optional(),
  directions: z.string().optional(),
  ingredients: z.array(IngredientDraftSchema).default([]),
  tags: z.array(z.string()).default([]),
  image: z.string().base64().optional(), // picture bytes, base64-encoded
});

export type RecipeDraft = z.infer<typeof RecipeDraftSchema>;

export type DraftReport =
  | { ok: true; recipe: Recipe }
  | { ok: false; missing: RequiredField[]; error: MissingFieldError };

export function parseDraft(content: string, format: DraftFormat): RecipeDraft {
  let raw: unknown;
  try {
    raw = format === "yaml" ? YAML.parse(content) : JSON.parse(content);
  } catch (error) {
    throw new RecipeBuildError(
      `Draft is not valid ${format.toUpperCase()}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      RecipeErrorType.INVALID_DRAFT,
      { format }
    );
  }

  const result = RecipeDraftSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new RecipeBuildError(
      `Invalid recipe draft: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "draft"}: ${issue.message}`)
        .join("; ")}`,
      RecipeErrorType.INVALID_DRAFT,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

/** Feeds whatever the draft holds into a fresh builder. */
export function draftToBuilder(draft: RecipeDraft): RecipeBuilder {
  const builder = Recipe.builder();

  if (draft.id !== undefined) builder.withId(draft.id);
  if (draft.name !== undefined) builder.withName(draft.name);
  if (draft.difficulty !== undefined) builder.withDifficulty(draft.difficulty);
  if (draft.duration !== undefined) builder.withDuration(draft.duration);
  if (draft.description !== undefined)
    builder.withDescription(draft.description);
  if (draft.directions !== undefined) builder.withDirections(draft.directions);

  for (const { id, name, unit, measurement } of draft.ingredients) {
    builder.addIngredient(new Ingredient(id, name, unit, measurement));
  }
  for (const tag of draft.tags) {
    builder.addTag(new RecipeTag(tag));
  }
  if (draft.image !== undefined) {
    builder.withImage(Buffer.from(draft.image, "base64"));
  }

  return builder;
}

export function checkDraft(content: string, format: DraftFormat): DraftReport {
  const draft = parseDraft(content, format);
  debug("Parsed draft", draft);

  const builder = draftToBuilder(draft);
  const missing = builder.missingFields();
  const result = builder.build();

  if (!result.success) {
    debug(`Draft incomplete, first missing field: ${result.error.field}`);
    return { ok: false, missing, error: result.error };
  }
  return { ok: true, recipe: result.data };
}
