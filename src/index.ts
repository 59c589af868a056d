export {
  Difficulty,
  MAX_DURATION_MINUTES,
  REQUIRED_FIELDS,
  toDuration,
  toUuid,
} from "./types/recipe.js";
export type { RecipeFields, RequiredField, Uuid } from "./types/recipe.js";
export {
  MissingFieldError,
  RecipeBuildError,
  RecipeErrorType,
} from "./types/errors.js";
export {
  DIFFICULTIES,
  compareDifficulty,
  difficultyRank,
  parseDifficulty,
} from "./models/difficulty.js";
export { Ingredient } from "./models/ingredient.js";
export { RecipeTag } from "./models/recipeTag.js";
export { Recipe } from "./models/recipe.js";
export { RecipeBuilder } from "./models/recipeBuilder.js";
export type { BuildResult } from "./models/recipeBuilder.js";
export {
  RecipeDraftSchema,
  checkDraft,
  draftToBuilder,
  parseDraft,
} from "./utils/draft.js";
export type { DraftReport, RecipeDraft } from "./utils/draft.js";
