import type { RequiredField } from "./recipe.js";

export enum RecipeErrorType {
  MISSING_FIELD = "MISSING_FIELD",
  BUILDER_CONSUMED = "BUILDER_CONSUMED",
  INVALID_DRAFT = "INVALID_DRAFT",
}

export class RecipeBuildError extends Error {
  constructor(
    message: string,
    public type: RecipeErrorType,
    public details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "RecipeBuildError";
  }
}

export class MissingFieldError extends RecipeBuildError {
  constructor(public readonly field: RequiredField) {
    super(
      `Cannot build recipe without ${field} set`,
      RecipeErrorType.MISSING_FIELD,
      { field }
    );
    this.name = "MissingFieldError";
  }
}
