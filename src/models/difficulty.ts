import { Difficulty } from "../types/recipe.js";

export const DIFFICULTIES: readonly Difficulty[] = [
  Difficulty.Easy,
  Difficulty.Medium,
  Difficulty.Hard,
  Difficulty.Expert,
];

export function difficultyRank(difficulty: Difficulty): number {
  return DIFFICULTIES.indexOf(difficulty);
}

export function compareDifficulty(a: Difficulty, b: Difficulty): number {
  return difficultyRank(a) - difficultyRank(b);
}

/**
 * Case-insensitive lookup of a level name. Anything else is not a
 * difficulty and yields `undefined`.
 */
export function parseDifficulty(text: string): Difficulty | undefined {
  const wanted = text.trim().toLowerCase();
  return DIFFICULTIES.find((level) => level.toLowerCase() === wanted);
}
