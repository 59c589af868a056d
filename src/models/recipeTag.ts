/** A free-form label such as "vegetarian"; equal tags have equal text. */
export class RecipeTag {
  constructor(public readonly tag: string) {
    Object.freeze(this);
  }

  get key(): string {
    return this.tag;
  }

  equals(other: RecipeTag): boolean {
    return this.tag === other.tag;
  }

  toString(): string {
    return this.tag;
  }
}

export const tagKey = (tag: RecipeTag): string => tag.key;
