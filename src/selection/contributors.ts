import type { Contributor, Rng } from "../core/index.js";

/**
 * Fixed set of identities that commits are attributed to. Each repository
 * draws its own subset without replacement.
 */
export class ContributorPool {
  private readonly members: readonly Contributor[];

  public constructor(members: readonly Contributor[]) {
    if (members.length === 0) {
      throw new RangeError("ContributorPool needs at least one contributor");
    }
    this.members = [...members];
  }

  public get size(): number {
    return this.members.length;
  }

  public list(): readonly Contributor[] {
    return this.members;
  }

  /** Draw between 1 and `min(maxCount, size)` distinct contributors. */
  public draw(rng: Rng, maxCount: number): Contributor[] {
    const upper = Math.max(1, Math.min(maxCount, this.members.length));
    const count = rng.int(1, upper);
    return rng.sample(this.members, count);
  }
}
