import seedrandom from "seedrandom";

/**
 * Shared utility for unseeded random values (log ids and similar
 * bookkeeping). Anything that influences simulation outcomes must use a
 * {@link SeededRandom} owned by the consumer instead.
 */
export class RandomUtils {
  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return Math.random();
  }
}

/**
 * Per-instance random source backed by seedrandom's ARC4 generator.
 *
 * Every owner keeps its own instance, so two consumers never advance the
 * same generator state. Without a seed the generator is auto-seeded.
 */
export class SeededRandom {
  private readonly rng: seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

  constructor(
    public readonly seed?: string,
    state?: seedrandom.State.Arc4,
  ) {
    this.rng = state
      ? seedrandom("", { state })
      : seedrandom(seed, { state: true });
  }

  /**
   * Returns a float in [0, 1).
   */
  public float(): number {
    return this.rng();
  }

  /**
   * Returns true with the specified probability (0-1). A probability of 0
   * never succeeds and 1 always does.
   */
  public chance(probability: number): boolean {
    return this.rng() < probability;
  }

  /**
   * Independent generator that continues from the current state.
   */
  public fork(): SeededRandom {
    return new SeededRandom(this.seed, this.rng.state());
  }
}
