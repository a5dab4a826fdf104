import {
  BorrowingDecision,
  DEFAULT_STRATEGY_LABELS,
  LendingDecision,
  StrategyKind,
} from "../../../shared/constants/StrategyEnums";
import { ErrorCode, SimulationError } from "../../../shared/errors/SimulationError";
import { SeededRandom } from "../../../shared/utils/RandomUtils";
import type { LendingStrategy } from "./LendingStrategy";

export interface RandomizedStrategyOptions {
  acceptProbability: number;
  cooperateProbability: number;
  label: string;
  seed?: string;
}

function assertProbability(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new SimulationError(
      ErrorCode.InvalidConfiguration,
      `${name} must be within [0, 1], got ${value}`,
      { [name]: value },
    );
  }
}

/**
 * Memoryless policy: every decision is an independent draw from the
 * instance's own generator.
 */
export class RandomizedStrategy implements LendingStrategy {
  public readonly acceptProbability: number;
  public readonly cooperateProbability: number;
  private readonly label: string;
  private readonly random: SeededRandom;

  constructor(options: RandomizedStrategyOptions, random?: SeededRandom) {
    assertProbability("acceptProbability", options.acceptProbability);
    assertProbability("cooperateProbability", options.cooperateProbability);

    this.acceptProbability = options.acceptProbability;
    this.cooperateProbability = options.cooperateProbability;
    this.label = options.label;
    this.random = random ?? new SeededRandom(options.seed);
  }

  public acceptOrRejectRequest(_borrowerId: number): LendingDecision {
    return this.random.chance(this.acceptProbability)
      ? LendingDecision.ACCEPT
      : LendingDecision.REJECT;
  }

  public notifyAboutRejection(_lenderId: number): void {}

  public coopOrDefect(_lenderId: number): BorrowingDecision {
    return this.random.chance(this.cooperateProbability)
      ? BorrowingDecision.COOPERATE
      : BorrowingDecision.DEFECT;
  }

  public notifyCoopOrDefect(_borrowerId: number, _cooperated: boolean): void {}

  public describeType(): string {
    return this.label;
  }

  public clone(): RandomizedStrategy {
    return new RandomizedStrategy(
      {
        acceptProbability: this.acceptProbability,
        cooperateProbability: this.cooperateProbability,
        label: this.label,
      },
      this.random.fork(),
    );
  }
}

/**
 * Adversarial baseline: never lends and never cooperates.
 */
export function alwaysDefect(
  label: string = DEFAULT_STRATEGY_LABELS[StrategyKind.ALWAYS_DEFECT],
): RandomizedStrategy {
  return new RandomizedStrategy({
    acceptProbability: 0,
    cooperateProbability: 0,
    label,
  });
}
