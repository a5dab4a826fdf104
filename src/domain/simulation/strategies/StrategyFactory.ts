import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { Logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { StrategyKind } from "../../../shared/constants/StrategyEnums";
import {
  ErrorCode,
  SimulationError,
  describeError,
  isSimulationError,
} from "../../../shared/errors/SimulationError";
import type {
  AgentDefinition,
  StrategyFactoryFn,
} from "../../types/simulation/agents";
import type { GameParams } from "../../types/simulation/payoffs";
import type {
  RosterEntry,
  SimulationSettings,
  StrategyDefinition,
} from "../../types/simulation/roster";
import { FixedPolicyStrategy } from "./FixedPolicyStrategy";
import type { LendingStrategy } from "./LendingStrategy";
import { RandomizedStrategy, alwaysDefect } from "./RandomizedStrategy";
import { ReputationTrackerStrategy } from "./ReputationTrackerStrategy";

/**
 * Turns roster definitions into strategy factories.
 *
 * Randomized instances get the seed `<baseSeed>:<label>:<n>`, `n` counting
 * the instances built by that factory, so a seeded run replays exactly.
 */
@injectable()
export class StrategyFactory {
  private readonly baseSeed?: string;

  constructor(
    @inject(TYPES.GameParams) private readonly params: GameParams,
    @inject(TYPES.SimulationSettings) settings: SimulationSettings,
    @inject(TYPES.Logger) private readonly logger: Logger,
  ) {
    this.baseSeed = settings.seed;
  }

  public createFactory(definition: StrategyDefinition): StrategyFactoryFn {
    switch (definition.kind) {
      case StrategyKind.REPUTATION_TRACKER:
        return () =>
          new ReputationTrackerStrategy(this.params, {
            optimistic: definition.optimistic,
            revenging: definition.revenging,
            label: definition.label,
          });
      case StrategyKind.RANDOMIZED: {
        let instances = 0;
        return () =>
          new RandomizedStrategy({
            acceptProbability: definition.acceptProbability,
            cooperateProbability: definition.cooperateProbability,
            label: definition.label,
            seed: this.seedFor(definition.label, instances++),
          });
      }
      case StrategyKind.ALWAYS_DEFECT:
        return () => alwaysDefect(definition.label);
      case StrategyKind.FIXED_POLICY:
        return () =>
          new FixedPolicyStrategy({
            accepts: definition.accepts,
            cooperates: definition.cooperates,
            label: definition.label,
          });
    }
  }

  public createDefinitions(roster: RosterEntry[]): AgentDefinition[] {
    return roster.map((entry) => ({
      factory: this.createFactory(entry.strategy),
      count: entry.count,
    }));
  }

  /**
   * Invokes a factory, converting any failure into a fatal startup error.
   */
  public build(factory: StrategyFactoryFn): LendingStrategy {
    try {
      return factory();
    } catch (error) {
      this.logger.error(
        `Strategy construction failed: ${describeError(error)}`,
        LogCategory.STRATEGY,
      );
      throw new SimulationError(
        ErrorCode.StrategyConstructionFailed,
        `Strategy construction failed: ${describeError(error)}`,
        isSimulationError(error) ? { cause: error.code, ...error.details } : undefined,
      );
    }
  }

  private seedFor(label: string, index: number): string | undefined {
    return this.baseSeed === undefined
      ? undefined
      : `${this.baseSeed}:${label}:${index}`;
  }
}
