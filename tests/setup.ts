import "reflect-metadata";
import { Logger } from "../src/infrastructure/utils/logger";
import { LogLevel } from "../src/shared/constants/LogEnums";
import type { ISimulationReporter } from "../src/domain/simulation/ports";
import type { LendingStrategy } from "../src/domain/simulation/strategies/LendingStrategy";
import type {
  Agent,
  AgentSnapshot,
} from "../src/domain/types/simulation/agents";
import {
  createGameParams,
  type GameParams,
} from "../src/domain/types/simulation/payoffs";
import type {
  SimulationResult,
  StrategyStats,
} from "../src/domain/types/simulation/reports";

/** Payoffs of the reference game. */
export const TEST_PARAMS: GameParams = createGameParams({
  lenderCoop: -1,
  lenderDefect: -3,
  borrowerCoop: 2,
  borrowerDefect: 3,
});

/**
 * Logger that keeps everything in memory and prints nothing.
 */
export function createSilentLogger(): Logger {
  return new Logger({ console: false, minLevel: LogLevel.DEBUG });
}

export function createTestAgent(
  id: number,
  strategy: LendingStrategy,
  energy = 256,
): Agent {
  return { id, energy, strategy };
}

/**
 * Reporter double that records every call in order.
 */
export class RecordingReporter implements ISimulationReporter {
  public readonly populations: AgentSnapshot[][] = [];
  public readonly rounds: { round: number; stats: StrategyStats[] }[] = [];
  public readonly completions: SimulationResult[] = [];
  public readonly calls: string[] = [];

  reportPopulation(agents: readonly AgentSnapshot[]): void {
    this.calls.push("population");
    this.populations.push([...agents]);
  }

  reportRound(round: number, stats: readonly StrategyStats[]): void {
    this.calls.push(`round:${round}`);
    this.rounds.push({ round, stats: [...stats] });
  }

  reportCompletion(result: SimulationResult): void {
    this.calls.push("completion");
    this.completions.push(result);
  }
}
