/* eslint-disable no-console */
import { injectable, unmanaged } from "inversify";
import type { ISimulationReporter } from "@/domain/simulation/ports";
import type { AgentSnapshot } from "@/domain/types/simulation/agents";
import type {
  SimulationResult,
  StrategyStats,
} from "@/domain/types/simulation/reports";

export type LineSink = (line: string) => void;

/**
 * Plain-text reporter. Every line goes through `sink`, which defaults to
 * `console.log`.
 */
@injectable()
export class ConsoleReporter implements ISimulationReporter {
  private readonly sink: LineSink;

  constructor(@unmanaged() sink?: LineSink) {
    this.sink = sink ?? ((line) => console.log(line));
  }

  public reportPopulation(agents: readonly AgentSnapshot[]): void {
    for (const agent of agents) {
      this.sink(`${agent.id}|${agent.energy}|${agent.strategyLabel}`);
    }
    this.sink("");
  }

  public reportRound(round: number, stats: readonly StrategyStats[]): void {
    this.sink(`Round ${round}.`);
    this.writeStats(stats);
  }

  public reportCompletion(result: SimulationResult): void {
    this.sink(`Final standings after ${result.roundsPlayed} rounds.`);
    this.writeStats(result.finalStats);
  }

  private writeStats(stats: readonly StrategyStats[]): void {
    for (const entry of stats) {
      this.sink(`${entry.label}:`);
      this.sink(` - count: ${entry.count}`);
      this.sink(` - mean energy: ${entry.meanEnergy}`);
    }
    this.sink("");
  }
}
