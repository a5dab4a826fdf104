/**
 * Port interfaces for the simulation
 *
 * These interfaces let the round loop talk to its collaborators without
 * depending on concrete implementations.
 *
 * @module domain/simulation/ports
 */

import type { AgentSnapshot } from "../../types/simulation/agents";
import type {
  SimulationResult,
  StrategyStats,
} from "../../types/simulation/reports";

/**
 * Port for the reporting collaborator
 *
 * Write-only: the runner never reads anything back.
 */
export interface ISimulationReporter {
  /**
   * Full listing of the freshly built population
   */
  reportPopulation(agents: readonly AgentSnapshot[]): void;

  /**
   * Aggregates emitted before the encounters of `round`
   */
  reportRound(round: number, stats: readonly StrategyStats[]): void;

  /**
   * Standings once every configured round has been played
   */
  reportCompletion(result: SimulationResult): void;
}
