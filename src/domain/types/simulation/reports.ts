import type {
  BorrowingDecision,
  LendingDecision,
} from "../../../shared/constants/StrategyEnums";
import type { AgentSnapshot } from "./agents";

/** Aggregate for one strategy label. */
export interface StrategyStats {
  label: string;
  count: number;
  meanEnergy: number;
}

export interface EncounterResult {
  lenderId: number;
  borrowerId: number;
  decision: LendingDecision;
  /** Present only when the request was accepted */
  outcome?: BorrowingDecision;
  lenderDelta: number;
  borrowerDelta: number;
}

export interface EncounterTally {
  total: number;
  rejected: number;
  cooperated: number;
  defected: number;
}

export interface RoundReport {
  round: number;
  /** Statistics reported before the round's encounters */
  stats: StrategyStats[];
  encounters: EncounterTally;
  culledAgentIds: number[];
}

export interface SimulationResult {
  roundsPlayed: number;
  rounds: RoundReport[];
  finalStats: StrategyStats[];
  survivors: AgentSnapshot[];
}
