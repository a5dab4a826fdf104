import type { StrategyKind } from "../../../shared/constants/StrategyEnums";
import type { GameParams } from "./payoffs";

export interface ReputationTrackerDefinition {
  kind: StrategyKind.REPUTATION_TRACKER;
  optimistic: boolean;
  revenging: boolean;
  label?: string;
}

export interface RandomizedDefinition {
  kind: StrategyKind.RANDOMIZED;
  acceptProbability: number;
  cooperateProbability: number;
  label: string;
}

export interface AlwaysDefectDefinition {
  kind: StrategyKind.ALWAYS_DEFECT;
  label?: string;
}

export interface FixedPolicyDefinition {
  kind: StrategyKind.FIXED_POLICY;
  accepts: boolean;
  cooperates: boolean;
  label: string;
}

export type StrategyDefinition =
  | ReputationTrackerDefinition
  | RandomizedDefinition
  | AlwaysDefectDefinition
  | FixedPolicyDefinition;

export interface RosterEntry {
  strategy: StrategyDefinition;
  count: number;
}

/**
 * Everything needed to run one simulation.
 */
export interface SimulationSettings {
  rounds: number;
  initialEnergy: number;
  /** Base seed for randomized strategies; undefined means auto-seeded */
  seed?: string;
  payoffs: GameParams;
  roster: RosterEntry[];
}
