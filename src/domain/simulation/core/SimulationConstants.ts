/**
 * Centralized defaults for the lending simulation.
 *
 * Usage:
 * import { SIM_CONSTANTS } from '../core/SimulationConstants';
 * const energy = SIM_CONSTANTS.INITIAL_ENERGY;
 */
import { StrategyKind } from "@/shared/constants/StrategyEnums";
import type { GameParams } from "../../types/simulation/payoffs";
import type { SimulationSettings } from "../../types/simulation/roster";

export const SIM_CONSTANTS = {
  INITIAL_ENERGY: 256,
  ROUNDS: 20,

  // === Default roster ===
  REPUTATION_TRACKERS: 32,
  DEFECTORS: 16,
} as const;

export const DEFAULT_PAYOFFS: GameParams = {
  // steals the device
  borrowerDefect: 3,
  // uses the device
  borrowerCoop: 2,
  // loses the device
  lenderDefect: -3,
  // lending effort + device wear
  lenderCoop: -1,
};

export function createDefaultSettings(): SimulationSettings {
  return {
    rounds: SIM_CONSTANTS.ROUNDS,
    initialEnergy: SIM_CONSTANTS.INITIAL_ENERGY,
    payoffs: { ...DEFAULT_PAYOFFS },
    roster: [
      {
        strategy: {
          kind: StrategyKind.REPUTATION_TRACKER,
          optimistic: true,
          revenging: false,
        },
        count: SIM_CONSTANTS.REPUTATION_TRACKERS,
      },
      {
        strategy: { kind: StrategyKind.ALWAYS_DEFECT },
        count: SIM_CONSTANTS.DEFECTORS,
      },
    ],
  };
}
