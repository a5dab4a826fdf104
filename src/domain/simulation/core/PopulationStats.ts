import type { Agent } from "../../types/simulation/agents";
import type {
  EncounterResult,
  EncounterTally,
  StrategyStats,
} from "../../types/simulation/reports";
import {
  BorrowingDecision,
  LendingDecision,
} from "@/shared/constants/StrategyEnums";

/**
 * Groups agents by strategy label.
 * @returns one entry per label, sorted by label in code-unit order
 */
export function summarizePopulation(agents: readonly Agent[]): StrategyStats[] {
  const totals = new Map<string, { count: number; energy: number }>();

  for (const agent of agents) {
    const label = agent.strategy.describeType();
    const entry = totals.get(label);
    if (entry) {
      entry.count += 1;
      entry.energy += agent.energy;
    } else {
      totals.set(label, { count: 1, energy: agent.energy });
    }
  }

  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([label, { count, energy }]) => ({
      label,
      count,
      meanEnergy: energy / count,
    }));
}

export function createEncounterTally(): EncounterTally {
  return { total: 0, rejected: 0, cooperated: 0, defected: 0 };
}

export function tallyEncounter(
  tally: EncounterTally,
  result: EncounterResult,
): void {
  tally.total += 1;
  if (result.decision === LendingDecision.REJECT) {
    tally.rejected += 1;
  } else if (result.outcome === BorrowingDecision.COOPERATE) {
    tally.cooperated += 1;
  } else {
    tally.defected += 1;
  }
}
