import type { LendingStrategy } from "../../simulation/strategies/LendingStrategy";

/**
 * Participant of the simulation. `id` comes from a monotonic counter and is
 * never reused within a run; `energy` is mutated by encounters only.
 */
export interface Agent {
  readonly id: number;
  energy: number;
  readonly strategy: LendingStrategy;
}

/** Read-only view handed to reporters and event listeners. */
export interface AgentSnapshot {
  id: number;
  energy: number;
  strategyLabel: string;
}

export type StrategyFactoryFn = () => LendingStrategy;

/**
 * One roster line: how many agents to create with a given strategy factory.
 */
export interface AgentDefinition {
  factory: StrategyFactoryFn;
  count: number;
}

export function toAgentSnapshot(agent: Agent): AgentSnapshot {
  return {
    id: agent.id,
    energy: agent.energy,
    strategyLabel: agent.strategy.describeType(),
  };
}
