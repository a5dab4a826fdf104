import "reflect-metadata";

// Configuration + container
export { TYPES } from "./config/Types";
export { createContainer } from "./config/container";
export type { ContainerOptions } from "./config/container";
export {
  loadSimulationSettings,
  parseSimulationSettings,
  simulationSettingsSchema,
} from "./config/simulationConfig";

// Strategies
export type { LendingStrategy } from "./domain/simulation/strategies/LendingStrategy";
export { ReputationTrackerStrategy } from "./domain/simulation/strategies/ReputationTrackerStrategy";
export type { ReputationTrackerOptions } from "./domain/simulation/strategies/ReputationTrackerStrategy";
export {
  RandomizedStrategy,
  alwaysDefect,
} from "./domain/simulation/strategies/RandomizedStrategy";
export type { RandomizedStrategyOptions } from "./domain/simulation/strategies/RandomizedStrategy";
export {
  FixedPolicyStrategy,
  alwaysCooperate,
} from "./domain/simulation/strategies/FixedPolicyStrategy";
export { StrategyFactory } from "./domain/simulation/strategies/StrategyFactory";

// Core
export { AgentRegistry } from "./domain/simulation/core/AgentRegistry";
export { EncounterEngine } from "./domain/simulation/core/EncounterEngine";
export { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
export type { SimulationEventMap } from "./domain/simulation/core/SimulationRunner";
export { summarizePopulation } from "./domain/simulation/core/PopulationStats";
export { transition } from "./domain/simulation/core/phaseMachine";
export {
  DEFAULT_PAYOFFS,
  SIM_CONSTANTS,
  createDefaultSettings,
} from "./domain/simulation/core/SimulationConstants";
export type { ISimulationReporter } from "./domain/simulation/ports";
export { ConsoleReporter } from "./infrastructure/reporting/ConsoleReporter";

// Types
export type {
  Agent,
  AgentDefinition,
  AgentSnapshot,
  StrategyFactoryFn,
} from "./domain/types/simulation/agents";
export { createGameParams } from "./domain/types/simulation/payoffs";
export type { GameParams } from "./domain/types/simulation/payoffs";
export type {
  EncounterResult,
  EncounterTally,
  RoundReport,
  SimulationResult,
  StrategyStats,
} from "./domain/types/simulation/reports";
export type {
  RosterEntry,
  SimulationSettings,
  StrategyDefinition,
} from "./domain/types/simulation/roster";

// Shared
export {
  BorrowingDecision,
  LendingDecision,
  StrategyKind,
} from "./shared/constants/StrategyEnums";
export {
  PhaseEvent,
  SimulationEventType,
  SimulationPhase,
} from "./shared/constants/SimulationEnums";
export { ErrorCode, SimulationError } from "./shared/errors/SimulationError";
export { Logger, logger } from "./infrastructure/utils/logger";
export { SeededRandom } from "./shared/utils/RandomUtils";
