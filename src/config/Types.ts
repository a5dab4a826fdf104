/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 * Each symbol represents a unique service or value.
 *
 * @module config
 */
export const TYPES = {
  SimulationRunner: Symbol.for("SimulationRunner"),
  SimulationSettings: Symbol.for("SimulationSettings"),
  GameParams: Symbol.for("GameParams"),
  Logger: Symbol.for("Logger"),

  StrategyFactory: Symbol.for("StrategyFactory"),
  AgentRegistry: Symbol.for("AgentRegistry"),
  EncounterEngine: Symbol.for("EncounterEngine"),
  SimulationReporter: Symbol.for("SimulationReporter"),
};
