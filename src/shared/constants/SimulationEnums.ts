/**
 * Simulation lifecycle enumerations.
 *
 * @module shared/constants/SimulationEnums
 */

/**
 * Phases of the round loop.
 */
export enum SimulationPhase {
  IDLE = "idle",
  REPORTING = "reporting",
  ENCOUNTERING = "encountering",
  CULLING = "culling",
  FINISHED = "finished",
}

/**
 * Events that advance the round loop from one phase to the next.
 */
export enum PhaseEvent {
  ROUND_STARTED = "round_started",
  REPORT_SENT = "report_sent",
  ENCOUNTERS_DONE = "encounters_done",
  ROUNDS_EXHAUSTED = "rounds_exhausted",
}

/**
 * Names of the events emitted by a SimulationRunner.
 */
export enum SimulationEventType {
  POPULATION_CREATED = "population:created",
  ROUND_STARTED = "round:started",
  ENCOUNTER_RESOLVED = "encounter:resolved",
  AGENTS_CULLED = "agents:culled",
  POPULATION_EXTINCT = "population:extinct",
  SIMULATION_COMPLETED = "simulation:completed",
}
