export const ErrorCode = {
  InvalidConfiguration: "INVALID_CONFIGURATION",
  StrategyConstructionFailed: "STRATEGY_CONSTRUCTION_FAILED",
  DuplicateAgentId: "DUPLICATE_AGENT_ID",
  InvariantViolation: "INVARIANT_VIOLATION",
  InvalidPhaseTransition: "INVALID_PHASE_TRANSITION",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class SimulationError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "SimulationError";
  }
}

export const isSimulationError = (error: unknown): error is SimulationError =>
  error instanceof SimulationError;

/**
 * Flattens any thrown value into a loggable message.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
