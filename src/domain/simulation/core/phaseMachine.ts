import { PhaseEvent, SimulationPhase } from "@/shared/constants/SimulationEnums";

/** Terminal phases that do not accept any transitions. */
const TERMINAL_PHASES: ReadonlySet<SimulationPhase> = new Set([
  SimulationPhase.FINISHED,
]);

/**
 * Valid phase transitions.
 * Key: current phase → map of event → next phase.
 */
const TRANSITIONS: Record<
  SimulationPhase,
  Partial<Record<PhaseEvent, SimulationPhase>>
> = {
  [SimulationPhase.IDLE]: {
    [PhaseEvent.ROUND_STARTED]: SimulationPhase.REPORTING,
    [PhaseEvent.ROUNDS_EXHAUSTED]: SimulationPhase.FINISHED,
  },
  [SimulationPhase.REPORTING]: {
    [PhaseEvent.REPORT_SENT]: SimulationPhase.ENCOUNTERING,
  },
  [SimulationPhase.ENCOUNTERING]: {
    [PhaseEvent.ENCOUNTERS_DONE]: SimulationPhase.CULLING,
  },
  [SimulationPhase.CULLING]: {
    [PhaseEvent.ROUND_STARTED]: SimulationPhase.REPORTING,
    [PhaseEvent.ROUNDS_EXHAUSTED]: SimulationPhase.FINISHED,
  },
  [SimulationPhase.FINISHED]: {},
};

/**
 * Attempt a phase transition. Returns the new phase if valid, or null if the
 * transition is not allowed.
 */
export function transition(
  current: SimulationPhase,
  event: PhaseEvent,
): SimulationPhase | null {
  if (TERMINAL_PHASES.has(current)) {
    return null;
  }
  return TRANSITIONS[current][event] ?? null;
}
