import { EventEmitter } from "node:events";
import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { Logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import {
  PhaseEvent,
  SimulationEventType,
  SimulationPhase,
} from "@/shared/constants/SimulationEnums";
import { ErrorCode, SimulationError } from "@/shared/errors/SimulationError";
import type { ISimulationReporter } from "../ports";
import type { StrategyFactory } from "../strategies/StrategyFactory";
import {
  toAgentSnapshot,
  type AgentDefinition,
  type AgentSnapshot,
} from "../../types/simulation/agents";
import type {
  EncounterResult,
  RoundReport,
  SimulationResult,
  StrategyStats,
} from "../../types/simulation/reports";
import type { SimulationSettings } from "../../types/simulation/roster";
import type { AgentRegistry } from "./AgentRegistry";
import type { EncounterEngine } from "./EncounterEngine";
import {
  createEncounterTally,
  summarizePopulation,
  tallyEncounter,
} from "./PopulationStats";
import { transition } from "./phaseMachine";

export interface SimulationEventMap {
  [SimulationEventType.POPULATION_CREATED]: AgentSnapshot[];
  [SimulationEventType.ROUND_STARTED]: { round: number; stats: StrategyStats[] };
  [SimulationEventType.ENCOUNTER_RESOLVED]: EncounterResult & { round: number };
  [SimulationEventType.AGENTS_CULLED]: { round: number; agentIds: number[] };
  [SimulationEventType.POPULATION_EXTINCT]: { round: number };
  [SimulationEventType.SIMULATION_COMPLETED]: SimulationResult;
}

/**
 * Drives the round loop.
 *
 * Each round: report the population, let every pair (i, j) with i < j meet
 * twice (i lends to j, then j lends to i), then cull agents at or below zero
 * energy. The configured number of rounds is always played, also once the
 * population is gone.
 */
@injectable()
export class SimulationRunner {
  private readonly emitter = new EventEmitter();
  private readonly history: RoundReport[] = [];
  private phase: SimulationPhase = SimulationPhase.IDLE;
  private nextRound = 0;
  private initialized = false;

  constructor(
    @inject(TYPES.SimulationSettings)
    private readonly settings: SimulationSettings,
    @inject(TYPES.AgentRegistry) private readonly registry: AgentRegistry,
    @inject(TYPES.EncounterEngine) private readonly engine: EncounterEngine,
    @inject(TYPES.StrategyFactory) private readonly strategies: StrategyFactory,
    @inject(TYPES.SimulationReporter)
    private readonly reporter: ISimulationReporter,
    @inject(TYPES.Logger) private readonly logger: Logger,
  ) {}

  on<K extends keyof SimulationEventMap>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof SimulationEventMap>(
    event: K,
    listener: (payload: SimulationEventMap[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<K extends keyof SimulationEventMap>(
    event: K,
    payload: SimulationEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  /**
   * Builds the initial population, one agent per factory call, in roster
   * order. Defaults to the roster of the injected settings.
   */
  public initialize(definitions?: AgentDefinition[]): AgentSnapshot[] {
    if (this.initialized || this.phase !== SimulationPhase.IDLE) {
      throw new SimulationError(
        ErrorCode.InvalidPhaseTransition,
        "Population can only be built once, before the first round",
        { phase: this.phase },
      );
    }

    const roster =
      definitions ?? this.strategies.createDefinitions(this.settings.roster);
    for (const { factory, count } of roster) {
      for (let n = 0; n < count; n++) {
        this.registry.spawn(
          this.strategies.build(factory),
          this.settings.initialEnergy,
        );
      }
    }
    this.initialized = true;

    const snapshot = this.registry.getAll().map(toAgentSnapshot);
    this.logger.info(
      `🚀 Population ready: ${snapshot.length} agents, ${this.settings.rounds} rounds`,
      LogCategory.SIMULATION,
    );
    this.reporter.reportPopulation(snapshot);
    this.emit(SimulationEventType.POPULATION_CREATED, snapshot);
    return snapshot;
  }

  /**
   * Plays a single round.
   */
  public runRound(): RoundReport {
    if (!this.initialized) {
      throw new SimulationError(
        ErrorCode.InvalidPhaseTransition,
        "initialize() must run before the first round",
      );
    }
    if (this.nextRound >= this.settings.rounds) {
      throw new SimulationError(
        ErrorCode.InvalidPhaseTransition,
        `All ${this.settings.rounds} rounds have already been played`,
        { phase: this.phase },
      );
    }

    const round = this.nextRound;
    this.advance(PhaseEvent.ROUND_STARTED);
    this.logger.setRound(round);

    const stats = summarizePopulation(this.registry.getAll());
    this.reporter.reportRound(round, stats);
    this.emit(SimulationEventType.ROUND_STARTED, { round, stats });
    this.advance(PhaseEvent.REPORT_SENT);

    const tally = createEncounterTally();
    const size = this.registry.size;
    for (let i = 0; i < size; i++) {
      for (let j = i + 1; j < size; j++) {
        const first = this.engine.encounter(
          this.registry.at(i),
          this.registry.at(j),
        );
        tallyEncounter(tally, first);
        this.emit(SimulationEventType.ENCOUNTER_RESOLVED, { ...first, round });

        const second = this.engine.encounter(
          this.registry.at(j),
          this.registry.at(i),
        );
        tallyEncounter(tally, second);
        this.emit(SimulationEventType.ENCOUNTER_RESOLVED, { ...second, round });
      }
    }
    this.advance(PhaseEvent.ENCOUNTERS_DONE);

    const culledAgentIds = this.registry.cullDepleted();
    if (culledAgentIds.length > 0) {
      this.emit(SimulationEventType.AGENTS_CULLED, {
        round,
        agentIds: culledAgentIds,
      });
      if (this.registry.size === 0) {
        this.logger.warn(
          `☠️ Population extinct after round ${round}`,
          LogCategory.POPULATION,
        );
        this.emit(SimulationEventType.POPULATION_EXTINCT, { round });
      }
    }

    this.logger.debug(
      `Round ${round}: ${tally.total} encounters, ${tally.rejected} rejected, ${tally.defected} defections, ${culledAgentIds.length} culled`,
      LogCategory.SIMULATION,
    );

    const report: RoundReport = {
      round,
      stats,
      encounters: tally,
      culledAgentIds,
    };
    this.history.push(report);
    this.nextRound += 1;
    return report;
  }

  /**
   * Plays every remaining round and reports the final standings. Builds the
   * population from the settings first when that has not happened yet.
   */
  public run(): SimulationResult {
    if (this.phase === SimulationPhase.FINISHED) {
      throw new SimulationError(
        ErrorCode.InvalidPhaseTransition,
        "Simulation has already finished",
      );
    }
    if (!this.initialized) {
      this.initialize();
    }

    while (this.nextRound < this.settings.rounds) {
      this.runRound();
    }

    this.advance(PhaseEvent.ROUNDS_EXHAUSTED);
    this.logger.setRound(undefined);

    const result: SimulationResult = {
      roundsPlayed: this.history.length,
      rounds: [...this.history],
      finalStats: summarizePopulation(this.registry.getAll()),
      survivors: this.registry.getAll().map(toAgentSnapshot),
    };

    this.logger.info(
      `🏁 Simulation finished after ${result.roundsPlayed} rounds with ${result.survivors.length} survivors`,
      LogCategory.SIMULATION,
    );
    this.reporter.reportCompletion(result);
    this.emit(SimulationEventType.SIMULATION_COMPLETED, result);
    return result;
  }

  public getPhase(): SimulationPhase {
    return this.phase;
  }

  /** Index of the round that will be played next. */
  public getNextRound(): number {
    return this.nextRound;
  }

  public getHistory(): readonly RoundReport[] {
    return this.history;
  }

  public getAgents(): AgentSnapshot[] {
    return this.registry.getAll().map(toAgentSnapshot);
  }

  private advance(event: PhaseEvent): void {
    const next = transition(this.phase, event);
    if (next === null) {
      throw new SimulationError(
        ErrorCode.InvalidPhaseTransition,
        `Cannot apply ${event} while ${this.phase}`,
        { phase: this.phase, event },
      );
    }
    this.phase = next;
  }
}
