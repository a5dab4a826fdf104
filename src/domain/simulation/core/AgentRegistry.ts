/**
 * AgentRegistry - owner of the living population.
 *
 * Agents are kept in creation order, which is also the order pairs are
 * visited in during a round. Ids come from a monotonic counter and are never
 * handed out twice, even after the agent holding one has been culled.
 *
 * @module core
 */

import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { Logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import { ErrorCode, SimulationError } from "@/shared/errors/SimulationError";
import type { LendingStrategy } from "../strategies/LendingStrategy";
import type { Agent } from "../../types/simulation/agents";

@injectable()
export class AgentRegistry {
  private agents: Agent[] = [];
  private index = new Map<number, Agent>();
  private nextId = 0;

  constructor(@inject(TYPES.Logger) private readonly logger: Logger) {}

  /**
   * Creates an agent with the next free id.
   */
  public spawn(strategy: LendingStrategy, energy: number): Agent {
    const agent: Agent = { id: this.nextId, energy, strategy };
    this.register(agent);
    return agent;
  }

  /**
   * Adds an externally built agent. Its id must not have been handed out
   * before, culled agents included; the id counter moves past it.
   */
  public register(agent: Agent): void {
    if (agent.id < this.nextId) {
      throw new SimulationError(
        ErrorCode.DuplicateAgentId,
        this.index.has(agent.id)
          ? `Agent id ${agent.id} is already registered`
          : `Agent id ${agent.id} was already used in this run`,
        { agentId: agent.id, nextId: this.nextId },
      );
    }
    this.agents.push(agent);
    this.index.set(agent.id, agent);
    this.nextId = Math.max(this.nextId, agent.id + 1);
  }

  public mustGet(id: number): Agent {
    const agent = this.index.get(id);
    if (!agent) {
      throw new SimulationError(
        ErrorCode.InvariantViolation,
        `Unknown agent id ${id}`,
        { agentId: id },
      );
    }
    return agent;
  }

  /** Position-ordered view of the living population. */
  public getAll(): readonly Agent[] {
    return this.agents;
  }

  public at(position: number): Agent {
    const agent = this.agents[position];
    if (!agent) {
      throw new SimulationError(
        ErrorCode.InvariantViolation,
        `No agent at position ${position}`,
        { position, size: this.agents.length },
      );
    }
    return agent;
  }

  public get size(): number {
    return this.agents.length;
  }

  /**
   * Removes every agent whose energy is zero or below.
   * @returns ids of the removed agents, in population order
   */
  public cullDepleted(): number[] {
    const culled: number[] = [];
    const survivors: Agent[] = [];

    for (const agent of this.agents) {
      if (agent.energy > 0) {
        survivors.push(agent);
        continue;
      }
      culled.push(agent.id);
      this.index.delete(agent.id);
      this.logger.agentLog(
        LogLevel.DEBUG,
        LogCategory.POPULATION,
        agent.id,
        `💀 culled with energy ${agent.energy} (${agent.strategy.describeType()})`,
      );
    }

    this.agents = survivors;
    return culled;
  }
}
