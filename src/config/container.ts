/**
 * Dependency injection container configuration.
 *
 * One container per simulation: the payoffs, the settings and every stateful
 * component (registry, runner) are singletons inside it, so two containers
 * never share state and several simulations can run in the same process.
 *
 * @module config
 */

import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";

import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { AgentRegistry } from "../domain/simulation/core/AgentRegistry";
import { EncounterEngine } from "../domain/simulation/core/EncounterEngine";
import { StrategyFactory } from "../domain/simulation/strategies/StrategyFactory";
import type { ISimulationReporter } from "../domain/simulation/ports";
import {
  createGameParams,
  type GameParams,
} from "../domain/types/simulation/payoffs";
import type { SimulationSettings } from "../domain/types/simulation/roster";
import { ConsoleReporter } from "../infrastructure/reporting/ConsoleReporter";
import { Logger, logger as sharedLogger } from "../infrastructure/utils/logger";

export interface ContainerOptions {
  logger?: Logger;
  reporter?: ISimulationReporter;
}

export function createContainer(
  settings: SimulationSettings,
  options: ContainerOptions = {},
): Container {
  const container = new Container();

  container
    .bind<SimulationSettings>(TYPES.SimulationSettings)
    .toConstantValue(settings);
  container
    .bind<GameParams>(TYPES.GameParams)
    .toConstantValue(createGameParams(settings.payoffs));
  container
    .bind<Logger>(TYPES.Logger)
    .toConstantValue(options.logger ?? sharedLogger);

  if (options.reporter) {
    container
      .bind<ISimulationReporter>(TYPES.SimulationReporter)
      .toConstantValue(options.reporter);
  } else {
    container
      .bind<ISimulationReporter>(TYPES.SimulationReporter)
      .toDynamicValue(() => new ConsoleReporter())
      .inSingletonScope();
  }

  container
    .bind<StrategyFactory>(TYPES.StrategyFactory)
    .to(StrategyFactory)
    .inSingletonScope();

  container
    .bind<AgentRegistry>(TYPES.AgentRegistry)
    .to(AgentRegistry)
    .inSingletonScope();

  container
    .bind<EncounterEngine>(TYPES.EncounterEngine)
    .to(EncounterEngine)
    .inSingletonScope();

  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}
