import { CONFIG, envOverrides } from "../config/config";
import { createContainer } from "../config/container";
import { loadSimulationSettings } from "../config/simulationConfig";
import { TYPES } from "../config/Types";
import type { SimulationRunner } from "../domain/simulation/core/SimulationRunner";
import { logger } from "../infrastructure/utils/logger";
import { LogCategory } from "../shared/constants/LogEnums";
import {
  describeError,
  isSimulationError,
} from "../shared/errors/SimulationError";

/**
 * Process entry point.
 *
 * Loads the settings file, builds the population and plays every configured
 * round, printing the report to stdout. Any startup failure is fatal and
 * sets a non-zero exit code.
 *
 * @module application
 */
function main(): void {
  logger.info("🎲 Lending simulation starting...", LogCategory.SIMULATION);

  try {
    const settings = loadSimulationSettings(
      CONFIG.SIMULATION_CONFIG_PATH,
      envOverrides(),
      logger,
    );
    const container = createContainer(settings);
    const runner = container.get<SimulationRunner>(TYPES.SimulationRunner);
    runner.run();
  } catch (error) {
    logger.error(
      `❌ Simulation aborted: ${describeError(error)}`,
      LogCategory.SIMULATION,
      isSimulationError(error) ? { code: error.code, ...error.details } : undefined,
    );
    process.exitCode = 1;
  }
}

main();
