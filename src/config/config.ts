import path from "path";

/**
 * Application configuration loaded from environment variables.
 *
 * @module config
 */

const parseOptionalNumber = (input: string | undefined): number | undefined => {
  if (input === undefined || input.trim() === "") return undefined;
  return Number(input);
};

/**
 * Application configuration object.
 *
 * @property {string} SIMULATION_CONFIG_PATH - JSON file with rounds, payoffs and roster
 * @property {Object} OVERRIDES - Values that win over the JSON file when set
 * @property {number} OVERRIDES.ROUNDS - Number of rounds to play
 * @property {number} OVERRIDES.INITIAL_ENERGY - Starting energy of every agent
 * @property {string} OVERRIDES.SEED - Base seed for randomized strategies
 */
export const CONFIG = {
  SIMULATION_CONFIG_PATH:
    process.env.SIMULATION_CONFIG_PATH ||
    path.join(process.cwd(), "config", "simulation.json"),
  OVERRIDES: {
    ROUNDS: parseOptionalNumber(process.env.SIMULATION_ROUNDS),
    INITIAL_ENERGY: parseOptionalNumber(process.env.SIMULATION_INITIAL_ENERGY),
    SEED: process.env.SIMULATION_SEED || undefined,
  },
};

export type SettingsOverrides = {
  rounds?: number;
  initialEnergy?: number;
  seed?: string;
};

export const envOverrides = (): SettingsOverrides => ({
  rounds: CONFIG.OVERRIDES.ROUNDS,
  initialEnergy: CONFIG.OVERRIDES.INITIAL_ENERGY,
  seed: CONFIG.OVERRIDES.SEED,
});
