import fs from "fs";
import { z } from "zod";
import type { Logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { StrategyKind } from "@/shared/constants/StrategyEnums";
import {
  ErrorCode,
  SimulationError,
  describeError,
} from "@/shared/errors/SimulationError";
import { createDefaultSettings } from "@/domain/simulation/core/SimulationConstants";
import type { SimulationSettings } from "@/domain/types/simulation/roster";
import type { SettingsOverrides } from "./config";

const label = z.string().trim().min(1);
const probability = z.number().min(0).max(1);

export const strategyDefinitionSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal(StrategyKind.REPUTATION_TRACKER),
    optimistic: z.boolean().default(true),
    revenging: z.boolean().default(false),
    label: label.optional(),
  }).strict(),
  z.object({
    kind: z.literal(StrategyKind.RANDOMIZED),
    acceptProbability: probability,
    cooperateProbability: probability,
    label,
  }).strict(),
  z.object({
    kind: z.literal(StrategyKind.ALWAYS_DEFECT),
    label: label.optional(),
  }).strict(),
  z.object({
    kind: z.literal(StrategyKind.FIXED_POLICY),
    accepts: z.boolean(),
    cooperates: z.boolean(),
    label,
  }).strict(),
]);

export const payoffsSchema = z.object({
  lenderCoop: z.number().finite(),
  lenderDefect: z.number().finite(),
  borrowerCoop: z.number().finite(),
  borrowerDefect: z.number().finite(),
}).strict();

export const simulationSettingsSchema = z.object({
  rounds: z.number().int().nonnegative(),
  initialEnergy: z.number().finite(),
  seed: z.string().min(1).optional(),
  payoffs: payoffsSchema,
  roster: z.array(
    z.object({
      strategy: strategyDefinitionSchema,
      count: z.number().int().nonnegative(),
    }).strict(),
  ),
}).strict();

/**
 * Validates raw settings, filling omitted fields from the built-in defaults.
 */
export function parseSimulationSettings(
  raw: unknown,
  overrides: SettingsOverrides = {},
): SimulationSettings {
  if (!isPlainObject(raw)) {
    throw new SimulationError(
      ErrorCode.InvalidConfiguration,
      `Invalid simulation settings: expected an object, got ${
        Array.isArray(raw) ? "array" : raw === null ? "null" : typeof raw
      }`,
    );
  }

  const merged = {
    ...createDefaultSettings(),
    ...raw,
    ...definedOnly(overrides),
  };

  const result = simulationSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new SimulationError(
      ErrorCode.InvalidConfiguration,
      `Invalid simulation settings: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
      { issues: result.error.issues },
    );
  }

  const settings: SimulationSettings = result.data;
  return settings;
}

/**
 * Reads the JSON settings file. A missing file means the built-in defaults;
 * unreadable or invalid content is fatal.
 */
export function loadSimulationSettings(
  filePath: string,
  overrides: SettingsOverrides,
  logger: Logger,
): SimulationSettings {
  if (!fs.existsSync(filePath)) {
    logger.info(
      `⚙️ No settings file at ${filePath}, using built-in defaults`,
      LogCategory.CONFIG,
    );
    return parseSimulationSettings({}, overrides);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new SimulationError(
      ErrorCode.InvalidConfiguration,
      `Cannot read settings file ${filePath}: ${describeError(error)}`,
      { filePath },
    );
  }

  const settings = parseSimulationSettings(raw, overrides);
  logger.info(
    `⚙️ Loaded settings from ${filePath}: ${settings.roster.length} roster entries, ${settings.rounds} rounds`,
    LogCategory.CONFIG,
  );
  return settings;
}

function definedOnly(overrides: SettingsOverrides): SettingsOverrides {
  const defined: SettingsOverrides = {};
  if (overrides.rounds !== undefined) defined.rounds = overrides.rounds;
  if (overrides.initialEnergy !== undefined) {
    defined.initialEnergy = overrides.initialEnergy;
  }
  if (overrides.seed !== undefined) defined.seed = overrides.seed;
  return defined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
