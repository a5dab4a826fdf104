import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import {
  loadSimulationSettings,
  parseSimulationSettings,
} from "../../src/config/simulationConfig";
import { createDefaultSettings } from "../../src/domain/simulation/core/SimulationConstants";
import type { Logger } from "../../src/infrastructure/utils/logger";
import { LogCategory } from "../../src/shared/constants/LogEnums";
import { StrategyKind } from "../../src/shared/constants/StrategyEnums";
import {
  ErrorCode,
  SimulationError,
} from "../../src/shared/errors/SimulationError";
import { createSilentLogger } from "../setup";

function captureError(fn: () => unknown): SimulationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SimulationError) return error;
    throw error;
  }
  throw new Error("expected a SimulationError");
}

describe("parseSimulationSettings", () => {
  it("debe usar los valores por defecto con un objeto vacío", () => {
    expect(parseSimulationSettings({})).toEqual(createDefaultSettings());
  });

  it("should let defined overrides win over the file", () => {
    const settings = parseSimulationSettings(
      { rounds: 7, initialEnergy: 100 },
      { rounds: 3, initialEnergy: undefined, seed: "test-seed" },
    );
    expect(settings.rounds).toBe(3);
    expect(settings.initialEnergy).toBe(100);
    expect(settings.seed).toBe("test-seed");
  });

  it("debe completar las opciones del reputation tracker", () => {
    const settings = parseSimulationSettings({
      roster: [{ strategy: { kind: "reputation-tracker" }, count: 2 }],
    });
    expect(settings.roster).toEqual([
      {
        strategy: {
          kind: StrategyKind.REPUTATION_TRACKER,
          optimistic: true,
          revenging: false,
        },
        count: 2,
      },
    ]);
  });

  it("should reject negative round counts", () => {
    const error = captureError(() => parseSimulationSettings({ rounds: -1 }));
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
    expect(error.message).toMatch(/^Invalid simulation settings: rounds: /);
  });

  it("debe rechazar probabilidades fuera de rango", () => {
    const error = captureError(() =>
      parseSimulationSettings({
        roster: [
          {
            strategy: {
              kind: "randomized",
              acceptProbability: 1.5,
              cooperateProbability: 0,
              label: "coin",
            },
            count: 1,
          },
        ],
      }),
    );
    expect(error.message).toMatch(/roster\.0\.strategy\.acceptProbability/);
  });

  it.each([
    [[], "array"],
    [42, "number"],
    ["oops", "string"],
    [null, "null"],
  ])("debe rechazar contenido que no es un objeto: %j", (raw, kind) => {
    const error = captureError(() => parseSimulationSettings(raw));
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
    expect(error.message).toBe(
      `Invalid simulation settings: expected an object, got ${kind}`,
    );
  });

  it("should reject misspelled keys instead of falling back to defaults", () => {
    const error = captureError(() => parseSimulationSettings({ rouns: 3 }));
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
    expect(error.message).toBe(
      "Invalid simulation settings: <root>: Unrecognized key(s) in object: 'rouns'",
    );
  });

  it("debe rechazar claves desconocidas dentro del roster", () => {
    const error = captureError(() =>
      parseSimulationSettings({
        roster: [
          { strategy: { kind: "always-defect", lable: "thief" }, count: 1 },
        ],
      }),
    );
    expect(error.message).toBe(
      "Invalid simulation settings: roster.0.strategy: Unrecognized key(s) in object: 'lable'",
    );
  });

  it("should reject unknown strategy kinds", () => {
    const error = captureError(() =>
      parseSimulationSettings({
        roster: [{ strategy: { kind: "tit-for-tat" }, count: 1 }],
      }),
    );
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
  });
});

describe("loadSimulationSettings", () => {
  let dir: string;
  let logger: Logger;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lending-sim-"));
    logger = createSilentLogger();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("debe usar los valores por defecto si falta el archivo", () => {
    const settings = loadSimulationSettings(
      path.join(dir, "missing.json"),
      { rounds: 4 },
      logger,
    );
    expect(settings).toEqual({ ...createDefaultSettings(), rounds: 4 });
    expect(
      logger.queryLogs({ categories: [LogCategory.CONFIG] }),
    ).toHaveLength(1);
  });

  it("should read a settings file", () => {
    const file = path.join(dir, "simulation.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        rounds: 2,
        roster: [{ strategy: { kind: "always-defect", label: "thief" }, count: 5 }],
      }),
    );

    const settings = loadSimulationSettings(file, {}, logger);

    expect(settings.rounds).toBe(2);
    expect(settings.initialEnergy).toBe(256);
    expect(settings.roster).toEqual([
      { strategy: { kind: StrategyKind.ALWAYS_DEFECT, label: "thief" }, count: 5 },
    ]);
  });

  it("debe fallar con JSON inválido", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ rounds: ");

    const error = captureError(() => loadSimulationSettings(file, {}, logger));
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
    expect(error.details).toEqual({ filePath: file });
  });

  it("should fail on a file holding an array", () => {
    const file = path.join(dir, "list.json");
    fs.writeFileSync(file, "[1,2]");

    const error = captureError(() => loadSimulationSettings(file, {}, logger));
    expect(error.code).toBe(ErrorCode.InvalidConfiguration);
    expect(error.message).toBe(
      "Invalid simulation settings: expected an object, got array",
    );
  });

  it("should ship a settings file matching the built-in defaults", () => {
    const shipped = fileURLToPath(
      new URL("../../config/simulation.json", import.meta.url),
    );
    expect(loadSimulationSettings(shipped, {}, logger)).toEqual(
      createDefaultSettings(),
    );
  });
});
