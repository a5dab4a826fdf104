import { describe, it, expect, beforeEach, vi } from "vitest";
import { EncounterEngine } from "../../src/domain/simulation/core/EncounterEngine";
import { alwaysCooperate } from "../../src/domain/simulation/strategies/FixedPolicyStrategy";
import { alwaysDefect } from "../../src/domain/simulation/strategies/RandomizedStrategy";
import { ReputationTrackerStrategy } from "../../src/domain/simulation/strategies/ReputationTrackerStrategy";
import type { LendingStrategy } from "../../src/domain/simulation/strategies/LendingStrategy";
import type { Logger } from "../../src/infrastructure/utils/logger";
import { LogCategory } from "../../src/shared/constants/LogEnums";
import {
  BorrowingDecision,
  LendingDecision,
} from "../../src/shared/constants/StrategyEnums";
import {
  ErrorCode,
  SimulationError,
} from "../../src/shared/errors/SimulationError";
import { TEST_PARAMS, createSilentLogger, createTestAgent } from "../setup";

describe("EncounterEngine", () => {
  let logger: Logger;
  let engine: EncounterEngine;

  beforeEach(() => {
    logger = createSilentLogger();
    engine = new EncounterEngine(TEST_PARAMS, logger);
  });

  it("debe aplicar los pagos de cooperación", () => {
    const lender = createTestAgent(0, alwaysCooperate());
    const borrower = createTestAgent(1, alwaysCooperate());

    const result = engine.encounter(lender, borrower);

    expect(result).toEqual({
      lenderId: 0,
      borrowerId: 1,
      decision: LendingDecision.ACCEPT,
      outcome: BorrowingDecision.COOPERATE,
      lenderDelta: -1,
      borrowerDelta: 2,
    });
    expect(lender.energy).toBe(255);
    expect(borrower.energy).toBe(258);
  });

  it("debe aplicar los pagos de traición e informar al prestamista", () => {
    const tracker = new ReputationTrackerStrategy(TEST_PARAMS, {
      optimistic: true,
    });
    const lender = createTestAgent(0, tracker);
    const borrower = createTestAgent(1, alwaysDefect());

    const result = engine.encounter(lender, borrower);

    expect(result.outcome).toBe(BorrowingDecision.DEFECT);
    expect(lender.energy).toBe(253);
    expect(borrower.energy).toBe(259);
    expect(tracker.getReputation(1)).toBe(-3);
    expect(
      logger.queryLogs({ categories: [LogCategory.ENCOUNTER] }).map((e) => e.message),
    ).toEqual(["🗡️ 1 defected on 0"]);
  });

  it("should leave both energies untouched on rejection", () => {
    const lender = createTestAgent(0, alwaysDefect());
    const borrower = createTestAgent(1, alwaysCooperate(), 10);

    const result = engine.encounter(lender, borrower);

    expect(result).toEqual({
      lenderId: 0,
      borrowerId: 1,
      decision: LendingDecision.REJECT,
      lenderDelta: 0,
      borrowerDelta: 0,
    });
    expect(lender.energy).toBe(256);
    expect(borrower.energy).toBe(10);
  });

  it("should notify the borrower on rejection and skip the borrowing step", () => {
    const borrowerStrategy: LendingStrategy = {
      acceptOrRejectRequest: vi.fn(() => LendingDecision.ACCEPT),
      notifyAboutRejection: vi.fn(),
      coopOrDefect: vi.fn(() => BorrowingDecision.COOPERATE),
      notifyCoopOrDefect: vi.fn(),
      describeType: () => "spy",
      clone: () => borrowerStrategy,
    };
    const lender = createTestAgent(4, alwaysDefect());
    const borrower = createTestAgent(9, borrowerStrategy);

    engine.encounter(lender, borrower);

    expect(borrowerStrategy.notifyAboutRejection).toHaveBeenCalledWith(4);
    expect(borrowerStrategy.coopOrDefect).not.toHaveBeenCalled();
  });

  it("debe impedir que un agente se preste a sí mismo", () => {
    const agent = createTestAgent(3, alwaysCooperate());

    expect(() => engine.encounter(agent, agent)).toThrow(SimulationError);
    try {
      engine.encounter(agent, agent);
    } catch (error) {
      expect(error instanceof SimulationError && error.code).toBe(
        ErrorCode.InvariantViolation,
      );
    }
    expect(agent.energy).toBe(256);
  });
});
