import { describe, it, expect } from "vitest";
import {
  FixedPolicyStrategy,
  alwaysCooperate,
} from "../../../src/domain/simulation/strategies/FixedPolicyStrategy";
import {
  BorrowingDecision,
  LendingDecision,
} from "../../../src/shared/constants/StrategyEnums";

describe("FixedPolicyStrategy", () => {
  it("debe prestar y cooperar siempre como sucker", () => {
    const strategy = alwaysCooperate();
    strategy.notifyCoopOrDefect(1, false);
    expect(strategy.acceptOrRejectRequest(1)).toBe(LendingDecision.ACCEPT);
    expect(strategy.coopOrDefect(1)).toBe(BorrowingDecision.COOPERATE);
    expect(strategy.describeType()).toBe("sucker");
  });

  it("should follow the configured answers", () => {
    const strategy = new FixedPolicyStrategy({
      accepts: false,
      cooperates: false,
      label: "hermit",
    });
    expect(strategy.acceptOrRejectRequest(0)).toBe(LendingDecision.REJECT);
    expect(strategy.coopOrDefect(0)).toBe(BorrowingDecision.DEFECT);
    expect(strategy.clone().describeType()).toBe("hermit");
  });
});
