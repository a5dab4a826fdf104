import {
  BorrowingDecision,
  DEFAULT_STRATEGY_LABELS,
  LendingDecision,
} from "../../../shared/constants/StrategyEnums";
import type { LendingStrategy } from "./LendingStrategy";

export interface FixedPolicyOptions {
  accepts: boolean;
  cooperates: boolean;
  label: string;
}

/** Answers every request the same way, whoever the peer is. */
export class FixedPolicyStrategy implements LendingStrategy {
  constructor(private readonly options: FixedPolicyOptions) {}

  public acceptOrRejectRequest(_borrowerId: number): LendingDecision {
    return this.options.accepts ? LendingDecision.ACCEPT : LendingDecision.REJECT;
  }

  public notifyAboutRejection(_lenderId: number): void {}

  public coopOrDefect(_lenderId: number): BorrowingDecision {
    return this.options.cooperates
      ? BorrowingDecision.COOPERATE
      : BorrowingDecision.DEFECT;
  }

  public notifyCoopOrDefect(_borrowerId: number, _cooperated: boolean): void {}

  public describeType(): string {
    return this.options.label;
  }

  public clone(): FixedPolicyStrategy {
    return new FixedPolicyStrategy({ ...this.options });
  }
}

export function alwaysCooperate(
  label: string = DEFAULT_STRATEGY_LABELS.ALWAYS_COOPERATE,
): FixedPolicyStrategy {
  return new FixedPolicyStrategy({ accepts: true, cooperates: true, label });
}
