import {
  BorrowingDecision,
  DEFAULT_STRATEGY_LABELS,
  LendingDecision,
  StrategyKind,
} from "../../../shared/constants/StrategyEnums";
import type { GameParams } from "../../types/simulation/payoffs";
import type { LendingStrategy } from "./LendingStrategy";

export interface ReputationTrackerOptions {
  /** Lend to strangers and to peers sitting exactly at zero */
  optimistic: boolean;
  /**
   * Defect as borrower against a known lender whose score is not positive.
   * Off by default: the tracker then always cooperates.
   */
  revenging?: boolean;
  label?: string;
}

/**
 * Keeps a running score per peer that blends what the peer paid out to us
 * as lender and how the peer treated us when we lent to it. Only the lending
 * decision is gated by the score.
 */
export class ReputationTrackerStrategy implements LendingStrategy {
  private readonly reputations = new Map<number, number>();
  private readonly optimistic: boolean;
  private readonly revenging: boolean;
  private readonly label: string;

  constructor(
    private readonly params: GameParams,
    options: ReputationTrackerOptions,
  ) {
    this.optimistic = options.optimistic;
    this.revenging = options.revenging ?? false;
    this.label =
      options.label ?? DEFAULT_STRATEGY_LABELS[StrategyKind.REPUTATION_TRACKER];
  }

  public acceptOrRejectRequest(borrowerId: number): LendingDecision {
    const score = this.reputations.get(borrowerId);
    if (score === undefined) {
      return this.optimistic ? LendingDecision.ACCEPT : LendingDecision.REJECT;
    }
    if (score > 0 || (score === 0 && this.optimistic)) {
      return LendingDecision.ACCEPT;
    }
    return LendingDecision.REJECT;
  }

  public notifyAboutRejection(_lenderId: number): void {}

  public coopOrDefect(lenderId: number): BorrowingDecision {
    const known = this.reputations.has(lenderId);
    const score = this.adjust(lenderId, this.params.borrowerCoop);

    if (this.revenging && known && score <= 0) {
      return BorrowingDecision.DEFECT;
    }
    return BorrowingDecision.COOPERATE;
  }

  public notifyCoopOrDefect(borrowerId: number, cooperated: boolean): void {
    this.adjust(
      borrowerId,
      cooperated ? this.params.lenderCoop : this.params.lenderDefect,
    );
  }

  public describeType(): string {
    return this.label;
  }

  public clone(): ReputationTrackerStrategy {
    const copy = new ReputationTrackerStrategy(this.params, {
      optimistic: this.optimistic,
      revenging: this.revenging,
      label: this.label,
    });
    for (const [peerId, score] of this.reputations) {
      copy.reputations.set(peerId, score);
    }
    return copy;
  }

  public getReputation(peerId: number): number | undefined {
    return this.reputations.get(peerId);
  }

  public knownPeers(): number[] {
    return [...this.reputations.keys()];
  }

  public isOptimistic(): boolean {
    return this.optimistic;
  }

  private adjust(peerId: number, delta: number): number {
    const next = (this.reputations.get(peerId) ?? 0) + delta;
    this.reputations.set(peerId, next);
    return next;
  }
}
