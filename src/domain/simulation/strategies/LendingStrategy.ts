import type {
  BorrowingDecision,
  LendingDecision,
} from "../../../shared/constants/StrategyEnums";

/**
 * Behavior contract shared by every strategy variant.
 *
 * Each instance is owned by exactly one agent and only ever touches its own
 * state. Peer ids are the ids of the counterpart agent in the encounter.
 */
export interface LendingStrategy {
  /**
   * Asked of the lender: grant `borrowerId` access or not. Must not change
   * internal state.
   */
  acceptOrRejectRequest(borrowerId: number): LendingDecision;

  /** Told to the borrower whose request `lenderId` rejected. */
  notifyAboutRejection(lenderId: number): void;

  /** Asked of the borrower once `lenderId` granted access. */
  coopOrDefect(lenderId: number): BorrowingDecision;

  /** Told to the lender after `borrowerId` made its choice. */
  notifyCoopOrDefect(borrowerId: number, cooperated: boolean): void;

  /** Stable label used for grouping in reports. */
  describeType(): string;

  /** Independent copy with the same policy and accumulated state. */
  clone(): LendingStrategy;
}
