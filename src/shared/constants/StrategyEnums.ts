/**
 * Decision and strategy enumerations for the lending game.
 *
 * @module shared/constants/StrategyEnums
 */

/**
 * Answer given by an agent acting as lender.
 */
export enum LendingDecision {
  ACCEPT = "accept",
  REJECT = "reject",
}

/**
 * Answer given by an agent acting as borrower once access was granted.
 */
export enum BorrowingDecision {
  COOPERATE = "cooperate",
  DEFECT = "defect",
}

/**
 * Strategy kinds that can be declared in a roster definition.
 */
export enum StrategyKind {
  REPUTATION_TRACKER = "reputation-tracker",
  RANDOMIZED = "randomized",
  ALWAYS_DEFECT = "always-defect",
  FIXED_POLICY = "fixed-policy",
}

/**
 * Default labels used when a roster entry does not name its strategy.
 */
export const DEFAULT_STRATEGY_LABELS = {
  [StrategyKind.REPUTATION_TRACKER]: "reputation tracker",
  [StrategyKind.ALWAYS_DEFECT]: "pure evil",
  ALWAYS_COOPERATE: "sucker",
} as const;
