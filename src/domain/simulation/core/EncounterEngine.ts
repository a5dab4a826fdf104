import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { Logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import {
  BorrowingDecision,
  LendingDecision,
} from "@/shared/constants/StrategyEnums";
import { ErrorCode, SimulationError } from "@/shared/errors/SimulationError";
import type { Agent } from "../../types/simulation/agents";
import type { GameParams } from "../../types/simulation/payoffs";
import type { EncounterResult } from "../../types/simulation/reports";

/**
 * Runs the lender/borrower protocol for one ordered pair.
 *
 * Pipeline:
 * 1. Lender decides whether to grant the request
 * 2. On rejection the borrower is notified and nothing else changes
 * 3. Otherwise the borrower cooperates or defects, the lender is told
 * 4. Both energies move by the matching payoff constants
 */
@injectable()
export class EncounterEngine {
  constructor(
    @inject(TYPES.GameParams) private readonly params: GameParams,
    @inject(TYPES.Logger) private readonly logger: Logger,
  ) {}

  public encounter(lender: Agent, borrower: Agent): EncounterResult {
    if (lender.id === borrower.id) {
      throw new SimulationError(
        ErrorCode.InvariantViolation,
        `Agent ${lender.id} cannot lend to itself`,
        { agentId: lender.id },
      );
    }

    const decision = lender.strategy.acceptOrRejectRequest(borrower.id);
    if (decision === LendingDecision.REJECT) {
      borrower.strategy.notifyAboutRejection(lender.id);
      return {
        lenderId: lender.id,
        borrowerId: borrower.id,
        decision,
        lenderDelta: 0,
        borrowerDelta: 0,
      };
    }

    const outcome = borrower.strategy.coopOrDefect(lender.id);
    const cooperated = outcome === BorrowingDecision.COOPERATE;
    lender.strategy.notifyCoopOrDefect(borrower.id, cooperated);

    const lenderDelta = cooperated
      ? this.params.lenderCoop
      : this.params.lenderDefect;
    const borrowerDelta = cooperated
      ? this.params.borrowerCoop
      : this.params.borrowerDefect;
    lender.energy += lenderDelta;
    borrower.energy += borrowerDelta;

    if (!cooperated) {
      this.logger.debug(
        `🗡️ ${borrower.id} defected on ${lender.id}`,
        LogCategory.ENCOUNTER,
      );
    }

    return {
      lenderId: lender.id,
      borrowerId: borrower.id,
      decision,
      outcome,
      lenderDelta,
      borrowerDelta,
    };
  }
}
