/**
 * Payoff constants applied to lender and borrower after an accepted request.
 * A run uses one fixed set; values may be negative.
 */
export interface GameParams {
  readonly lenderCoop: number;
  readonly lenderDefect: number;
  readonly borrowerCoop: number;
  readonly borrowerDefect: number;
}

/**
 * Freezes a payoff set so strategies and the encounter engine can share it
 * without being able to alter it.
 */
export function createGameParams(params: GameParams): Readonly<GameParams> {
  return Object.freeze({
    lenderCoop: params.lenderCoop,
    lenderDefect: params.lenderDefect,
    borrowerCoop: params.borrowerCoop,
    borrowerDefect: params.borrowerDefect,
  });
}
