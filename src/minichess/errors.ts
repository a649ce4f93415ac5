/**
 * Error types raised by the mini chess engine.
 *
 * Expected game-flow conditions (time expiry, no legal moves, game over) are
 * reported through return values; these classes mark the cases that are not.
 */

/** Invalid search or AI configuration, raised before any search work */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Programming error inside the rules or search code */
export class InvariantViolationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

/** A player handed the game loop a move that is not legal in the position */
export class IllegalMoveError extends Error {
  public constructor(playerName: string, move: string) {
    super(`${playerName} played an illegal move: ${move}`);
    this.name = 'IllegalMoveError';
  }
}
