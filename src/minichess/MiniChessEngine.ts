/**
 * MiniChessEngine - Authoritative game state
 *
 * Wraps the rules layer with move validation, history and the game's
 * terminal conditions (king capture, no-capture draw, no legal moves).
 * A side left without moves ends the game; the material balance decides it.
 */

import {
  clonePosition,
  createInitialPosition,
  generateMoves,
  hasKing,
  makeMove,
  unmakeMove,
} from './MiniChessRules.js';
import { evaluateMaterial } from './MiniChessEvaluator.js';
import {
  Color,
  DRAW_HALF_MOVE_LIMIT,
  GameResult,
  MiniChessEngineConfig,
  Move,
  MoveInput,
  Position,
  UndoInfo,
} from './types.js';

/**
 * MiniChessEngine tracks one game from its starting position
 */
export class MiniChessEngine {
  private position: Position;
  private initialPosition: Position;
  private history: UndoInfo[] = [];

  constructor(config: MiniChessEngineConfig = {}) {
    this.initialPosition = clonePosition(config.initialPosition ?? createInitialPosition());
    this.position = clonePosition(this.initialPosition);
  }

  // ===========================================================================
  // Core Game Methods
  // ===========================================================================

  /**
   * Make a move on the board
   * @param move - Source and target squares
   * @returns The move made, or null if the game is over or the move is illegal
   */
  move(move: MoveInput): Move | null {
    if (this.isGameOver()) return null;

    const legal = this.getMoves().find(m => m.from === move.from && m.to === move.to);
    if (!legal) return null;

    this.history.push(makeMove(this.position, legal));
    return legal;
  }

  /**
   * Undo the last move
   * @returns The undone move, or null if no moves to undo
   */
  undo(): Move | null {
    const last = this.history.pop();
    if (!last) return null;

    unmakeMove(this.position, last);
    return last.move;
  }

  /**
   * Reset the board to the starting position or the given one
   */
  reset(position?: Position): void {
    if (position) {
      this.initialPosition = clonePosition(position);
    }
    this.position = clonePosition(this.initialPosition);
    this.history = [];
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  /**
   * Copy of the current position
   */
  getPosition(): Position {
    return clonePosition(this.position);
  }

  turn(): Color {
    return this.position.turn;
  }

  halfMoveClock(): number {
    return this.position.halfMoveClock;
  }

  /**
   * Legal moves for the side to move
   */
  getMoves(): Move[] {
    return generateMoves(this.position);
  }

  /**
   * Moves played so far, oldest first
   */
  getHistory(): Move[] {
    return this.history.map(entry => entry.move);
  }

  isGameOver(): boolean {
    return this.getGameResult() !== null;
  }

  /**
   * Result of the game, or null while it is still going
   */
  getGameResult(): GameResult | null {
    const whiteKing = hasKing(this.position, 'w');
    const blackKing = hasKing(this.position, 'b');

    if (!whiteKing || !blackKing) {
      const winner: Color = whiteKing ? 'w' : 'b';
      return { winner, reason: 'king_captured', score: winner === 'w' ? '1-0' : '0-1' };
    }

    if (this.position.halfMoveClock >= DRAW_HALF_MOVE_LIMIT) {
      return { winner: null, reason: 'no_capture_limit', score: '1/2-1/2' };
    }

    if (this.getMoves().length === 0) {
      const balance = evaluateMaterial(this.position, 'w');
      if (balance === 0) {
        return { winner: null, reason: 'no_legal_moves', score: '1/2-1/2' };
      }
      const winner: Color = balance > 0 ? 'w' : 'b';
      return { winner, reason: 'no_legal_moves', score: winner === 'w' ? '1-0' : '0-1' };
    }

    return null;
  }
}

/**
 * Create a game engine instance
 */
export function createMiniChessEngine(config?: MiniChessEngineConfig): MiniChessEngine {
  return new MiniChessEngine(config);
}
