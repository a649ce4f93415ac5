/**
 * MiniChessEvaluator - Position evaluation function
 *
 * Three heuristics of increasing sophistication:
 * - e0: material balance
 * - e1: material + piece-square tables
 * - e2: material + piece-square tables + threat balance
 *
 * All values are in centipawns from the side to move's perspective
 * (positive = side to move is better).
 */

import { generateMoves, opposite } from './MiniChessRules.js';
import {
  BOARD_SIZE,
  Color,
  EvaluationBreakdown,
  Heuristic,
  PIECE_VALUES,
  PieceType,
  Position,
} from './types.js';

// =============================================================================
// Piece-Square Tables (from White's perspective, row 0 = rank 5)
// Tables are left-right symmetric; Black reads them with the row flipped.
// =============================================================================

/** Pawn PST - reward advancement toward promotion */
const PAWN_PST: number[][] = [
  [  0,   0,   0,   0,   0],  // Rank 5 (pawn has promoted)
  [ 40,  50,  60,  50,  40],  // Rank 4 (pre-promotion)
  [ 15,  25,  35,  25,  15],
  [  0,   5,  10,   5,   0],
  [  0,   0,   0,   0,   0],
];

/** Knight PST - corners are poison on a 5x5 board */
const KNIGHT_PST: number[][] = [
  [-30, -15, -10, -15, -30],
  [-15,   5,  15,   5, -15],
  [-10,  15,  25,  15, -10],
  [-15,   5,  15,   5, -15],
  [-30, -15, -10, -15, -30],
];

const BISHOP_PST: number[][] = [
  [-15,  -5,  -5,  -5, -15],
  [ -5,  10,   5,  10,  -5],
  [ -5,   5,  15,   5,  -5],
  [ -5,  10,   5,  10,  -5],
  [-15,  -5,  -5,  -5, -15],
];

const QUEEN_PST: number[][] = [
  [-10,  -5,   0,  -5, -10],
  [ -5,   5,  10,   5,  -5],
  [  0,  10,  15,  10,   0],
  [ -5,   5,  10,   5,  -5],
  [-10,  -5,   0,  -5, -10],
];

/** King PST - stay home */
const KING_PST: number[][] = [
  [-30, -30, -40, -30, -30],
  [-20, -25, -30, -25, -20],
  [-10, -15, -20, -15, -10],
  [  0,  -5, -10,  -5,   0],
  [ 10,   5,   0,   5,  10],
];

const PST: Record<PieceType, number[][]> = {
  p: PAWN_PST,
  n: KNIGHT_PST,
  b: BISHOP_PST,
  q: QUEEN_PST,
  k: KING_PST,
};

/** Weight of a piece that can be captured on the next move */
const THREAT_VALUES: Record<PieceType, number> = {
  k: 500,
  q: 90,
  b: 30,
  n: 30,
  p: 10,
};

// =============================================================================
// Heuristic Terms
// =============================================================================

/**
 * Material balance for `color`
 */
export function evaluateMaterial(position: Position, color: Color): number {
  let score = 0;
  for (const row of position.board) {
    for (const piece of row) {
      if (!piece) continue;
      score += piece.color === color ? PIECE_VALUES[piece.type] : -PIECE_VALUES[piece.type];
    }
  }
  return score;
}

/**
 * Piece-square balance for `color`
 */
export function evaluatePieceSquares(position: Position, color: Color): number {
  let score = 0;
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const piece = position.board[row][col];
      if (!piece) continue;

      const pstRow = piece.color === 'w' ? row : BOARD_SIZE - 1 - row;
      const value = PST[piece.type][pstRow][col];
      score += piece.color === color ? value : -value;
    }
  }
  return score;
}

/**
 * Sum of threat weights of the enemy pieces `attacker` can capture next move.
 * Each target square counts once, however many pieces hit it.
 */
function threatTotal(position: Position, attacker: Color): number {
  const hit = new Set<string>();
  let total = 0;
  for (const move of generateMoves(position, attacker)) {
    if (!move.captured || hit.has(move.to)) continue;
    hit.add(move.to);
    total += THREAT_VALUES[move.captured.type];
  }
  return total;
}

/**
 * Threat balance for `color`: bonus for enemy pieces it attacks, penalty for
 * its own pieces under attack
 */
export function evaluateSafety(position: Position, color: Color): number {
  return threatTotal(position, color) - threatTotal(position, opposite(color));
}

// =============================================================================
// MiniChessEvaluator Class
// =============================================================================

export class MiniChessEvaluator {
  private heuristic: Heuristic;

  constructor(heuristic: Heuristic = 'e2') {
    this.heuristic = heuristic;
  }

  getHeuristic(): Heuristic {
    return this.heuristic;
  }

  /**
   * Evaluate a position for the side to move
   */
  evaluate(position: Position): number {
    const color = position.turn;
    switch (this.heuristic) {
      case 'e0':
        return evaluateMaterial(position, color);
      case 'e1':
        return evaluateMaterial(position, color) + evaluatePieceSquares(position, color);
      case 'e2':
        return (
          evaluateMaterial(position, color) +
          evaluatePieceSquares(position, color) +
          evaluateSafety(position, color)
        );
    }
  }

  /**
   * Get detailed evaluation breakdown; terms the heuristic does not use are 0
   */
  getEvaluationBreakdown(position: Position): EvaluationBreakdown {
    const color = position.turn;
    const material = evaluateMaterial(position, color);
    const positional = this.heuristic === 'e0' ? 0 : evaluatePieceSquares(position, color);
    const safety = this.heuristic === 'e2' ? evaluateSafety(position, color) : 0;

    return {
      material,
      positional,
      safety,
      total: material + positional + safety,
    };
  }
}

/**
 * Create an evaluator instance
 */
export function createMiniChessEvaluator(heuristic?: Heuristic): MiniChessEvaluator {
  return new MiniChessEvaluator(heuristic);
}
