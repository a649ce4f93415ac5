/**
 * MiniChess Type Definitions
 *
 * Board, move, search and configuration types for the 5x5 mini chess engine.
 * Piece and color letters follow the usual chess conventions (lowercase type,
 * 'w' / 'b' color).
 */

// =============================================================================
// Core Types
// =============================================================================

/** Side colors */
export type Color = 'w' | 'b';

/** Piece types available on the 5x5 board (no rooks) */
export type PieceType = 'k' | 'q' | 'b' | 'n' | 'p';

/** Board files (columns 0..4) */
export const FILES = ['a', 'b', 'c', 'd', 'e'] as const;

/** Board ranks (rank 1 is White's back rank, row 4) */
export const RANKS = ['1', '2', '3', '4', '5'] as const;

export type File = (typeof FILES)[number];
export type Rank = (typeof RANKS)[number];

/** Square notation (a1-e5) */
export type Square = `${File}${Rank}`;

/** Board size along both axes */
export const BOARD_SIZE = 5;

// =============================================================================
// Piece Representation
// =============================================================================

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** 5x5 board array, row 0 = rank 5 (Black's back rank), column 0 = file a */
export type Board = (Piece | null)[][];

// =============================================================================
// Position & Moves
// =============================================================================

/** Full game position */
export interface Position {
  board: Board;
  /** Side to move */
  turn: Color;
  /** Half-moves since the last capture */
  halfMoveClock: number;
}

/** A move produced by the move generator */
export interface Move {
  /** Source square */
  from: Square;
  /** Target square */
  to: Square;
  /** Piece type that moved */
  piece: PieceType;
  /** Color of the side that moved */
  color: Color;
  /** Piece captured on the target square (kept for undo) */
  captured?: Piece;
  /** Pawn reached the far rank and becomes a queen */
  promotion?: boolean;
}

/** Input format for playing a move on the game engine */
export interface MoveInput {
  from: Square;
  to: Square;
}

/** State needed to take back a move made in place */
export interface UndoInfo {
  move: Move;
  /** Half-move clock before the move */
  halfMoveClock: number;
}

// =============================================================================
// Game State
// =============================================================================

/** Game termination reasons */
export type GameEndReason = 'king_captured' | 'no_capture_limit' | 'no_legal_moves';

/** Game result */
export interface GameResult {
  /** Winner color (null for draw) */
  winner: Color | null;
  /** Reason for game end */
  reason: GameEndReason;
  /** Final score string */
  score: '1-0' | '0-1' | '1/2-1/2';
}

/** Game engine configuration */
export interface MiniChessEngineConfig {
  /** Starting position (defaults to the standard layout) */
  initialPosition?: Position;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Evaluation heuristics, in increasing order of sophistication */
export type Heuristic = 'e0' | 'e1' | 'e2';

export const HEURISTICS = ['e0', 'e1', 'e2'] as const satisfies readonly Heuristic[];

/** Position evaluation breakdown, from the side to move's perspective */
export interface EvaluationBreakdown {
  /** Material balance */
  material: number;
  /** Piece-square table score (e1, e2) */
  positional: number;
  /** Attack / threat balance (e2) */
  safety: number;
  /** Total evaluation */
  total: number;
}

// =============================================================================
// Search Types
// =============================================================================

/** How a search call ended */
export type SearchOutcome =
  | 'completed'        // every requested depth finished
  | 'time_expired'     // budget ran out; result is from the last finished depth
  | 'depth1_fallback'  // not even depth 1 finished; first legal move returned
  | 'no_legal_moves';  // side to move has nothing to play

/** Search configuration */
export interface SearchConfig {
  /** Wall-clock budget per search in seconds */
  timeBudgetSeconds: number;
  /** Prune with alpha-beta bounds (false = plain minimax) */
  useAlphaBeta: boolean;
  /** Evaluation heuristic */
  heuristic: Heuristic;
  /** Upper bound for iterative deepening */
  maxDepth: number;
}

/** Search result */
export interface SearchResult {
  /** Best move (null only when there are no legal moves) */
  move: Move | null;
  /** Score of the best move from the mover's perspective */
  score: number;
  /** Nodes visited across all iterations */
  nodesExplored: number;
  /** Search time in seconds */
  elapsedSeconds: number;
  /** Last fully completed depth (0 = fallback / no moves) */
  depthReached: number;
  /** How the search ended */
  outcome: SearchOutcome;
  /** Alpha-beta cutoffs across all iterations */
  cutoffs: number;
  /** Heuristic the search evaluated with */
  heuristic: Heuristic;
}

// =============================================================================
// AI Types
// =============================================================================

/** AI difficulty presets */
export type AIDifficulty = 'easy' | 'medium' | 'hard';

/** AI configuration */
export interface AIConfig extends SearchConfig {
  /** AI name/identifier */
  name: string;
}

// =============================================================================
// Constants
// =============================================================================

/** Half-moves without a capture after which the game is drawn */
export const DRAW_HALF_MOVE_LIMIT = 20;

/** Material values in centipawns */
export const PIECE_VALUES: Record<PieceType, number> = {
  k: 10000,
  q: 900,
  b: 300,
  n: 300,
  p: 100,
};

/** Score for capturing the king, far above any material balance */
export const WIN_SCORE = 1_000_000;

/** Scores at or beyond this magnitude are forced wins / losses */
export const WIN_THRESHOLD = WIN_SCORE - 1000;

/** Standard starting layout, row 0 (rank 5) first */
export const INITIAL_ROWS: readonly string[] = [
  'bK bQ bB bN .',
  '.  .  bp bp .',
  '.  .  .  .  .',
  '.  wp wp .  .',
  '.  wN wB wQ wK',
];

/** Default search configuration */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  timeBudgetSeconds: 5,
  useAlphaBeta: true,
  heuristic: 'e2',
  maxDepth: 64,
};

/** Default AI configuration */
export const DEFAULT_AI_CONFIG: AIConfig = {
  name: 'MiniChessAI',
  ...DEFAULT_SEARCH_CONFIG,
};
