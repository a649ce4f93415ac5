/**
 * MiniChess Module
 *
 * 5x5 mini chess with:
 * - Rules layer (move generation, make/unmake, perft)
 * - Position evaluation (material, positional, threats)
 * - Minimax / alpha-beta search with iterative deepening
 * - AI player and match game loop
 *
 * @module minichess
 */

// Rules
export {
  applyMove,
  clonePosition,
  coordsToSquare,
  createInitialPosition,
  formatMove,
  generateMoves,
  hasKing,
  makeMove,
  mirrorPosition,
  opposite,
  perft,
  positionFromRows,
  squareToCoords,
  unmakeMove,
} from './MiniChessRules.js';

// Game engine
export {
  MiniChessEngine,
  createMiniChessEngine,
} from './MiniChessEngine.js';

// Evaluation
export {
  MiniChessEvaluator,
  createMiniChessEvaluator,
  evaluateMaterial,
  evaluatePieceSquares,
  evaluateSafety,
} from './MiniChessEvaluator.js';

// Search
export {
  MiniChessSearch,
  createMiniChessSearch,
  search,
} from './MiniChessSearch.js';

// AI player and match
export {
  MiniChessAI,
  MiniChessMatch,
  createMiniChessAI,
  createMiniChessMatch,
} from './MiniChessAI.js';

export type {
  MatchMove,
  MatchOptions,
  MatchSummary,
  Player,
} from './MiniChessAI.js';

// Configuration and errors
export {
  AIConfigSchema,
  DIFFICULTY_CONFIGS,
  SearchConfigSchema,
  configForDifficulty,
  parseAIConfig,
  parseSearchConfig,
} from './config.js';

export {
  ConfigurationError,
  IllegalMoveError,
  InvariantViolationError,
} from './errors.js';

// Types
export type {
  AIConfig,
  AIDifficulty,
  Board,
  Color,
  EvaluationBreakdown,
  File,
  GameEndReason,
  GameResult,
  Heuristic,
  MiniChessEngineConfig,
  Move,
  MoveInput,
  Piece,
  PieceType,
  Position,
  Rank,
  SearchConfig,
  SearchOutcome,
  SearchResult,
  Square,
  UndoInfo,
} from './types.js';

// Constants
export {
  BOARD_SIZE,
  DEFAULT_AI_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DRAW_HALF_MOVE_LIMIT,
  FILES,
  HEURISTICS,
  INITIAL_ROWS,
  PIECE_VALUES,
  RANKS,
  WIN_SCORE,
  WIN_THRESHOLD,
} from './types.js';
