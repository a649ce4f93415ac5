/**
 * MiniChessSearch - Minimax / Alpha-Beta Search
 *
 * Implements the move search for the 5x5 game:
 * - Negamax formulation (one code path for both sides)
 * - Optional alpha-beta pruning with fail-soft bounds
 * - Iterative deepening under a wall-clock budget
 * - King capture scored as a win, shorter wins preferred
 * - Draw when the no-capture limit is reached
 *
 * Moves are searched in generation order and the first move reaching the best
 * score is kept, so pruning never changes the chosen move or its score.
 */

import { logWarning } from '../core/GameLogger.js';
import { mergeConfig, parseSearchConfig } from './config.js';
import { MiniChessEvaluator } from './MiniChessEvaluator.js';
import {
  clonePosition,
  formatMove,
  generateMoves,
  hasKing,
  makeMove,
  opposite,
  unmakeMove,
} from './MiniChessRules.js';
import {
  Color,
  DEFAULT_SEARCH_CONFIG,
  DRAW_HALF_MOVE_LIMIT,
  Move,
  Position,
  SearchConfig,
  SearchResult,
  WIN_SCORE,
  WIN_THRESHOLD,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

const INFINITY = 10 * WIN_SCORE;
const DRAW_SCORE = 0;

/** Per-search counters */
interface SearchStats {
  nodes: number;
  cutoffs: number;
}

/** Result of one fully searched depth */
interface IterationResult {
  move: Move;
  score: number;
}

// =============================================================================
// MiniChessSearch Class
// =============================================================================

export class MiniChessSearch {
  private config: SearchConfig;
  private evaluator: MiniChessEvaluator;

  // Per-call state
  private stats: SearchStats = { nodes: 0, cutoffs: 0 };
  private deadline: number = 0;
  private stopSearch: boolean = false;

  constructor(config?: Partial<SearchConfig>) {
    this.config = parseSearchConfig(mergeConfig(DEFAULT_SEARCH_CONFIG, config));
    this.evaluator = new MiniChessEvaluator(this.config.heuristic);
  }

  /**
   * Search for the best move
   * @param position - Position to search; it is never modified
   * @param sideToMove - Side to search for (overrides position.turn)
   * @param overrides - Per-call configuration overrides
   * @throws ConfigurationError if the merged configuration is invalid
   */
  search(position: Position, sideToMove: Color = position.turn, overrides?: Partial<SearchConfig>): SearchResult {
    const config = overrides ? parseSearchConfig(mergeConfig(this.config, overrides)) : this.config;
    const evaluator =
      config.heuristic === this.evaluator.getHeuristic()
        ? this.evaluator
        : new MiniChessEvaluator(config.heuristic);

    const startTime = Date.now();
    this.deadline = startTime + config.timeBudgetSeconds * 1000;
    this.stats = { nodes: 0, cutoffs: 0 };
    this.stopSearch = false;

    const root = clonePosition(position);
    root.turn = sideToMove;
    const rootMoves = generateMoves(root);

    if (rootMoves.length === 0) {
      return this.buildResult(config, startTime, {
        move: null,
        score: evaluator.evaluate(root),
        depthReached: 0,
        outcome: 'no_legal_moves',
      });
    }

    let best: IterationResult | null = null;
    let completedDepth = 0;

    // Iterative deepening
    for (let depth = 1; depth <= config.maxDepth; depth++) {
      if (Date.now() >= this.deadline) {
        this.stopSearch = true;
        break;
      }

      const iteration = this.searchRoot(root, rootMoves, depth, config, evaluator);
      if (!iteration) break;

      best = iteration;
      completedDepth = depth;

      // A forced result cannot change with more depth
      if (Math.abs(iteration.score) >= WIN_THRESHOLD) {
        break;
      }
    }

    if (!best) {
      const fallback = rootMoves[0];
      logWarning(
        `Search could not finish depth 1 within ${config.timeBudgetSeconds}s - ` +
        `falling back to first legal move ${formatMove(fallback)}`
      );
      return this.buildResult(config, startTime, {
        move: fallback,
        score: evaluator.evaluate(root),
        depthReached: 0,
        outcome: 'depth1_fallback',
      });
    }

    return this.buildResult(config, startTime, {
      move: best.move,
      score: best.score,
      depthReached: completedDepth,
      outcome: this.stopSearch ? 'time_expired' : 'completed',
    });
  }

  /**
   * Search every root move to the given depth
   * @returns null if the deadline passed before the depth finished
   */
  private searchRoot(
    root: Position,
    rootMoves: Move[],
    depth: number,
    config: SearchConfig,
    evaluator: MiniChessEvaluator
  ): IterationResult | null {
    let alpha = -INFINITY;
    const beta = INFINITY;
    let bestMove = rootMoves[0];
    let bestScore = -INFINITY;

    for (const move of rootMoves) {
      const undo = makeMove(root, move);
      const score = 0 - this.negamax(root, depth - 1, -beta, -alpha, 1, config, evaluator);
      unmakeMove(root, undo);

      if (this.stopSearch) return null;

      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      if (config.useAlphaBeta && bestScore > alpha) {
        alpha = bestScore;
      }
    }

    return { move: bestMove, score: bestScore };
  }

  /**
   * Negamax with optional fail-soft alpha-beta pruning
   */
  private negamax(
    position: Position,
    depth: number,
    alpha: number,
    beta: number,
    ply: number,
    config: SearchConfig,
    evaluator: MiniChessEvaluator
  ): number {
    if (this.shouldStop()) {
      this.stopSearch = true;
      return 0;
    }

    this.stats.nodes++;

    const terminal = this.terminalScore(position, ply);
    if (terminal !== null) {
      return terminal;
    }

    if (depth <= 0) {
      return evaluator.evaluate(position);
    }

    // No legal moves: scored on the board, as the game engine decides it
    const moves = generateMoves(position);
    if (moves.length === 0) {
      return evaluator.evaluate(position);
    }

    let bestScore = -INFINITY;

    for (const move of moves) {
      const undo = makeMove(position, move);
      const score = 0 - this.negamax(position, depth - 1, -beta, -alpha, ply + 1, config, evaluator);
      unmakeMove(position, undo);

      if (this.stopSearch) return 0;

      if (score > bestScore) {
        bestScore = score;
      }

      if (config.useAlphaBeta) {
        if (bestScore > alpha) {
          alpha = bestScore;
        }
        if (alpha >= beta) {
          this.stats.cutoffs++;
          break;
        }
      }
    }

    return bestScore;
  }

  /**
   * Score of a finished game from the side to move's perspective, or null
   */
  private terminalScore(position: Position, ply: number): number | null {
    if (!hasKing(position, position.turn)) {
      return -(WIN_SCORE - ply);
    }
    if (!hasKing(position, opposite(position.turn))) {
      return WIN_SCORE - ply;
    }
    if (position.halfMoveClock >= DRAW_HALF_MOVE_LIMIT) {
      return DRAW_SCORE;
    }
    return null;
  }

  /**
   * Poll the deadline before expanding a node
   */
  private shouldStop(): boolean {
    if (this.stopSearch) return true;
    return Date.now() >= this.deadline;
  }

  private buildResult(
    config: SearchConfig,
    startTime: number,
    result: Pick<SearchResult, 'move' | 'score' | 'depthReached' | 'outcome'>
  ): SearchResult {
    return {
      ...result,
      nodesExplored: this.stats.nodes,
      elapsedSeconds: (Date.now() - startTime) / 1000,
      cutoffs: this.stats.cutoffs,
      heuristic: config.heuristic,
    };
  }

  /**
   * Get the active configuration
   */
  getConfig(): SearchConfig {
    return { ...this.config };
  }

  /**
   * Update configuration
   * @throws ConfigurationError if the merged configuration is invalid
   */
  setConfig(config: Partial<SearchConfig>): void {
    this.config = parseSearchConfig(mergeConfig(this.config, config));
    this.evaluator = new MiniChessEvaluator(this.config.heuristic);
  }
}

/**
 * Create a search instance
 */
export function createMiniChessSearch(config?: Partial<SearchConfig>): MiniChessSearch {
  return new MiniChessSearch(config);
}

/**
 * One-shot search with an explicit configuration
 * @throws ConfigurationError if the configuration is invalid
 */
export function search(position: Position, sideToMove: Color, config: SearchConfig): SearchResult {
  return new MiniChessSearch(config).search(position, sideToMove);
}
