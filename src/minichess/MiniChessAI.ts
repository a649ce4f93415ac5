/**
 * MiniChessAI - AI Player and Match Orchestration
 *
 * - Player contract shared by automated and human players
 * - MiniChessAI: search-driven player with difficulty presets
 * - MiniChessMatch: game loop that alternates two players until the game ends
 */

import { logMove, logSearchResult } from '../core/GameLogger.js';
import { configForDifficulty, mergeConfig, parseAIConfig } from './config.js';
import { IllegalMoveError, InvariantViolationError } from './errors.js';
import { MiniChessEngine } from './MiniChessEngine.js';
import { MiniChessSearch } from './MiniChessSearch.js';
import { formatMove } from './MiniChessRules.js';
import {
  AIConfig,
  AIDifficulty,
  DEFAULT_AI_CONFIG,
  GameResult,
  Move,
  Position,
  SearchResult,
} from './types.js';

// =============================================================================
// Player Contract
// =============================================================================

/**
 * Anything that can pick a move: the search-driven AI, or a front end
 * relaying a human's choice
 */
export interface Player {
  readonly name: string;
  /**
   * Choose one of `legalMoves` for the side to move in `position`.
   * Only called while the game is running and legal moves exist.
   */
  chooseMove(position: Position, legalMoves: Move[]): Promise<Move>;
}

// =============================================================================
// MiniChessAI Class
// =============================================================================

export class MiniChessAI implements Player {
  readonly name: string;
  private config: AIConfig;
  private search: MiniChessSearch;
  private lastResult: SearchResult | null = null;

  /**
   * @param config - Overrides, or a difficulty preset name
   * @throws ConfigurationError on an invalid configuration
   */
  constructor(config: Partial<AIConfig> | AIDifficulty = {}) {
    this.config = typeof config === 'string'
      ? configForDifficulty(config)
      : parseAIConfig(mergeConfig(DEFAULT_AI_CONFIG, config));
    this.name = this.config.name;
    this.search = new MiniChessSearch(this.config);
  }

  /**
   * Run a search for the side to move and return the full result
   */
  analyze(position: Position): SearchResult {
    const result = this.search.search(position, position.turn);
    this.lastResult = result;
    logSearchResult(this.name, result);
    return result;
  }

  async chooseMove(position: Position): Promise<Move> {
    const result = this.analyze(position);
    if (!result.move) {
      throw new InvariantViolationError(`${this.name} was asked to move in a position without legal moves`);
    }
    return result.move;
  }

  getLastResult(): SearchResult | null {
    return this.lastResult;
  }

  getConfig(): AIConfig {
    return { ...this.config };
  }
}

/**
 * Create a mini chess AI instance
 */
export function createMiniChessAI(config?: Partial<AIConfig> | AIDifficulty): MiniChessAI {
  return new MiniChessAI(config);
}

// =============================================================================
// MiniChessMatch Class
// =============================================================================

/** One half-move played by the match */
export interface MatchMove {
  move: Move;
  player: string;
  /** Search result when the player is an AI */
  search?: SearchResult;
  /** Wall-clock time the player took, ms */
  time: number;
}

export interface MatchOptions {
  initialPosition?: Position;
  /** Stop after this many half-moves even if the game is not over */
  maxHalfMoves?: number;
  /** Print each move through the game logger */
  logMoves?: boolean;
}

export interface MatchSummary {
  /** Null when the half-move cap ended the match */
  result: GameResult | null;
  halfMoves: number;
  history: MatchMove[];
}

/**
 * Game loop for two players
 */
export class MiniChessMatch {
  private engine: MiniChessEngine;
  private white: Player;
  private black: Player;
  private options: Required<Omit<MatchOptions, 'initialPosition'>>;
  private moveHistory: MatchMove[] = [];
  private onMove?: (entry: MatchMove, position: Position) => void;
  private onGameEnd?: (result: GameResult) => void;

  constructor(white: Player, black: Player, options: MatchOptions = {}) {
    this.engine = new MiniChessEngine({ initialPosition: options.initialPosition });
    this.white = white;
    this.black = black;
    this.options = {
      maxHalfMoves: options.maxHalfMoves ?? 200,
      logMoves: options.logMoves ?? false,
    };
  }

  /**
   * Set move callback
   */
  onMoveCallback(callback: (entry: MatchMove, position: Position) => void): void {
    this.onMove = callback;
  }

  /**
   * Set game end callback
   */
  onGameEndCallback(callback: (result: GameResult) => void): void {
    this.onGameEnd = callback;
  }

  /**
   * Ask the side to move for a move and apply it
   * @returns The half-move played, or null if the game is already over
   * @throws IllegalMoveError if the player returns a move that is not legal
   */
  async playMove(): Promise<MatchMove | null> {
    if (this.engine.isGameOver()) {
      return null;
    }

    const player = this.engine.turn() === 'w' ? this.white : this.black;
    const legalMoves = this.engine.getMoves();
    const startTime = Date.now();

    const choice = await player.chooseMove(this.engine.getPosition(), legalMoves);
    const elapsed = Date.now() - startTime;

    const played = this.engine.move(choice);
    if (!played) {
      throw new IllegalMoveError(player.name, formatMove(choice));
    }

    const entry: MatchMove = {
      move: played,
      player: player.name,
      time: elapsed,
    };
    if (player instanceof MiniChessAI) {
      const result = player.getLastResult();
      if (result) entry.search = result;
    }
    this.moveHistory.push(entry);

    if (this.options.logMoves) {
      logMove(this.moveHistory.length, player.name, played, entry.search);
    }
    if (this.onMove) {
      this.onMove(entry, this.engine.getPosition());
    }

    const result = this.engine.getGameResult();
    if (result && this.onGameEnd) {
      this.onGameEnd(result);
    }

    return entry;
  }

  /**
   * Play until the game ends or the half-move cap is reached
   */
  async playGame(): Promise<MatchSummary> {
    while (!this.engine.isGameOver() && this.moveHistory.length < this.options.maxHalfMoves) {
      await this.playMove();
    }

    return {
      result: this.engine.getGameResult(),
      halfMoves: this.moveHistory.length,
      history: this.getMoveHistory(),
    };
  }

  /**
   * Current position
   */
  getPosition(): Position {
    return this.engine.getPosition();
  }

  getMoveHistory(): MatchMove[] {
    return [...this.moveHistory];
  }

  /**
   * Reset match
   */
  reset(initialPosition?: Position): void {
    this.engine.reset(initialPosition);
    this.moveHistory = [];
  }
}

/**
 * Create a match between two players
 */
export function createMiniChessMatch(white: Player, black: Player, options?: MatchOptions): MiniChessMatch {
  return new MiniChessMatch(white, black, options);
}
