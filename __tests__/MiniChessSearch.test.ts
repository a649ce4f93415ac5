/**
 * MiniChess Search Unit Tests
 *
 * Tests for the search layer:
 * - Minimax / alpha-beta equivalence
 * - King capture scoring
 * - Time budget handling (deadline, depth-1 fallback)
 * - Configuration validation
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../src/minichess/errors.js';
import { MiniChessEngine } from '../src/minichess/MiniChessEngine.js';
import { MiniChessSearch, search } from '../src/minichess/MiniChessSearch.js';
import {
  clonePosition,
  createInitialPosition,
  formatMove,
  positionFromRows,
} from '../src/minichess/MiniChessRules.js';
import { HEURISTICS, WIN_SCORE } from '../src/minichess/types.js';
import type { Position, SearchConfig } from '../src/minichess/types.js';

const KING_HUNT = positionFromRows([
  '.  .  .  .  bK',
  '.  .  .  .  .',
  '.  .  wQ .  .',
  '.  .  bQ .  .',
  '.  .  .  .  wK',
]);

const OPEN_CENTER = positionFromRows([
  'bK .  bB .  .',
  '.  bQ .  bp .',
  '.  .  bN .  .',
  '.  wp wN .  .',
  '.  .  wB wQ wK',
]);

// Every white piece is boxed in by its own pieces
const NO_WHITE_MOVES = positionFromRows([
  'wB wp .  .  bK',
  'wp wp .  .  .',
  'wp wp .  .  .',
  'wp wp .  .  .',
  'wK wp .  .  .',
]);

function config(overrides: Partial<SearchConfig>): SearchConfig {
  return {
    timeBudgetSeconds: 600,
    useAlphaBeta: true,
    heuristic: 'e0',
    maxDepth: 2,
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Best Move
// =============================================================================

describe('MiniChessSearch', () => {
  it('should grab the hanging pawn at depth 1', () => {
    const result = search(createInitialPosition(), 'w', config({ maxDepth: 1 }));

    expect(result.move && formatMove(result.move)).toBe('d1 d4');
    expect(result.score).toBe(100);
    expect(result.depthReached).toBe(1);
    expect(result.outcome).toBe('completed');
  });

  it('should see the recapture at depth 2 and keep the first best move', () => {
    const result = search(createInitialPosition(), 'w', config({ maxDepth: 2 }));

    expect(result.move && formatMove(result.move)).toBe('b2 b3');
    expect(result.score).toBe(-100);
    expect(result.depthReached).toBe(2);
  });

  it('should search for the side passed in rather than position.turn', () => {
    const result = search(createInitialPosition(), 'b', config({ maxDepth: 1 }));

    expect(result.move?.color).toBe('b');
    expect(result.move && formatMove(result.move)).toBe('b5 b2');
    expect(result.score).toBe(100);
  });

  it('should never modify the input position', () => {
    const position = createInitialPosition();
    const snapshot = clonePosition(position);

    search(position, 'b', config({ maxDepth: 3, heuristic: 'e2' }));

    expect(position).toEqual(snapshot);
  });

  it('should be deterministic', () => {
    const first = search(OPEN_CENTER, 'w', config({ maxDepth: 3, heuristic: 'e2' }));
    const second = search(OPEN_CENTER, 'w', config({ maxDepth: 3, heuristic: 'e2' }));

    expect(second.move).toEqual(first.move);
    expect(second.score).toBe(first.score);
    expect(second.nodesExplored).toBe(first.nodesExplored);
  });
});

// =============================================================================
// Alpha-Beta Equivalence
// =============================================================================

describe('Alpha-beta pruning', () => {
  const positions: Array<[string, Position]> = [
    ['start', createInitialPosition()],
    ['open center', OPEN_CENTER],
    ['king hunt', KING_HUNT],
  ];

  for (const [name, position] of positions) {
    for (const heuristic of HEURISTICS) {
      it(`should match minimax on ${name} with ${heuristic}`, () => {
        for (let depth = 1; depth <= 3; depth++) {
          const minimax = search(position, 'w', config({ heuristic, maxDepth: depth, useAlphaBeta: false }));
          const alphaBeta = search(position, 'w', config({ heuristic, maxDepth: depth, useAlphaBeta: true }));

          expect(alphaBeta.move).toEqual(minimax.move);
          expect(alphaBeta.score).toBe(minimax.score);
          expect(alphaBeta.nodesExplored).toBeLessThanOrEqual(minimax.nodesExplored);
        }
      });
    }
  }

  it('should explore fewer nodes than minimax once it can prune', () => {
    const minimax = search(createInitialPosition(), 'w', config({ useAlphaBeta: false }));
    const alphaBeta = search(createInitialPosition(), 'w', config({ useAlphaBeta: true }));

    expect(alphaBeta.nodesExplored).toBeLessThan(minimax.nodesExplored);
    expect(alphaBeta.cutoffs).toBeGreaterThan(0);
    expect(minimax.cutoffs).toBe(0);
  });
});

// =============================================================================
// Terminal Positions
// =============================================================================

describe('Terminal scoring', () => {
  it('should capture the king and stop deepening', () => {
    const result = search(KING_HUNT, 'w', config({ maxDepth: 4 }));

    expect(result.move && formatMove(result.move)).toBe('c3 e5');
    expect(result.move?.captured).toEqual({ type: 'k', color: 'b' });
    expect(result.score).toBe(WIN_SCORE - 1);
    expect(result.depthReached).toBe(1);
    expect(result.outcome).toBe('completed');
  });

  it('should capture the king without pruning too', () => {
    const result = search(KING_HUNT, 'w', config({ maxDepth: 2, useAlphaBeta: false }));

    expect(result.move && formatMove(result.move)).toBe('c3 e5');
    expect(result.score).toBe(WIN_SCORE - 1);
  });

  it('should report a root without legal moves', () => {
    const result = search(NO_WHITE_MOVES, 'w', config({}));

    expect(result.move).toBeNull();
    expect(result.outcome).toBe('no_legal_moves');
    expect(result.depthReached).toBe(0);
    expect(result.nodesExplored).toBe(0);
    // King, bishop and eight pawns against a lone king
    expect(result.score).toBe(1100);
  });

  it('should score a line that leaves the opponent without moves on the board', () => {
    // Black is walled in by its own pieces whatever the white king does
    const walledIn = positionFromRows([
      'bK bp .  .  .',
      'bp bp .  .  .',
      'bp bp .  .  .',
      'bp bp .  .  .',
      'bB bp .  .  wK',
    ]);

    const result = search(walledIn, 'w', config({ maxDepth: 3 }));

    // Black keeps a bishop and eight pawns: the game engine awards it the game
    expect(result.move && formatMove(result.move)).toBe('e1 d2');
    expect(result.score).toBe(-1100);
    expect(result.depthReached).toBe(3);
    expect(result.outcome).toBe('completed');

    const game = new MiniChessEngine({ initialPosition: walledIn });
    game.move({ from: 'e1', to: 'd2' });
    expect(game.getGameResult()).toEqual({ winner: 'b', reason: 'no_legal_moves', score: '0-1' });
  });

  it('should score a position at the no-capture limit as a draw', () => {
    const kings = positionFromRows([
      'bK .  .  .  .',
      '.  .  .  .  .',
      '.  .  .  .  .',
      '.  .  .  .  .',
      '.  .  .  .  wK',
    ], 'w', 19);

    const result = search(kings, 'w', config({ maxDepth: 3 }));

    expect(result.score).toBe(0);
    expect(result.depthReached).toBe(3);
  });
});

// =============================================================================
// Time Budget
// =============================================================================

describe('Time budget', () => {
  it('should return the last completed depth when the deadline passes mid-search', () => {
    // Every clock read advances one millisecond
    let now = 0;
    vi.spyOn(Date, 'now').mockImplementation(() => ++now);

    const result = new MiniChessSearch(config({ timeBudgetSeconds: 0.05, maxDepth: 64 }))
      .search(createInitialPosition());

    expect(result.outcome).toBe('time_expired');
    expect(result.depthReached).toBe(1);
    expect(result.move && formatMove(result.move)).toBe('d1 d4');
    expect(result.score).toBe(100);
  });

  it('should fall back to the first legal move if depth 1 never finishes', () => {
    let now = 0;
    vi.spyOn(Date, 'now').mockImplementation(() => (now += 5000));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const result = new MiniChessSearch(config({ timeBudgetSeconds: 1 })).search(createInitialPosition());

    expect(result.outcome).toBe('depth1_fallback');
    expect(result.move && formatMove(result.move)).toBe('b2 b3');
    expect(result.depthReached).toBe(0);
    expect(result.score).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should finish quickly on a real clock with a small budget', () => {
    const result = new MiniChessSearch({ timeBudgetSeconds: 0.2 }).search(createInitialPosition());

    expect(result.move).not.toBeNull();
    expect(result.elapsedSeconds).toBeLessThan(5);
    expect(['completed', 'time_expired']).toContain(result.outcome);
  });
});

// =============================================================================
// Configuration
// =============================================================================

describe('Search configuration', () => {
  it('should reject a non-positive time budget', () => {
    expect(() => new MiniChessSearch({ timeBudgetSeconds: 0 })).toThrow(ConfigurationError);
    expect(() => new MiniChessSearch({ timeBudgetSeconds: -1 })).toThrow(ConfigurationError);
  });

  it('should reject a fractional depth limit', () => {
    expect(() => new MiniChessSearch({ maxDepth: 1.5 })).toThrow(ConfigurationError);
  });

  it('should validate per-call overrides before searching', () => {
    const engine = new MiniChessSearch();

    expect(() => engine.search(createInitialPosition(), 'w', { maxDepth: 0 })).toThrow(ConfigurationError);
  });

  it('should apply per-call overrides without changing the stored config', () => {
    const engine = new MiniChessSearch(config({ heuristic: 'e2' }));
    const result = engine.search(createInitialPosition(), 'w', { heuristic: 'e0', maxDepth: 1 });

    expect(result.heuristic).toBe('e0');
    expect(engine.getConfig().heuristic).toBe('e2');
    expect(engine.getConfig().maxDepth).toBe(2);
  });

  it('should keep defaults for overrides passed as undefined', () => {
    const engine = new MiniChessSearch({ maxDepth: undefined, heuristic: 'e0' });
    const result = engine.search(createInitialPosition(), 'w', { maxDepth: 1, timeBudgetSeconds: undefined });

    expect(engine.getConfig().maxDepth).toBe(64);
    expect(engine.getConfig().timeBudgetSeconds).toBe(5);
    expect(result.depthReached).toBe(1);
  });

  it('should update the config with setConfig', () => {
    const engine = new MiniChessSearch();
    engine.setConfig({ heuristic: 'e1', useAlphaBeta: false });

    expect(engine.getConfig()).toEqual({
      timeBudgetSeconds: 5,
      useAlphaBeta: false,
      heuristic: 'e1',
      maxDepth: 64,
    });
  });
});
