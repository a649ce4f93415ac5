/**
 * MiniChess Evaluator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  MiniChessEvaluator,
  evaluateMaterial,
  evaluatePieceSquares,
  evaluateSafety,
} from '../src/minichess/MiniChessEvaluator.js';
import {
  clonePosition,
  createInitialPosition,
  mirrorPosition,
  positionFromRows,
} from '../src/minichess/MiniChessRules.js';
import { HEURISTICS } from '../src/minichess/types.js';

// White queen and king against a lone black knight and king
const KNIGHT_DOWN = positionFromRows([
  'bK .  .  .  .',
  '.  .  .  .  .',
  '.  .  bN .  .',
  '.  .  .  .  .',
  '.  .  wQ .  wK',
]);

const OPEN_CENTER = positionFromRows([
  'bK .  bB .  .',
  '.  bQ .  bp .',
  '.  .  bN .  .',
  '.  wp wN .  .',
  '.  .  wB wQ wK',
]);

describe('MiniChessEvaluator', () => {
  it('should score the starting position as level for every heuristic', () => {
    const position = createInitialPosition();
    for (const heuristic of HEURISTICS) {
      expect(new MiniChessEvaluator(heuristic).evaluate(position)).toBe(0);
    }
  });

  it('should score material only with e0', () => {
    expect(new MiniChessEvaluator('e0').evaluate(KNIGHT_DOWN)).toBe(600);
  });

  it('should add piece-square values with e1', () => {
    // Queen on c1 is 0, knight on c3 is 25, both kings sit on 10
    expect(evaluatePieceSquares(KNIGHT_DOWN, 'w')).toBe(-25);
    expect(new MiniChessEvaluator('e1').evaluate(KNIGHT_DOWN)).toBe(575);
  });

  it('should add the threat balance with e2', () => {
    // The queen attacks the knight; Black attacks nothing
    expect(evaluateSafety(KNIGHT_DOWN, 'w')).toBe(30);
    expect(new MiniChessEvaluator('e2').evaluate(KNIGHT_DOWN)).toBe(605);
  });

  it('should evaluate from the side to move', () => {
    const blackToMove = clonePosition(KNIGHT_DOWN);
    blackToMove.turn = 'b';

    expect(new MiniChessEvaluator('e2').evaluate(blackToMove)).toBe(-605);
    expect(evaluateMaterial(blackToMove, 'b')).toBe(-600);
  });

  it('should count each attacked square once', () => {
    // Queen and knight both hit the pawn on c4
    const position = positionFromRows([
      'bK .  .  .  .',
      '.  .  bp .  .',
      '.  .  .  .  .',
      '.  wN wQ .  .',
      '.  .  .  .  wK',
    ]);

    expect(evaluateSafety(position, 'w')).toBe(10);
  });

  it('should report a breakdown that sums to the evaluation', () => {
    const breakdown = new MiniChessEvaluator('e2').getEvaluationBreakdown(KNIGHT_DOWN);

    expect(breakdown).toEqual({ material: 600, positional: -25, safety: 30, total: 605 });
  });

  it('should zero the terms a heuristic does not use', () => {
    const breakdown = new MiniChessEvaluator('e0').getEvaluationBreakdown(KNIGHT_DOWN);

    expect(breakdown).toEqual({ material: 600, positional: 0, safety: 0, total: 600 });
  });

  it('should negate the score of a color-mirrored position', () => {
    for (const position of [createInitialPosition(), KNIGHT_DOWN, OPEN_CENTER]) {
      for (const heuristic of HEURISTICS) {
        const evaluator = new MiniChessEvaluator(heuristic);
        const sum = evaluator.evaluate(position) + evaluator.evaluate(mirrorPosition(position));
        expect(sum).toBe(0);
      }
    }
  });

  it('should default to e2', () => {
    expect(new MiniChessEvaluator().getHeuristic()).toBe('e2');
  });
});
