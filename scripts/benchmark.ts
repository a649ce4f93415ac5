#!/usr/bin/env npx tsx
/**
 * MiniChess Search Benchmark
 *
 * Compares plain minimax with alpha-beta pruning on a set of positions and
 * checks that both pick the same move and score. Also runs perft on the
 * starting position.
 *
 * Usage:
 *   npx tsx scripts/benchmark.ts [--depth <n>] [--heuristic <e0|e1|e2>] [--output <file>]
 *
 * @module scripts/benchmark
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { MiniChessSearch } from '../src/minichess/MiniChessSearch.js';
import { createInitialPosition, formatMove, perft, positionFromRows } from '../src/minichess/MiniChessRules.js';
import { HEURISTICS, Heuristic, Position, SearchResult } from '../src/minichess/types.js';

// =============================================================================
// Types
// =============================================================================

interface BenchmarkPosition {
  id: string;
  name: string;
  position: Position;
}

interface PositionResult {
  id: string;
  name: string;
  minimax: SearchResult;
  alphaBeta: SearchResult;
  /** Move and score agree */
  consistent: boolean;
  /** Fraction of minimax nodes alpha-beta skipped */
  nodeSavings: number;
}

interface BenchmarkReport {
  timestamp: string;
  depth: number;
  heuristic: Heuristic;
  perft: Array<{ depth: number; nodes: number }>;
  positions: PositionResult[];
  consistent: boolean;
}

// =============================================================================
// Positions
// =============================================================================

const POSITIONS: BenchmarkPosition[] = [
  {
    id: 'start',
    name: 'Starting position',
    position: createInitialPosition(),
  },
  {
    id: 'open-center',
    name: 'Open center',
    position: positionFromRows([
      'bK .  bB .  .',
      '.  bQ .  bp .',
      '.  .  bN .  .',
      '.  wp wN .  .',
      '.  .  wB wQ wK',
    ]),
  },
  {
    id: 'king-hunt',
    name: 'King hunt',
    position: positionFromRows([
      '.  .  .  .  bK',
      '.  .  .  bp .',
      '.  .  wQ .  .',
      '.  .  bQ .  .',
      '.  .  .  .  wK',
    ]),
  },
  {
    id: 'pawn-race',
    name: 'Pawn race',
    position: positionFromRows([
      'bK .  .  .  .',
      '.  wp .  .  .',
      '.  .  .  .  .',
      '.  .  .  bp .',
      '.  .  .  .  wK',
    ]),
  },
];

// =============================================================================
// Benchmark
// =============================================================================

function runPosition(entry: BenchmarkPosition, depth: number, heuristic: Heuristic): PositionResult {
  const common = { timeBudgetSeconds: 600, maxDepth: depth, heuristic };
  const minimax = new MiniChessSearch({ ...common, useAlphaBeta: false }).search(entry.position);
  const alphaBeta = new MiniChessSearch({ ...common, useAlphaBeta: true }).search(entry.position);

  const sameMove = minimax.move !== null && alphaBeta.move !== null
    ? formatMove(minimax.move) === formatMove(alphaBeta.move)
    : minimax.move === alphaBeta.move;

  return {
    id: entry.id,
    name: entry.name,
    minimax,
    alphaBeta,
    consistent: sameMove && minimax.score === alphaBeta.score,
    nodeSavings: minimax.nodesExplored > 0 ? 1 - alphaBeta.nodesExplored / minimax.nodesExplored : 0,
  };
}

function printResult(result: PositionResult): void {
  const status = result.consistent ? chalk.green('✓') : chalk.red('✗');
  const move = result.alphaBeta.move ? formatMove(result.alphaBeta.move) : '(none)';
  console.log(
    `${status} ${result.name.padEnd(20)} ${move.padEnd(8)} score ${String(result.alphaBeta.score).padStart(8)}  ` +
    `minimax ${String(result.minimax.nodesExplored).padStart(9)} nodes  ` +
    `alpha-beta ${String(result.alphaBeta.nodesExplored).padStart(9)} nodes  ` +
    chalk.gray(`(-${(result.nodeSavings * 100).toFixed(1)}%)`)
  );
}

// =============================================================================
// CLI Entry Point
// =============================================================================

async function main() {
  const args = process.argv.slice(2);
  const depthIdx = args.indexOf('--depth');
  const depth = depthIdx >= 0 ? parseInt(args[depthIdx + 1], 10) : 4;
  const heuristicIdx = args.indexOf('--heuristic');
  const heuristic = HEURISTICS.find(h => heuristicIdx >= 0 && h === args[heuristicIdx + 1]) ?? 'e2';
  const outputIdx = args.indexOf('--output');
  const outputFile = outputIdx >= 0 ? args[outputIdx + 1] : null;

  console.log(chalk.bold(`\nMiniChess benchmark - depth ${depth}, heuristic ${heuristic}\n`));

  const perftResults: BenchmarkReport['perft'] = [];
  for (let d = 1; d <= Math.min(depth, 4); d++) {
    const nodes = perft(createInitialPosition(), d);
    perftResults.push({ depth: d, nodes });
    console.log(chalk.gray(`perft(${d}) = ${nodes}`));
  }
  console.log();

  const results = POSITIONS.map(entry => {
    const result = runPosition(entry, depth, heuristic);
    printResult(result);
    return result;
  });

  const report: BenchmarkReport = {
    timestamp: new Date().toISOString(),
    depth,
    heuristic,
    perft: perftResults,
    positions: results,
    consistent: results.every(r => r.consistent),
  };

  if (outputFile) {
    fs.writeFileSync(outputFile, JSON.stringify(report, null, 2));
    console.log(`\n📄 Report saved to: ${outputFile}`);
  }

  if (!report.consistent) {
    console.log('\n❌ Alpha-beta and minimax disagree - pruning is unsound!');
    process.exit(1);
  }

  console.log('\n✅ Benchmark completed successfully!');
}

main().catch(err => {
  console.error('Benchmark failed:', err);
  process.exit(1);
});
