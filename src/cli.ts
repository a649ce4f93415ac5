#!/usr/bin/env node
/**
 * MiniChess CLI
 *
 * Plays an AI-vs-AI match and prints every move with its search statistics.
 *
 * Usage:
 *   minichess                          # e2 vs e2, 5s per move
 *   minichess --white e2 --black e0    # Compare heuristics
 *   minichess --time 0.5 --no-alpha-beta
 *
 * @module cli
 */

import chalk from 'chalk';
import meow from 'meow';
import { logGameResult, setVerboseLogging } from './core/GameLogger.js';
import { ConfigurationError } from './minichess/errors.js';
import { MiniChessAI, MiniChessMatch } from './minichess/MiniChessAI.js';
import { HEURISTICS, type Heuristic } from './minichess/types.js';

const cli = meow(`
  Usage
    $ minichess [options]

  Options
    --white <e0|e1|e2>   Heuristic for White (default: e2)
    --black <e0|e1|e2>   Heuristic for Black (default: e2)
    --time <seconds>     Time budget per move (default: 5)
    --depth <n>          Maximum search depth (default: 64)
    --no-alpha-beta      Search with plain minimax
    --max-moves <n>      Stop after this many half-moves (default: 200)
    -v, --verbose        Print search statistics for every search

  Examples
    $ minichess --white e2 --black e0 --time 1
    $ minichess --depth 3 --no-alpha-beta
`, {
  importMeta: import.meta,
  flags: {
    white: {
      type: 'string',
      default: 'e2',
    },
    black: {
      type: 'string',
      default: 'e2',
    },
    time: {
      type: 'number',
      default: 5,
    },
    depth: {
      type: 'number',
      default: 64,
    },
    alphaBeta: {
      type: 'boolean',
      default: true,
    },
    maxMoves: {
      type: 'number',
      default: 200,
    },
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
      default: false,
    },
  },
});

function parseHeuristic(value: string, flag: string): Heuristic {
  const heuristic = HEURISTICS.find(h => h === value);
  if (!heuristic) {
    throw new ConfigurationError([`--${flag} must be one of ${HEURISTICS.join(', ')}, got "${value}"`]);
  }
  return heuristic;
}

async function main(): Promise<void> {
  const { flags } = cli;
  setVerboseLogging(flags.verbose);

  const shared = {
    timeBudgetSeconds: flags.time,
    maxDepth: flags.depth,
    useAlphaBeta: flags.alphaBeta,
  };
  const white = new MiniChessAI({
    ...shared,
    name: `White (${flags.white})`,
    heuristic: parseHeuristic(flags.white, 'white'),
  });
  const black = new MiniChessAI({
    ...shared,
    name: `Black (${flags.black})`,
    heuristic: parseHeuristic(flags.black, 'black'),
  });

  console.log(chalk.bold(`\n♛ MiniChess - ${white.name} vs ${black.name}\n`));

  const match = new MiniChessMatch(white, black, {
    maxHalfMoves: flags.maxMoves,
    logMoves: true,
  });
  const summary = await match.playGame();

  if (summary.result) {
    logGameResult(summary.result, summary.halfMoves);
  } else {
    console.log(chalk.yellow(`\nStopped after ${summary.halfMoves} half-moves`));
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(err.message));
    cli.showHelp(1);
  }
  console.error(chalk.red('MiniChess failed:'), err);
  process.exit(1);
});
