import chalk from 'chalk';
import { formatMove } from '../minichess/MiniChessRules.js';
import type { GameResult, Move, SearchResult } from '../minichess/types.js';

// Configuration flags
let verboseEnabled = false;

/**
 * Enable or disable per-search statistics output
 */
export const setVerboseLogging = (enabled: boolean): void => {
    verboseEnabled = enabled;
};

export const isVerboseLogging = (): boolean => verboseEnabled;

/**
 * Format search statistics on one line
 */
export const formatSearchStats = (result: SearchResult): string => {
    const move = result.move ? formatMove(result.move) : '(none)';
    return `${move} score=${result.score} depth=${result.depthReached} ` +
        `nodes=${result.nodesExplored} cutoffs=${result.cutoffs} ` +
        `time=${result.elapsedSeconds.toFixed(3)}s ${result.heuristic} ${result.outcome}`;
};

/**
 * Log a finished search. Only printed in verbose mode.
 *
 * @param playerName - Name of the AI that ran the search
 * @param result - The search result
 */
export const logSearchResult = (playerName: string, result: SearchResult): void => {
    if (!verboseEnabled) return;
    console.log(chalk.gray(`[${playerName}] ${formatSearchStats(result)}`));
};

/**
 * Log a move applied by the game loop
 */
export const logMove = (halfMove: number, playerName: string, move: Move, result?: SearchResult): void => {
    const label = move.color === 'w' ? chalk.white(playerName) : chalk.cyan(playerName);
    let line = `${String(halfMove).padStart(3)}. ${label} ${chalk.bold(formatMove(move))}`;
    if (move.captured) {
        line += chalk.red(` x${move.captured.type.toUpperCase()}`);
    }
    if (result) {
        line += chalk.gray(`  (score ${result.score}, depth ${result.depthReached}, ` +
            `${result.nodesExplored} nodes, ${result.elapsedSeconds.toFixed(2)}s)`);
    }
    console.log(line);
};

/**
 * Log the end of a game
 */
export const logGameResult = (result: GameResult, halfMoves: number): void => {
    const winner = result.winner === 'w' ? 'White wins' : result.winner === 'b' ? 'Black wins' : 'Draw';
    console.log(chalk.green(`\n${winner} (${result.score}) by ${result.reason.replace(/_/g, ' ')} after ${halfMoves} half-moves`));
};

/**
 * Log a recoverable problem. Always printed.
 */
export const logWarning = (message: string): void => {
    console.warn(chalk.yellow(`⚠️  ${message}`));
};
