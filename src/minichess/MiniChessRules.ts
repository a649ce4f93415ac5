/**
 * MiniChessRules - Position handling and move generation
 *
 * Pure rules layer for the 5x5 board:
 * - Position construction, cloning and mirroring
 * - Legal move generation in a fixed, reproducible order
 * - In-place make/unmake used by the search
 * - Perft node counting for move generator validation
 *
 * Check is not enforced: capturing the king ends the game.
 */

import { InvariantViolationError } from './errors.js';
import {
  BOARD_SIZE,
  Board,
  Color,
  FILES,
  INITIAL_ROWS,
  Move,
  Piece,
  PieceType,
  Position,
  RANKS,
  Square,
  UndoInfo,
} from './types.js';

// =============================================================================
// Direction Tables
// =============================================================================

type Offset = readonly [number, number];

const KING_OFFSETS: readonly Offset[] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1],
];

const KNIGHT_OFFSETS: readonly Offset[] = [
  [-2, -1], [-2, 1], [2, -1], [2, 1],
  [-1, -2], [-1, 2], [1, -2], [1, 2],
];

const ROOK_RAYS: readonly Offset[] = [[-1, 0], [1, 0], [0, -1], [0, 1]];

const BISHOP_RAYS: readonly Offset[] = [[-1, -1], [-1, 1], [1, -1], [1, 1]];

/** Queen rays: straight lines first, then diagonals */
const QUEEN_RAYS: readonly Offset[] = [...ROOK_RAYS, ...BISHOP_RAYS];

const PIECE_TYPES: readonly PieceType[] = ['k', 'q', 'b', 'n', 'p'];

// =============================================================================
// Square Helpers
// =============================================================================

/** Squares indexed by [row][col] */
const SQUARE_GRID: Square[][] = Array.from({ length: BOARD_SIZE }, (_, row) =>
  FILES.map(file => `${file}${RANKS[BOARD_SIZE - 1 - row]}` as const)
);

/**
 * Convert a square to board coordinates (row 0 = rank 5)
 */
export function squareToCoords(square: Square): { row: number; col: number } {
  return {
    row: BOARD_SIZE - (square.charCodeAt(1) - 48),
    col: square.charCodeAt(0) - 97,
  };
}

/**
 * Convert board coordinates to a square
 */
export function coordsToSquare(row: number, col: number): Square {
  if (!isOnBoard(row, col)) {
    throw new InvariantViolationError(`Coordinates off the board: (${row}, ${col})`);
  }
  return SQUARE_GRID[row][col];
}

function isOnBoard(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/** Row a pawn of this color promotes on */
function promotionRow(color: Color): number {
  return color === 'w' ? 0 : BOARD_SIZE - 1;
}

// =============================================================================
// Position Construction
// =============================================================================

function isPieceType(value: string): value is PieceType {
  return PIECE_TYPES.some(type => type === value);
}

function parseCell(token: string): Piece | null {
  if (token === '.') return null;

  const colorChar = token[0];
  const typeChar = token.slice(1).toLowerCase();
  if (token.length !== 2 || (colorChar !== 'w' && colorChar !== 'b') || !isPieceType(typeChar)) {
    throw new Error(`Unrecognized board cell "${token}"`);
  }
  return { type: typeChar, color: colorChar };
}

/**
 * Build a position from five rows of cells, rank 5 first.
 * Cells are "." or a color letter followed by a piece letter ("wK", "bp").
 */
export function positionFromRows(
  rows: readonly string[],
  turn: Color = 'w',
  halfMoveClock: number = 0
): Position {
  if (rows.length !== BOARD_SIZE) {
    throw new Error(`Expected ${BOARD_SIZE} rows, got ${rows.length}`);
  }

  const board: Board = rows.map((row, index) => {
    const cells = row.trim().split(/\s+/);
    if (cells.length !== BOARD_SIZE) {
      throw new Error(`Row ${index} has ${cells.length} cells, expected ${BOARD_SIZE}`);
    }
    return cells.map(parseCell);
  });

  return { board, turn, halfMoveClock };
}

/**
 * Standard starting position, White to move
 */
export function createInitialPosition(): Position {
  return positionFromRows(INITIAL_ROWS);
}

export function clonePosition(position: Position): Position {
  return {
    board: position.board.map(row => row.map(piece => (piece ? { ...piece } : null))),
    turn: position.turn,
    halfMoveClock: position.halfMoveClock,
  };
}

/**
 * Flip the board vertically and swap piece colors. The side to move is kept,
 * so the mirrored position is seen from the other army.
 */
export function mirrorPosition(position: Position): Position {
  return {
    board: [...position.board]
      .reverse()
      .map(row => row.map(piece => (piece ? { type: piece.type, color: opposite(piece.color) } : null))),
    turn: position.turn,
    halfMoveClock: position.halfMoveClock,
  };
}

export function hasKing(position: Position, color: Color): boolean {
  for (const row of position.board) {
    for (const piece of row) {
      if (piece && piece.type === 'k' && piece.color === color) {
        return true;
      }
    }
  }
  return false;
}

// =============================================================================
// Move Generation
// =============================================================================

function pushMove(
  moves: Move[],
  board: Board,
  piece: Piece,
  row: number,
  col: number,
  toRow: number,
  toCol: number
): void {
  const target = board[toRow][toCol];
  const move: Move = {
    from: SQUARE_GRID[row][col],
    to: SQUARE_GRID[toRow][toCol],
    piece: piece.type,
    color: piece.color,
  };
  if (target) {
    move.captured = { ...target };
  }
  if (piece.type === 'p' && toRow === promotionRow(piece.color)) {
    move.promotion = true;
  }
  moves.push(move);
}

function generateStepMoves(
  moves: Move[],
  board: Board,
  piece: Piece,
  row: number,
  col: number,
  offsets: readonly Offset[]
): void {
  for (const [dr, dc] of offsets) {
    const r = row + dr;
    const c = col + dc;
    if (!isOnBoard(r, c)) continue;

    const target = board[r][c];
    if (target && target.color === piece.color) continue;
    pushMove(moves, board, piece, row, col, r, c);
  }
}

function generateSlidingMoves(
  moves: Move[],
  board: Board,
  piece: Piece,
  row: number,
  col: number,
  rays: readonly Offset[]
): void {
  for (const [dr, dc] of rays) {
    let r = row + dr;
    let c = col + dc;
    while (isOnBoard(r, c)) {
      const target = board[r][c];
      if (target) {
        if (target.color !== piece.color) {
          pushMove(moves, board, piece, row, col, r, c);
        }
        break;
      }
      pushMove(moves, board, piece, row, col, r, c);
      r += dr;
      c += dc;
    }
  }
}

function generatePawnMoves(moves: Move[], board: Board, piece: Piece, row: number, col: number): void {
  const direction = piece.color === 'w' ? -1 : 1;
  const r = row + direction;
  if (r < 0 || r >= BOARD_SIZE) return;

  if (!board[r][col]) {
    pushMove(moves, board, piece, row, col, r, col);
  }

  for (const dc of [-1, 1]) {
    const c = col + dc;
    if (c < 0 || c >= BOARD_SIZE) continue;
    const target = board[r][c];
    if (target && target.color !== piece.color) {
      pushMove(moves, board, piece, row, col, r, c);
    }
  }
}

/**
 * Generate all legal moves for a side.
 * Squares are scanned rank 5 to rank 1, file a to file e; each piece emits its
 * moves in a fixed direction order, so the result is reproducible.
 */
export function generateMoves(position: Position, color: Color = position.turn): Move[] {
  const moves: Move[] = [];
  const { board } = position;

  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const piece = board[row][col];
      if (!piece || piece.color !== color) continue;

      switch (piece.type) {
        case 'k':
          generateStepMoves(moves, board, piece, row, col, KING_OFFSETS);
          break;
        case 'q':
          generateSlidingMoves(moves, board, piece, row, col, QUEEN_RAYS);
          break;
        case 'b':
          generateSlidingMoves(moves, board, piece, row, col, BISHOP_RAYS);
          break;
        case 'n':
          generateStepMoves(moves, board, piece, row, col, KNIGHT_OFFSETS);
          break;
        case 'p':
          generatePawnMoves(moves, board, piece, row, col);
          break;
      }
    }
  }

  return moves;
}

// =============================================================================
// Make / Unmake
// =============================================================================

/**
 * Play a move in place. Every call must be paired with unmakeMove.
 * @throws InvariantViolationError if the move does not fit the position
 */
export function makeMove(position: Position, move: Move): UndoInfo {
  const { board } = position;
  const from = squareToCoords(move.from);
  const to = squareToCoords(move.to);
  const piece = board[from.row][from.col];

  if (!piece) {
    throw new InvariantViolationError(`Move ${formatMove(move)} starts on an empty square`);
  }
  if (piece.color !== position.turn || piece.color !== move.color || piece.type !== move.piece) {
    throw new InvariantViolationError(
      `Move ${formatMove(move)} does not match the ${piece.color}${piece.type} on ${move.from}`
    );
  }

  const target = board[to.row][to.col];
  if (target && target.color === piece.color) {
    throw new InvariantViolationError(`Move ${formatMove(move)} lands on a friendly piece`);
  }
  if ((target === null) !== (move.captured === undefined)) {
    throw new InvariantViolationError(`Move ${formatMove(move)} has stale capture information`);
  }

  const undo: UndoInfo = { move, halfMoveClock: position.halfMoveClock };

  board[to.row][to.col] = move.promotion ? { type: 'q', color: piece.color } : piece;
  board[from.row][from.col] = null;
  position.halfMoveClock = target ? 0 : position.halfMoveClock + 1;
  position.turn = opposite(position.turn);

  return undo;
}

/**
 * Take back a move played with makeMove
 */
export function unmakeMove(position: Position, undo: UndoInfo): void {
  const { board } = position;
  const { move } = undo;
  const from = squareToCoords(move.from);
  const to = squareToCoords(move.to);
  const moved = board[to.row][to.col];

  if (!moved) {
    throw new InvariantViolationError(`Cannot undo ${formatMove(move)}: target square is empty`);
  }

  board[from.row][from.col] = move.promotion ? { type: 'p', color: move.color } : moved;
  board[to.row][to.col] = move.captured ? { ...move.captured } : null;
  position.halfMoveClock = undo.halfMoveClock;
  position.turn = move.color;
}

/**
 * Return a new position with the move applied, leaving the input untouched
 */
export function applyMove(position: Position, move: Move): Position {
  const next = clonePosition(position);
  makeMove(next, move);
  return next;
}

/**
 * Short coordinate form used in logs ("b2 b3", "b4 b5=Q")
 */
export function formatMove(move: Move): string {
  return `${move.from} ${move.to}${move.promotion ? '=Q' : ''}`;
}

// =============================================================================
// Perft
// =============================================================================

/**
 * Count leaf nodes of the move tree to the given depth.
 * Positions where a king has been captured are leaves.
 */
export function perft(position: Position, depth: number): number {
  return perftInternal(clonePosition(position), depth);
}

function perftInternal(position: Position, depth: number): number {
  if (depth === 0) return 1;
  if (!hasKing(position, 'w') || !hasKing(position, 'b')) return 1;

  let nodes = 0;
  for (const move of generateMoves(position)) {
    const undo = makeMove(position, move);
    nodes += perftInternal(position, depth - 1);
    unmakeMove(position, undo);
  }
  return nodes;
}
