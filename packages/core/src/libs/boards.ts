import { Board, Color, Coords, Move, Piece, PieceKind } from "../types/game";

// ---------------------------------------------------------------------------
// Colors and pieces
// ---------------------------------------------------------------------------

/** Get the opponent color */
export function opponentColor(color: Color): Color {
  return color === "white" ? "black" : "white";
}

/** The color to move on boards of the given turn */
export function colorOnTurn(turn: number): Color {
  return turn % 2 === 0 ? "white" : "black";
}

const ROYAL_KINDS: ReadonlySet<PieceKind> = new Set<PieceKind>(["king", "royalQueen"]);

/** Royal pieces must never be left capturable */
export function isRoyal(piece: Piece): boolean {
  return ROYAL_KINDS.has(piece.kind);
}

export function pieceEquals(a: Piece | null, b: Piece | null): boolean {
  if (a === null || b === null) return a === b;
  return a.color === b.color && a.kind === b.kind && a.moved === b.moved;
}

// ---------------------------------------------------------------------------
// Coordinates
// ---------------------------------------------------------------------------

/** Map key of the board at (timeline, turn) */
export function boardKey(timeline: number, turn: number): string {
  return `${timeline}:${turn}`;
}

export function coordsEquals(a: Coords, b: Coords): boolean {
  return (
    a.timeline === b.timeline &&
    a.turn === b.turn &&
    a.file === b.file &&
    a.rank === b.rank
  );
}

/** Whether two coordinates lie on the same board */
export function sameBoard(a: Coords, b: Coords): boolean {
  return a.timeline === b.timeline && a.turn === b.turn;
}

export function moveEquals(a: Move, b: Move): boolean {
  return (
    a.kind === b.kind &&
    a.promotion === b.promotion &&
    coordsEquals(a.from.coords, b.from.coords) &&
    coordsEquals(a.to.coords, b.to.coords) &&
    pieceEquals(a.from.piece, b.from.piece) &&
    pieceEquals(a.to.piece, b.to.piece)
  );
}

/** Short human-readable form, e.g. "(0T2)c1>(1T0)c3" */
export function formatMove(move: Move): string {
  const fmt = (c: Coords) =>
    `(${c.timeline}T${c.turn})${String.fromCharCode(97 + c.file)}${c.rank + 1}`;
  return `${fmt(move.from.coords)}>${fmt(move.to.coords)}`;
}

// ---------------------------------------------------------------------------
// Boards
// ---------------------------------------------------------------------------

/** Build a frozen board. Throws if the piece list does not fit the dimensions. */
export function createBoard(
  timeline: number,
  turn: number,
  width: number,
  height: number,
  pieces: ReadonlyArray<Piece | null>
): Board {
  if (pieces.length !== width * height) {
    throw new Error(
      `Board ${boardKey(timeline, turn)} has ${pieces.length} squares, expected ${width * height}`
    );
  }
  return Object.freeze({
    timeline,
    turn,
    width,
    height,
    activeColor: colorOnTurn(turn),
    pieces: Object.freeze(pieces.map((p) => (p ? Object.freeze({ ...p }) : null))),
  });
}

/** Check if a square is within the board's bounds */
export function isInBounds(board: Board, file: number, rank: number): boolean {
  return file >= 0 && file < board.width && rank >= 0 && rank < board.height;
}

export function squareIndex(board: Board, file: number, rank: number): number {
  return rank * board.width + file;
}

/** Get piece at a square, or null if empty or out of bounds */
export function pieceAt(board: Board, file: number, rank: number): Piece | null {
  if (!isInBounds(board, file, rank)) return null;
  return board.pieces[squareIndex(board, file, rank)];
}

export interface SquareChange {
  file: number;
  rank: number;
  piece: Piece | null;
}

/**
 * Produce a new board at (timeline, turn) from `board` with the given squares overwritten.
 * The source board is left untouched.
 */
export function deriveBoard(
  board: Board,
  timeline: number,
  turn: number,
  changes: ReadonlyArray<SquareChange>
): Board {
  const pieces = [...board.pieces];
  for (const change of changes) {
    if (!isInBounds(board, change.file, change.rank)) {
      throw new Error(`Square ${change.file},${change.rank} is outside the board`);
    }
    pieces[squareIndex(board, change.file, change.rank)] = change.piece;
  }
  return createBoard(timeline, turn, board.width, board.height, pieces);
}
