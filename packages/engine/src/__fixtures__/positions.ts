import {
  Board,
  Color,
  Game,
  GameSetup,
  Move,
  Piece,
  PieceKind,
  createBoard,
  createGame,
  formatMove,
} from "@multiverse-chess/core";
import { MoveIterator } from "../interfaces/IMoveGenerator";

/** Square coordinates from algebraic notation, e.g. "b3" */
export function sq(algebraic: string): { file: number; rank: number } {
  return {
    file: algebraic.charCodeAt(0) - 97,
    rank: parseInt(algebraic.slice(1), 10) - 1,
  };
}

function piece(color: Color, kind: PieceKind, moved: boolean): Piece {
  return { color, kind, moved };
}

export function white(kind: PieceKind, moved = false): Piece {
  return piece("white", kind, moved);
}

export function black(kind: PieceKind, moved = false): Piece {
  return piece("black", kind, moved);
}

/** Build a board from a map of algebraic squares to pieces */
export function makeBoard(
  timeline: number,
  turn: number,
  width: number,
  height: number,
  placements: Record<string, Piece> = {}
): Board {
  const pieces: (Piece | null)[] = Array.from({ length: width * height }, () => null);
  for (const [square, p] of Object.entries(placements)) {
    const { file, rank } = sq(square);
    pieces[rank * width + file] = p;
  }
  return createBoard(timeline, turn, width, height, pieces);
}

export function makeGame(
  width: number,
  height: number,
  boards: Board[],
  opts?: Omit<GameSetup, "width" | "height" | "boards">
): Game {
  return createGame({ width, height, boards, ...opts });
}

/** Drain a move sequence; fails when there is no sequence at all */
export function collect(moves: MoveIterator | null): Move[] {
  if (!moves) throw new Error("Expected a move sequence");
  const out: Move[] = [];
  for (let next = moves.next(); !next.done; next = moves.next()) {
    out.push(next.value);
  }
  return out;
}

export function labels(moves: ReadonlyArray<Move>): string[] {
  return moves.map(formatMove);
}

/**
 * Two white boards on timelines -1 and 1 at turn 0, separated by timeline 0
 * whose only board is a black one at turn 1, so no piece can reach the other
 * white board. Board -1 has 3 moves (king a2 to a1/a3, rook a4 to a3),
 * board 1 has 2 (king a2 to a1/a3).
 */
export function twoBoardGame(): Game {
  return makeGame(1, 4, [
    makeBoard(-1, 0, 1, 4, { a2: white("king"), a4: white("rook") }),
    makeBoard(0, 1, 1, 4),
    makeBoard(1, 0, 1, 4, { a2: white("king") }),
  ]);
}

/**
 * Two white 1x2 boards on timelines 0 and 1 at turn 0, a rook on each.
 * Board 0: rook a2 jumps to (1T0)a2 or moves to a1.
 * Board 1: rook a1 jumps to (0T0)a1 or moves to a2.
 */
export function jumpGame(): Game {
  return makeGame(1, 2, [
    makeBoard(0, 0, 1, 2, { a2: white("rook") }),
    makeBoard(1, 0, 1, 2, { a1: white("rook") }),
  ]);
}
