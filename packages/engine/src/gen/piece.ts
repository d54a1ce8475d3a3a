import {
  Color,
  Coords,
  Game,
  Move,
  Piece,
  coordsEquals,
  isInBounds,
  moveEquals,
  pieceAt,
  pieceEquals,
  sameBoard,
} from "@multiverse-chess/core";
import { IMoveGenerator, MoveIterator } from "../interfaces/IMoveGenerator";
import type { PartialGame } from "../PartialGame";
import { MOVEMENT_RULES, MovementRule, Vector, vectorEquals } from "./vectors";

// ---------------------------------------------------------------------------
// Square lookup
// ---------------------------------------------------------------------------

type Landing =
  | { status: "empty" }
  | { status: "capture"; piece: Piece }
  /** Own piece, off the board, or no board at all */
  | { status: "blocked" };

function look(game: Game, partial: PartialGame, coords: Coords, color: Color): Landing {
  const board = partial.getBoard(game, coords.timeline, coords.turn);
  if (!board || !isInBounds(board, coords.file, coords.rank)) {
    return { status: "blocked" };
  }
  const target = pieceAt(board, coords.file, coords.rank);
  if (!target) return { status: "empty" };
  if (target.color === color) return { status: "blocked" };
  return { status: "capture", piece: target };
}

function offset(from: Coords, v: Vector, k: number): Coords {
  return {
    timeline: from.timeline + v.dl * k,
    turn: from.turn + 2 * v.dt * k,
    file: from.file + v.df * k,
    rank: from.rank + v.dr * k,
  };
}

function buildMove(
  game: Game,
  partial: PartialGame,
  piece: Piece,
  from: Coords,
  to: Coords,
  captured: Piece | null
): Move {
  const move: Move = {
    from: { piece, coords: from },
    to: { piece: captured, coords: to },
    kind: sameBoard(from, to)
      ? "board"
      : partial.isLastBoard(to.timeline, to.turn)
        ? "jump"
        : "branch",
  };
  const lastRank = piece.color === "white" ? game.height - 1 : 0;
  if (piece.kind === "pawn" && to.rank === lastRank) {
    move.promotion = "queen";
  }
  return move;
}

// ---------------------------------------------------------------------------
// Pawns
// ---------------------------------------------------------------------------

/** Non-capturing steps: forward along ranks, forward across timelines */
function pawnPushes(color: Color): Vector[] {
  const rank = color === "white" ? 1 : -1;
  const timeline = color === "white" ? -1 : 1;
  return [
    { dl: 0, dt: 0, df: 0, dr: rank },
    { dl: timeline, dt: 0, df: 0, dr: 0 },
  ];
}

/** Diagonal captures in the (file, rank) and (timeline, turn) planes */
function pawnCaptures(color: Color): Vector[] {
  const rank = color === "white" ? 1 : -1;
  const timeline = color === "white" ? -1 : 1;
  return [
    { dl: 0, dt: 0, df: -1, dr: rank },
    { dl: 0, dt: 0, df: 1, dr: rank },
    { dl: timeline, dt: -1, df: 0, dr: 0 },
    { dl: timeline, dt: 1, df: 0, dr: 0 },
  ];
}

function* pawnMoves(
  game: Game,
  partial: PartialGame,
  piece: Piece,
  from: Coords
): Generator<Move, void> {
  for (const step of pawnPushes(piece.color)) {
    const one = offset(from, step, 1);
    if (look(game, partial, one, piece.color).status !== "empty") continue;
    yield buildMove(game, partial, piece, from, one, null);

    if (!piece.moved) {
      const two = offset(from, step, 2);
      if (look(game, partial, two, piece.color).status === "empty") {
        yield buildMove(game, partial, piece, from, two, null);
      }
    }
  }

  for (const v of pawnCaptures(piece.color)) {
    const to = offset(from, v, 1);
    const landing = look(game, partial, to, piece.color);
    if (landing.status === "capture") {
      yield buildMove(game, partial, piece, from, to, landing.piece);
    }
  }
}

// ---------------------------------------------------------------------------
// Leapers and riders
// ---------------------------------------------------------------------------

function* ruleMoves(
  game: Game,
  partial: PartialGame,
  piece: Piece,
  rule: MovementRule,
  from: Coords
): Generator<Move, void> {
  for (const v of rule.vectors) {
    for (let k = 1; ; k++) {
      const to = offset(from, v, k);
      const landing = look(game, partial, to, piece.color);
      if (landing.status === "blocked") break;
      const captured = landing.status === "capture" ? landing.piece : null;
      yield buildMove(game, partial, piece, from, to, captured);
      if (captured || !rule.slides) break;
    }
  }
}

// ---------------------------------------------------------------------------
// Piece-level move generator
// ---------------------------------------------------------------------------

/**
 * Moves of one piece standing on one square.
 * Generation and validation read the square through the partial game, so a
 * PieceMoves built from an outdated position yields nothing.
 */
export class PieceMoves implements IMoveGenerator {
  constructor(
    readonly piece: Piece,
    readonly coords: Coords
  ) {}

  generateMoves(game: Game, partial: PartialGame): MoveIterator | null {
    if (!this.isCurrent(game, partial)) return null;

    const { kind } = this.piece;
    if (kind === "pawn") {
      return pawnMoves(game, partial, this.piece, this.coords);
    }
    return ruleMoves(game, partial, this.piece, MOVEMENT_RULES[kind], this.coords);
  }

  validateMove(game: Game, partial: PartialGame, move: Move): boolean {
    if (
      !coordsEquals(move.from.coords, this.coords) ||
      !pieceEquals(move.from.piece, this.piece)
    ) {
      return false;
    }
    if (!this.isCurrent(game, partial)) return false;

    const expected = this.resolve(game, partial, move.to.coords);
    return expected !== null && moveEquals(expected, move);
  }

  private isCurrent(game: Game, partial: PartialGame): boolean {
    const board = partial.getBoard(game, this.coords.timeline, this.coords.turn);
    if (!board) return false;
    return pieceEquals(pieceAt(board, this.coords.file, this.coords.rank), this.piece);
  }

  /** Build the move to `to` by walking only the vector leading there, or null if it is illegal */
  private resolve(game: Game, partial: PartialGame, to: Coords): Move | null {
    const from = this.coords;
    const color = this.piece.color;
    const turns = to.turn - from.turn;
    if (turns % 2 !== 0) return null;

    const delta: Vector = {
      dl: to.timeline - from.timeline,
      dt: turns / 2,
      df: to.file - from.file,
      dr: to.rank - from.rank,
    };

    const land = (): Move | null => {
      const landing = look(game, partial, to, color);
      if (landing.status === "blocked") return null;
      const captured = landing.status === "capture" ? landing.piece : null;
      return buildMove(game, partial, this.piece, from, to, captured);
    };

    const { kind } = this.piece;
    if (kind === "pawn") {
      for (const step of pawnPushes(color)) {
        const isEmpty = (k: number) =>
          look(game, partial, offset(from, step, k), color).status === "empty";
        if (vectorEquals(delta, step) && isEmpty(1)) return land();
        const double = { dl: 2 * step.dl, dt: 0, df: 0, dr: 2 * step.dr };
        if (!this.piece.moved && vectorEquals(delta, double) && isEmpty(1) && isEmpty(2)) {
          return land();
        }
      }
      if (pawnCaptures(color).some((v) => vectorEquals(v, delta))) {
        return look(game, partial, to, color).status === "capture" ? land() : null;
      }
      return null;
    }

    const rule = MOVEMENT_RULES[kind];
    if (!rule.slides) {
      return rule.vectors.some((v) => vectorEquals(v, delta)) ? land() : null;
    }

    const steps = Math.max(
      Math.abs(delta.dl),
      Math.abs(delta.dt),
      Math.abs(delta.df),
      Math.abs(delta.dr)
    );
    if (steps === 0) return null;
    const unit: Vector = {
      dl: delta.dl / steps,
      dt: delta.dt / steps,
      df: delta.df / steps,
      dr: delta.dr / steps,
    };
    if (!rule.vectors.some((v) => vectorEquals(v, unit))) return null;

    for (let k = 1; k < steps; k++) {
      if (look(game, partial, offset(from, unit, k), color).status !== "empty") {
        return null;
      }
    }
    return land();
  }
}
