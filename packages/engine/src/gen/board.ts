import { Board, Coords, Game, Move, pieceAt } from "@multiverse-chess/core";
import { IMoveGenerator, MoveIterator } from "../interfaces/IMoveGenerator";
import type { PartialGame } from "../PartialGame";
import { PieceMoves } from "./piece";

function coordsOf(board: Board, index: number): Coords {
  return {
    timeline: board.timeline,
    turn: board.turn,
    file: index % board.width,
    rank: Math.floor(index / board.width),
  };
}

/**
 * Chains the move sequences of every piece of the board's active color,
 * in increasing square index order. Empty and enemy squares are skipped
 * inside the loop, so sparse boards cost no stack depth.
 */
function* boardMoves(board: Board, game: Game, partial: PartialGame): Generator<Move, void> {
  const size = board.width * board.height;
  for (let index = 0; index < size; index++) {
    const piece = board.pieces[index];
    if (!piece || piece.color !== board.activeColor) continue;

    const moves = new PieceMoves(piece, coordsOf(board, index)).generateMoves(game, partial);
    if (!moves) continue;

    for (let next = moves.next(); !next.done; next = moves.next()) {
      yield next.value;
    }
  }
}

/** Board-level move generator: every move the board's active color may make on it */
export class BoardMoves implements IMoveGenerator {
  constructor(readonly board: Board) {}

  /** Returns null when the partial game does not know this board */
  generateMoves(game: Game, partial: PartialGame): MoveIterator | null {
    if (!partial.getBoard(game, this.board.timeline, this.board.turn)) return null;
    return boardMoves(this.board, game, partial);
  }

  validateMove(game: Game, partial: PartialGame, move: Move): boolean {
    const { coords } = move.from;
    if (coords.timeline !== this.board.timeline || coords.turn !== this.board.turn) {
      return false;
    }
    const piece = pieceAt(this.board, coords.file, coords.rank);
    if (!piece || piece.color !== this.board.activeColor) return false;
    return new PieceMoves(piece, coords).validateMove(game, partial, move);
  }
}
