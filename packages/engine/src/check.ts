import { Color, Game, isRoyal, opponentColor } from "@multiverse-chess/core";
import { BoardMoves } from "./gen/board";
import type { PartialGame } from "./PartialGame";

/**
 * Whether a royal piece of `color` can be captured by the opponent from any
 * board the opponent may move on, across every timeline.
 */
export function isInCheck(game: Game, partial: PartialGame, color: Color): boolean {
  for (const board of partial.playableBoards(game, opponentColor(color))) {
    const moves = new BoardMoves(board).generateMoves(game, partial);
    if (!moves) continue;
    for (let next = moves.next(); !next.done; next = moves.next()) {
      const captured = next.value.to.piece;
      if (captured && captured.color === color && isRoyal(captured)) return true;
    }
  }
  return false;
}
