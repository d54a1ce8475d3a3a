import {
  Board,
  Color,
  Game,
  GameInfo,
  boardKey,
  findTimeline,
  isActiveTimeline,
  presentTurn,
} from "@multiverse-chess/core";

/**
 * Speculative state of the boards in play, layered over the baseline game.
 *
 * A partial game owns the boards it produced and falls back to its parent
 * (and finally to the game) for everything else. It never writes through
 * the parent or the game.
 */
export class PartialGame {
  readonly info: GameInfo;
  readonly parent: PartialGame | null;
  private readonly ownBoardMap: ReadonlyMap<string, Board>;

  constructor(info: GameInfo, boards: ReadonlyMap<string, Board>, parent: PartialGame | null) {
    this.info = info;
    this.ownBoardMap = boards;
    this.parent = parent;
  }

  /** Get the board at (timeline, turn), or undefined if it does not exist */
  getBoard(game: Game, timeline: number, turn: number): Board | undefined {
    const key = boardKey(timeline, turn);
    const own = this.ownBoardMap.get(key);
    if (own) return own;
    if (this.parent) return this.parent.getBoard(game, timeline, turn);
    return game.boards.get(key);
  }

  /** Last board of a timeline, or undefined for an unknown timeline */
  lastBoard(game: Game, timeline: number): Board | undefined {
    const tl = findTimeline(this.info, timeline);
    if (!tl) return undefined;
    const board = this.getBoard(game, timeline, tl.lastTurn);
    if (!board) {
      throw new Error(`Timeline ${timeline} has no board on its last turn ${tl.lastTurn}`);
    }
    return board;
  }

  isLastBoard(timeline: number, turn: number): boolean {
    const tl = findTimeline(this.info, timeline);
    return tl !== undefined && tl.lastTurn === turn;
  }

  isActive(timeline: number): boolean {
    return isActiveTimeline(this.info, timeline);
  }

  present(): number {
    return presentTurn(this.info);
  }

  /** Last boards, in timeline order, on which `color` is to move */
  playableBoards(game: Game, color: Color): Board[] {
    const result: Board[] = [];
    for (const tl of this.info.timelines) {
      const board = this.lastBoard(game, tl.index);
      if (board && board.activeColor === color) result.push(board);
    }
    return result;
  }

  /** Boards the active player may move on this turn */
  ownBoards(game: Game): Board[] {
    return this.playableBoards(game, this.info.activePlayer);
  }

  /** Own boards on active timelines at the present: each must be played */
  requiredBoards(game: Game): Board[] {
    const present = this.present();
    return this.ownBoards(game).filter(
      (board) => board.turn === present && this.isActive(board.timeline)
    );
  }

  /** Every board visible through this partial game, keyed by board key */
  boards(game: Game): Map<string, Board> {
    const visible = this.parent ? this.parent.boards(game) : new Map(game.boards);
    for (const [key, board] of this.ownBoardMap) visible.set(key, board);
    return visible;
  }

  /** Boards produced by this partial game, excluding its parents' */
  newBoards(): Board[] {
    return Array.from(this.ownBoardMap.values());
  }
}

/** The partial game without any tentative move: the starting point of every turn */
export function noPartialGame(game: Game): PartialGame {
  return new PartialGame(game.info, new Map(), null);
}
