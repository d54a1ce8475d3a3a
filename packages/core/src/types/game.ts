/** Piece color */
export type Color = "white" | "black";

/** Piece kind */
export type PieceKind =
  | "king"
  | "queen"
  | "rook"
  | "bishop"
  | "knight"
  | "pawn"
  | "unicorn"
  | "dragon"
  | "princess"
  | "commonKing"
  | "royalQueen";

/** A piece on a board square */
export interface Piece {
  color: Color;
  kind: PieceKind;
  /** Whether the piece has moved since the game started (pawns use it for double steps) */
  moved: boolean;
}

/**
 * Coordinates of a square in the multiverse.
 * `turn` counts half-turns: white is to move on even turns, black on odd ones.
 */
export interface Coords {
  timeline: number;
  turn: number;
  file: number;
  rank: number;
}

/**
 * An immutable board. `pieces` is indexed by `rank * width + file`;
 * null means empty square.
 */
export interface Board {
  readonly timeline: number;
  readonly turn: number;
  readonly width: number;
  readonly height: number;
  /** The color to move on this board */
  readonly activeColor: Color;
  readonly pieces: ReadonlyArray<Piece | null>;
}

/** Per-timeline metadata */
export interface TimelineInfo {
  index: number;
  /** Turn of the first board on the timeline */
  startTurn: number;
  /** Turn of the last board on the timeline */
  lastTurn: number;
  /** Board the timeline branched off from, or null for timelines present at game start */
  origin: { timeline: number; turn: number } | null;
}

export interface GameInfo {
  /** Which side has to submit the next turn */
  activePlayer: Color;
  /** Timelines sorted by index */
  timelines: ReadonlyArray<TimelineInfo>;
}

/**
 * The baseline game: read-only for the whole lifetime of a search.
 * Boards are keyed by `boardKey(timeline, turn)`.
 */
export interface Game {
  readonly width: number;
  readonly height: number;
  readonly info: GameInfo;
  readonly boards: ReadonlyMap<string, Board>;
}

/**
 * How a move relates to the board it starts from:
 * - "board": stays on the source board
 * - "jump": lands on the last board of another timeline
 * - "branch": lands on a past board and creates a new timeline
 */
export type MoveKind = "board" | "jump" | "branch";

export interface Move {
  from: { piece: Piece; coords: Coords };
  /** `piece` is the captured piece, or null when the destination is empty */
  to: { piece: Piece | null; coords: Coords };
  kind: MoveKind;
  /** Kind a pawn turns into when it reaches its last rank */
  promotion?: PieceKind;
}
