export * from "./types/game";

// Board utilities
export {
  opponentColor,
  colorOnTurn,
  isRoyal,
  pieceEquals,
  boardKey,
  coordsEquals,
  sameBoard,
  moveEquals,
  formatMove,
  createBoard,
  isInBounds,
  squareIndex,
  pieceAt,
  deriveBoard,
} from "./libs/boards";
export type { SquareChange } from "./libs/boards";

// Timelines
export {
  activeRange,
  isActiveTimeline,
  presentTurn,
  findTimeline,
  nextTimelineIndex,
} from "./libs/timelines";

// Game construction
export { createGame } from "./libs/createGame";
export type { GameSetup } from "./libs/createGame";
