import { Board, Color, Game, GameInfo, TimelineInfo } from "../types/game";
import { boardKey, colorOnTurn } from "./boards";
import { presentTurn } from "./timelines";

export interface GameSetup {
  width: number;
  height: number;
  boards: Board[];
  /** Defaults to the color to move at the present */
  activePlayer?: Color;
  /** Branch points of timelines created during play, keyed by timeline index */
  origins?: Record<number, { timeline: number; turn: number }>;
}

/**
 * Assemble a Game from already-parsed boards.
 * Throws on malformed input: mismatched dimensions, duplicate boards,
 * gaps between turns of a timeline or between timeline indices.
 */
export function createGame(setup: GameSetup): Game {
  const { width, height } = setup;
  const boards = new Map<string, Board>();
  const turnsByTimeline = new Map<number, number[]>();

  for (const board of setup.boards) {
    if (board.width !== width || board.height !== height) {
      throw new Error(
        `Board ${boardKey(board.timeline, board.turn)} is ${board.width}x${board.height}, expected ${width}x${height}`
      );
    }
    const key = boardKey(board.timeline, board.turn);
    if (boards.has(key)) {
      throw new Error(`Duplicate board ${key}`);
    }
    boards.set(key, board);
    const turns = turnsByTimeline.get(board.timeline) ?? [];
    turns.push(board.turn);
    turnsByTimeline.set(board.timeline, turns);
  }

  if (boards.size === 0) {
    throw new Error("A game needs at least one board");
  }

  const indices = [...turnsByTimeline.keys()].sort((a, b) => a - b);
  for (let i = 1; i < indices.length; i++) {
    if (indices[i] !== indices[i - 1] + 1) {
      throw new Error(`Timeline ${indices[i - 1] + 1} is missing`);
    }
  }

  const timelines: TimelineInfo[] = indices.map((index) => {
    const turns = (turnsByTimeline.get(index) ?? []).sort((a, b) => a - b);
    for (let i = 1; i < turns.length; i++) {
      if (turns[i] !== turns[i - 1] + 1) {
        throw new Error(`Timeline ${index} has no board on turn ${turns[i - 1] + 1}`);
      }
    }
    return {
      index,
      startTurn: turns[0],
      lastTurn: turns[turns.length - 1],
      origin: setup.origins?.[index] ?? null,
    };
  });

  const info: GameInfo = {
    activePlayer: "white",
    timelines,
  };
  info.activePlayer = setup.activePlayer ?? colorOnTurn(presentTurn(info));

  return { width, height, info, boards };
}
