import { Color, GameInfo, TimelineInfo } from "../types/game";

/**
 * Timeline activation.
 *
 * White owns the timelines with positive index, black the negative ones and
 * the main line is 0. A side may only have one more active timeline than the
 * other side has in total, so some of the newest lines can be inactive.
 */
export function activeRange(info: GameInfo): { min: number; max: number } {
  let white = 0;
  let black = 0;
  for (const tl of info.timelines) {
    if (tl.index > 0) white++;
    else if (tl.index < 0) black++;
  }
  return {
    min: -Math.min(black, white + 1),
    max: Math.min(white, black + 1),
  };
}

export function isActiveTimeline(info: GameInfo, index: number): boolean {
  const { min, max } = activeRange(info);
  return index >= min && index <= max;
}

/** Turn of the present: the earliest last board among active timelines */
export function presentTurn(info: GameInfo): number {
  let present = Infinity;
  for (const tl of info.timelines) {
    if (isActiveTimeline(info, tl.index) && tl.lastTurn < present) {
      present = tl.lastTurn;
    }
  }
  if (present === Infinity) {
    throw new Error("Game has no active timeline");
  }
  return present;
}

export function findTimeline(info: GameInfo, index: number): TimelineInfo | undefined {
  return info.timelines.find((tl) => tl.index === index);
}

/** Index of the next timeline created by `color` */
export function nextTimelineIndex(info: GameInfo, color: Color): number {
  let min = 0;
  let max = 0;
  for (const tl of info.timelines) {
    if (tl.index < min) min = tl.index;
    if (tl.index > max) max = tl.index;
  }
  return color === "white" ? max + 1 : min - 1;
}
