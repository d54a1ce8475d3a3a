import { PieceKind } from "@multiverse-chess/core";

/**
 * A displacement along the four axes. `dt` counts full turns, so it is
 * doubled when applied to half-turn indices.
 */
export interface Vector {
  dl: number;
  dt: number;
  df: number;
  dr: number;
}

function fromComponents(c: readonly number[]): Vector {
  return { dl: c[0], dt: c[1], df: c[2], dr: c[3] };
}

export function vectorEquals(a: Vector, b: Vector): boolean {
  return a.dl === b.dl && a.dt === b.dt && a.df === b.df && a.dr === b.dr;
}

/** Unit vectors moving along exactly `axes` axes at once */
function axisVectors(axes: number): Vector[] {
  const out: Vector[] = [];
  for (let mask = 1; mask < 16; mask++) {
    const dims = [0, 1, 2, 3].filter((d) => mask & (1 << d));
    if (dims.length !== axes) continue;
    for (let signs = 0; signs < 1 << axes; signs++) {
      const c = [0, 0, 0, 0];
      dims.forEach((d, i) => {
        c[d] = signs & (1 << i) ? 1 : -1;
      });
      out.push(fromComponents(c));
    }
  }
  return out;
}

function knightVectors(): Vector[] {
  const out: Vector[] = [];
  for (let a = 0; a < 4; a++) {
    for (let b = 0; b < 4; b++) {
      if (a === b) continue;
      for (const sa of [-2, 2]) {
        for (const sb of [-1, 1]) {
          const c = [0, 0, 0, 0];
          c[a] = sa;
          c[b] = sb;
          out.push(fromComponents(c));
        }
      }
    }
  }
  return out;
}

const ROOK = axisVectors(1);
const BISHOP = axisVectors(2);
const UNICORN = axisVectors(3);
const DRAGON = axisVectors(4);
const ALL = [...ROOK, ...BISHOP, ...UNICORN, ...DRAGON];

export interface MovementRule {
  vectors: ReadonlyArray<Vector>;
  /** Riders repeat their vector until blocked; leapers apply it once */
  slides: boolean;
}

export const MOVEMENT_RULES: Record<Exclude<PieceKind, "pawn">, MovementRule> = {
  king: { vectors: ALL, slides: false },
  commonKing: { vectors: ALL, slides: false },
  knight: { vectors: knightVectors(), slides: false },
  rook: { vectors: ROOK, slides: true },
  bishop: { vectors: BISHOP, slides: true },
  unicorn: { vectors: UNICORN, slides: true },
  dragon: { vectors: DRAGON, slides: true },
  princess: { vectors: [...ROOK, ...BISHOP], slides: true },
  queen: { vectors: ALL, slides: true },
  royalQueen: { vectors: ALL, slides: true },
};
