import { NegativeVertexCountError } from '../core/errors.js';
import { Graph } from './graph.js';

/** Source of uniform numbers in [0, 1), Math.random-compatible */
export type RandomSource = () => number;

/**
 * Undirected random graph on `vertexCount` vertices.
 *
 * Each cell of the lower triangle, diagonal included, is an independent coin
 * flip mirrored into the upper triangle. Self-loops are therefore possible.
 */
export function randomGraph(vertexCount: number, random: RandomSource = Math.random): Graph {
  if (!Number.isInteger(vertexCount) || vertexCount < 0) {
    throw new NegativeVertexCountError(vertexCount);
  }

  const matrix = Array.from({ length: vertexCount }, () => new Array<number>(vertexCount).fill(0));

  for (let i = 0; i < vertexCount; i++) {
    for (let j = 0; j <= i; j++) {
      const edge = Math.floor(random() * 2);
      matrix[i][j] = edge;
      matrix[j][i] = edge;
    }
  }

  return Graph.fromMatrix(matrix);
}

/**
 * Seeded generator (mulberry32) for reproducible graphs.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
