import type { UnknownVertexError } from '../core/errors.js';

/** Row index of the adjacency matrix, in [0, N) */
export type Vertex = number;

export type Row = readonly number[];

/** Square 0/1 matrix; cell (i, j) = 1 denotes an edge from i to j */
export type AdjMatrix = readonly Row[];

/** Visitation order of one BFS run, starting vertex first */
export type BFSTraversal = readonly Vertex[];

/**
 * Outcome of a graph query. Queries never throw on bad input;
 * out-of-range vertices come back as a failure value.
 */
export type GraphResult<T> =
  | { success: true; value: T }
  | { success: false; error: UnknownVertexError };
