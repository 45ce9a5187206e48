/**
 * Graph — immutable adjacency-matrix view.
 *
 * The matrix is copied on construction and never handed out by reference,
 * so one instance can be read by any number of concurrent traversals.
 */

import { InvalidMatrixError, UnknownVertexError } from '../core/errors.js';
import { serializeMatrix } from './format.js';
import type { AdjMatrix, GraphResult, Row, Vertex } from './types.js';

export type GraphConstruction =
  | { success: true; value: Graph }
  | { success: false; error: InvalidMatrixError };

export class Graph {
  private readonly adjacency: AdjMatrix;

  private constructor(adjacency: AdjMatrix) {
    this.adjacency = adjacency;
  }

  /**
   * Build a graph from a square 0/1 matrix.
   * Throws InvalidMatrixError on a non-square row or a cell outside {0, 1}.
   */
  static fromMatrix(matrix: AdjMatrix): Graph {
    const size = matrix.length;

    // Index loops so holes in a sparse array read as undefined
    for (let i = 0; i < size; i++) {
      const row: Row | undefined = matrix[i];
      if (row === undefined) {
        throw new InvalidMatrixError(`Adjacency matrix has incorrect dimensions: row ${i} is missing`);
      }
      if (row.length !== size) {
        throw new InvalidMatrixError(
          `Adjacency matrix has incorrect dimensions: row ${i} has ${row.length} entries, expected ${size}`,
        );
      }
      for (let j = 0; j < size; j++) {
        const cell: number | undefined = row[j];
        if (cell !== 0 && cell !== 1) {
          throw new InvalidMatrixError(
            `Incorrect value ${cell} at (${i}, ${j}); each value in the matrix should be either 0 or 1`,
          );
        }
      }
    }

    return new Graph(Object.freeze(Array.from(matrix, (row): Row => Object.freeze([...row]))));
  }

  /** Non-throwing variant of fromMatrix() */
  static safeFromMatrix(matrix: AdjMatrix): GraphConstruction {
    try {
      return { success: true, value: Graph.fromMatrix(matrix) };
    } catch (err) {
      if (err instanceof InvalidMatrixError) {
        return { success: false, error: err };
      }
      throw err;
    }
  }

  static empty(): Graph {
    return new Graph(Object.freeze([]));
  }

  vertexCount(): number {
    return this.adjacency.length;
  }

  getVertices(): ReadonlySet<Vertex> {
    return new Set(this.adjacency.map((_, i) => i));
  }

  hasVertex(v: Vertex): boolean {
    return Number.isInteger(v) && v >= 0 && v < this.adjacency.length;
  }

  hasEdge(v1: Vertex, v2: Vertex): GraphResult<boolean> {
    if (!this.hasVertex(v1)) return { success: false, error: new UnknownVertexError(v1) };
    if (!this.hasVertex(v2)) return { success: false, error: new UnknownVertexError(v2) };
    return { success: true, value: this.adjacency[v1][v2] === 1 };
  }

  /**
   * Out-neighbors of `v`. The set is filled in ascending vertex order,
   * so iterating it is deterministic. A self-loop makes `v` its own neighbor.
   */
  neighbors(v: Vertex): GraphResult<ReadonlySet<Vertex>> {
    if (!this.hasVertex(v)) return { success: false, error: new UnknownVertexError(v) };

    const row = this.adjacency[v];
    const result = new Set<Vertex>();
    for (let w = 0; w < row.length; w++) {
      if (row[w] === 1) result.add(w);
    }
    return { success: true, value: result };
  }

  /** Copy of the underlying matrix */
  toMatrix(): number[][] {
    return this.adjacency.map((row) => [...row]);
  }

  equals(other: Graph): boolean {
    if (other.vertexCount() !== this.vertexCount()) return false;
    return this.adjacency.every((row, i) => row.every((cell, j) => other.adjacency[i][j] === cell));
  }

  toString(): string {
    return serializeMatrix(this.adjacency);
  }
}
