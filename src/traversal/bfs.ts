import type { Graph } from '../graph/graph.js';
import type { BFSTraversal, Vertex } from '../graph/types.js';

/**
 * Breadth-first visitation order from `start`.
 *
 * Newly discovered neighbors are enqueued in ascending vertex order, so the
 * output is deterministic. All state is local to the call; the graph is only read.
 * Throws UnknownVertexError if `start` is not a vertex of `graph`.
 */
export function bfsFrom(graph: Graph, start: Vertex): BFSTraversal {
  const path: Vertex[] = [];
  const reached = new Set<Vertex>([start]);
  const frontier: Vertex[] = [start];
  let head = 0;

  while (head < frontier.length) {
    const current = frontier[head++];
    const neighbors = graph.neighbors(current);
    if (!neighbors.success) throw neighbors.error;

    path.push(current);

    for (const next of neighbors.value) {
      if (reached.has(next)) continue;
      reached.add(next);
      frontier.push(next);
    }
  }

  return path;
}
