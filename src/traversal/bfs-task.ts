import { toError } from '../core/errors.js';
import type { Graph } from '../graph/graph.js';
import type { Vertex } from '../graph/types.js';
import type { SlotReply } from '../pool/types.js';
import { timed } from '../utils/timer.js';
import { bfsFrom } from './bfs.js';
import { BfsRequestSchema, type TimedTraversal } from './types.js';

export function runBfsTask(graph: Graph, start: Vertex): TimedTraversal {
  const { result, elapsedMs } = timed(() => bfsFrom(graph, start));
  return { traversal: [...result], elapsedMs };
}

/**
 * Turn one message received by a BFS worker thread into its reply.
 */
export function handleBfsRequest(graph: Graph, message: unknown): SlotReply {
  const request = BfsRequestSchema.safeParse(message);
  if (!request.success) {
    return { type: 'error', message: `Malformed BFS request: ${request.error.message}` };
  }

  try {
    return { type: 'result', payload: runBfsTask(graph, request.data.task) };
  } catch (err) {
    return { type: 'error', message: toError(err).message };
  }
}
