/**
 * BFS Worker — worker_threads entry point.
 * Receives the adjacency matrix once through workerData, then answers one
 * SlotRequest per traversal.
 */

import { parentPort, workerData } from 'worker_threads';
import { Graph } from '../graph/graph.js';
import { handleBfsRequest } from './bfs-task.js';
import { BfsWorkerDataSchema } from './types.js';

const port = parentPort;

if (port) {
  const { matrix } = BfsWorkerDataSchema.parse(workerData);
  const graph = Graph.fromMatrix(matrix);

  port.on('message', (message: unknown) => {
    port.postMessage(handleBfsRequest(graph, message));
  });
}
