/**
 * fanout-bfs — concurrent breadth-first traversal from every vertex of a graph
 *
 * @example
 * ```typescript
 * import { Graph, FanOutOrchestrator } from 'fanout-bfs';
 *
 * const graph = Graph.fromMatrix([[0, 1, 0], [1, 0, 1], [0, 1, 1]]);
 * const run = await new FanOutOrchestrator().traverseFromAllVertices(graph, 2);
 * run.results.map((r) => r.traversal); // [[0, 1, 2], [1, 0, 2], [2, 1, 0]]
 * ```
 */

// Core
export { ConfigManager, CONFIG_FILE_NAME } from './core/config.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  FanoutError,
  InvalidMatrixError,
  UnknownVertexError,
  InvalidWorkerCountError,
  InvalidFormatError,
  NegativeVertexCountError,
  TaskFailureError,
  PoolError,
  ConfigError,
} from './core/errors.js';
export {
  FanoutConfigSchema,
  type FanoutConfig,
  type FanoutConfigInput,
  type TraversalMode,
} from './core/types.js';

// Graph
export { Graph, type GraphConstruction } from './graph/graph.js';
export { parseGraph, serializeGraph, loadGraphFile, saveGraphFile } from './graph/persistence.js';
export { randomGraph, seededRandom, type RandomSource } from './graph/random.js';
export type { AdjMatrix, BFSTraversal, GraphResult, Row, Vertex } from './graph/types.js';

// Traversal
export { bfsFrom } from './traversal/bfs.js';
export { FanOutOrchestrator, DEFAULT_WORKER_SCRIPT, type OrchestratorOptions } from './traversal/orchestrator.js';
export { RunReporter, summarizeRun } from './traversal/report.js';
export type {
  AllVerticesResult,
  RunSummary,
  SingleVertexResult,
  TimedTraversal,
} from './traversal/types.js';

// Pool
export { WorkerPool, withPool } from './pool/worker-pool.js';
export { InProcessSlot, ThreadSlot, type SlotHandler, type ThreadSlotOptions } from './pool/slots.js';
export type { CompletedTask, PoolOptions, PoolStats, SlotFactory, WorkerSlot } from './pool/types.js';

// Utils
export { Timer, timed, measure, stopwatch, formatDuration, type TimedComputation } from './utils/timer.js';

// CLI
export { createCLI, main } from './cli/index.js';
export { VERSION, NAME } from './version.js';
