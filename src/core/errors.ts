export class FanoutError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FanoutError';
  }
}

export class InvalidMatrixError extends FanoutError {
  constructor(message: string) {
    super(message, 'INVALID_MATRIX');
    this.name = 'InvalidMatrixError';
  }
}

export class UnknownVertexError extends FanoutError {
  constructor(public readonly vertex: number) {
    super(`Vertex ${vertex} is not in the graph`, 'UNKNOWN_VERTEX');
    this.name = 'UnknownVertexError';
  }
}

export class InvalidWorkerCountError extends FanoutError {
  constructor(public readonly workerCount: number) {
    super(`Worker count must be an integer of at least 1, got ${workerCount}`, 'INVALID_WORKER_COUNT');
    this.name = 'InvalidWorkerCountError';
  }
}

export class InvalidFormatError extends FanoutError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_FORMAT', cause);
    this.name = 'InvalidFormatError';
  }
}

export class NegativeVertexCountError extends FanoutError {
  constructor(public readonly vertexCount: number) {
    super(`Graph cannot have ${vertexCount} vertices; expected a non-negative integer`, 'NEGATIVE_VERTEX_COUNT');
    this.name = 'NegativeVertexCountError';
  }
}

export class TaskFailureError extends FanoutError {
  constructor(public readonly vertex: number, cause: Error) {
    super(`BFS task from vertex ${vertex} failed: ${cause.message}`, 'TASK_FAILURE', cause);
    this.name = 'TaskFailureError';
  }
}

export class PoolError extends FanoutError {
  constructor(message: string, cause?: Error) {
    super(message, 'POOL_ERROR', cause);
    this.name = 'PoolError';
  }
}

export class ConfigError extends FanoutError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
