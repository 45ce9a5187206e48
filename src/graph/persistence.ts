import { readFileSync, writeFileSync } from 'fs';
import { FanoutError, InvalidFormatError, toError } from '../core/errors.js';
import { parseMatrix, serializeMatrix } from './format.js';
import { Graph } from './graph.js';

export function parseGraph(text: string): Graph {
  return Graph.fromMatrix(parseMatrix(text));
}

export function serializeGraph(graph: Graph): string {
  return serializeMatrix(graph.toMatrix());
}

/**
 * Read a graph file. Unreadable files and malformed content both
 * surface as InvalidFormatError naming the file.
 */
export function loadGraphFile(file: string): Graph {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (err) {
    throw new InvalidFormatError(`Graph file '${file}' could not be read`, toError(err));
  }

  try {
    return parseGraph(content);
  } catch (err) {
    if (err instanceof FanoutError) {
      throw new InvalidFormatError(`Graph file '${file}' has invalid format: ${err.message}`, err);
    }
    throw err;
  }
}

export function saveGraphFile(file: string, graph: Graph): void {
  writeFileSync(file, serializeGraph(graph), 'utf-8');
}
