/**
 * Text format for adjacency matrices.
 *
 * ```
 * 3
 * 0 1 0
 * 1 0 1
 * 0 1 1
 * ```
 *
 * First line is the vertex count N, followed by N rows of N space-separated 0/1 values.
 */

import { InvalidFormatError } from '../core/errors.js';
import type { AdjMatrix } from './types.js';

export function serializeMatrix(matrix: AdjMatrix): string {
  return [String(matrix.length), ...matrix.map((row) => row.join(' '))].join('\n');
}

/**
 * Parse the text format into a matrix. A single trailing newline is accepted.
 * Throws InvalidFormatError describing the first problem found.
 */
export function parseMatrix(text: string): number[][] {
  const body = text.endsWith('\n') ? text.slice(0, text.endsWith('\r\n') ? -2 : -1) : text;
  const lines = body.split(/\r?\n/);

  const header = lines[0].trim();
  if (!/^\d+$/.test(header)) {
    throw new InvalidFormatError(`First line must be a non-negative vertex count, got "${header}"`);
  }

  const size = Number(header);
  if (lines.length !== size + 1) {
    throw new InvalidFormatError(
      `Expected ${size + 1} lines for ${size} vertices, found ${lines.length}`,
    );
  }

  return lines.slice(1).map((line, i) => {
    const trimmed = line.trim();
    const tokens = trimmed === '' ? [] : trimmed.split(/\s+/);
    if (tokens.length !== size) {
      throw new InvalidFormatError(`Row ${i} has ${tokens.length} entries, expected ${size}`);
    }
    return tokens.map((token, j) => {
      if (token !== '0' && token !== '1') {
        throw new InvalidFormatError(`Invalid value "${token}" at (${i}, ${j}); expected 0 or 1`);
      }
      return token === '1' ? 1 : 0;
    });
  });
}
