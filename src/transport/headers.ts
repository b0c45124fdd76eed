/**
 * Response header line handling.
 *
 * @module transport/headers
 */

import type { HeaderMap } from './types.js';

/** Value recorded for a header line that carries no `:` separator. */
export const HEADER_PRESENT = 'present';

/**
 * A header line split into name and value.
 */
export interface HeaderField {
  name: string;
  value: string;
}

/**
 * Parses one raw header line.
 *
 * Splits on the first colon and trims both sides, so a value that itself
 * contains `:` is kept intact. A non-empty line without a colon (a status
 * line, for instance) maps to {@link HEADER_PRESENT}. Blank lines yield
 * `undefined`.
 */
export function parseHeaderLine(line: string): HeaderField | undefined {
  const separator = line.indexOf(':');
  if (separator === -1) {
    const name = line.trim();
    return name.length === 0 ? undefined : { name, value: HEADER_PRESENT };
  }
  return {
    name: line.slice(0, separator).trim(),
    value: line.slice(separator + 1).trim(),
  };
}

/**
 * Collects header lines for one response. Later lines overwrite earlier ones
 * with the same (case-sensitive) name.
 */
export class HeaderAccumulator {
  private readonly fields = new Map<string, string>();

  /**
   * Records a raw header line.
   * @returns The number of characters consumed, always the full line length.
   */
  push(line: string): number {
    const field = parseHeaderLine(line);
    if (field) {
      this.fields.set(field.name, field.value);
    }
    return line.length;
  }

  get size(): number {
    return this.fields.size;
  }

  toMap(): HeaderMap {
    return Object.fromEntries(this.fields);
  }
}
