/**
 * WrapTable: where the displayed segments of one long line begin.
 *
 * A table is computed once per (line, width), frozen, and shared by every
 * row that shows a segment of that line, so copying a row never copies
 * the table.
 */

export class WrapTable {
  /** Byte offsets (relative to the line start) where each segment begins */
  readonly offsets: readonly number[];
  /** Width the table was computed for */
  readonly width: number;

  private constructor(offsets: readonly number[], width: number) {
    this.offsets = Object.freeze(offsets);
    this.width = width;
    Object.freeze(this);
  }

  /**
   * Split a line of `byteLength` bytes into chunks of `width` bytes.
   * Returns undefined when the line fits, since unwrapped lines carry no table.
   */
  static compute(byteLength: number, width: number): WrapTable | undefined {
    if (byteLength <= width) return undefined;
    const offsets: number[] = [];
    for (let offset = 0; offset < byteLength; offset += width) {
      offsets.push(offset);
    }
    return new WrapTable(offsets, width);
  }

  get segmentCount(): number {
    return this.offsets.length;
  }

  get lastSegment(): number {
    return this.offsets.length - 1;
  }

  /** Byte range [start, end) of segment `index` within a line of `byteLength` bytes */
  segmentBounds(index: number, byteLength: number): { start: number; end: number } {
    const start = this.offsets[index] ?? byteLength;
    const end = this.offsets[index + 1] ?? byteLength;
    return { start, end };
  }
}

/** One displayed segment of a wrapped line */
export interface WrapSegment {
  readonly table: WrapTable;
  readonly index: number;
}

export function isFirstSegment(segment: WrapSegment): boolean {
  return segment.index === 0;
}

export function isLastSegment(segment: WrapSegment): boolean {
  return segment.index === segment.table.lastSegment;
}

export function nextSegment(segment: WrapSegment): WrapSegment | undefined {
  if (isLastSegment(segment)) return undefined;
  return { table: segment.table, index: segment.index + 1 };
}

export function prevSegment(segment: WrapSegment): WrapSegment | undefined {
  if (isFirstSegment(segment)) return undefined;
  return { table: segment.table, index: segment.index - 1 };
}

export function lastSegmentOf(table: WrapTable): WrapSegment {
  return { table, index: table.lastSegment };
}
