/**
 * TextDocument: a newline-delimited byte stream viewed as logical lines.
 *
 * Bytes are appended into one growing buffer; only the newly appended
 * bytes are scanned for line terminators. Lines longer than the current
 * width are split into fixed-size byte segments, computed on first use and
 * cached per line until the next width change.
 */

import { invariant } from "../errors.ts";
import { BaseDocument } from "./base-document.ts";
import type { CursorRange, LineIndex } from "./types.ts";
import {
  isFirstSegment,
  isLastSegment,
  lastSegmentOf,
  nextSegment,
  prevSegment,
  type WrapSegment,
  WrapTable,
} from "./wrap-table.ts";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const INITIAL_CAPACITY = 4096;

/** Brand a plain number as a line index. */
export function lineIndex(n: number): LineIndex {
  return n as LineIndex;
}

/** One displayed row: a logical line, plus the wrap segment when the line wraps. */
export interface TextRow {
  readonly lineIndex: LineIndex;
  readonly segment: WrapSegment | undefined;
}

export class TextDocument extends BaseDocument<TextRow, LineIndex> {
  private _data = new Uint8Array(INITIAL_CAPACITY);
  private _length = 0;
  private _lineStarts: number[] = [];
  private _lineEnds: number[] = [];
  /** Offset where the next (not yet terminated) line begins */
  private _nextStart = 0;
  private _trailingNewline: boolean | undefined = undefined;
  private _width: number;
  private _wrapTables = new Map<number, WrapTable | undefined>();

  constructor(width: number) {
    super();
    invariant(width >= 1, `document width must be at least 1, got ${width}`);
    this._width = width;
  }

  get width(): number {
    return this._width;
  }

  /** Number of complete logical lines. */
  get lineCount(): number {
    return this._lineStarts.length;
  }

  /**
   * Whether the stream ended with a newline.
   * `undefined` until `endOfStream()` has been called.
   */
  get trailingNewline(): boolean | undefined {
    return this._trailingNewline;
  }

  get isComplete(): boolean {
    return this._trailingNewline !== undefined;
  }

  resize(width: number): void {
    invariant(width >= 1, `document width must be at least 1, got ${width}`);
    if (width === this._width) return;
    this._width = width;
    this._wrapTables.clear();
  }

  append(data: Uint8Array): void {
    invariant(!this.isComplete, "cannot append after end of stream");
    const offset = this._length;
    this._reserve(offset + data.length);
    this._data.set(data, offset);
    this._length += data.length;

    let newline = data.indexOf(NEWLINE);
    while (newline !== -1) {
      const end = offset + newline;
      // \r\n may be split across appends, so look at the stored buffer
      const lineEnd =
        end > this._nextStart && this._data[end - 1] === CARRIAGE_RETURN ? end - 1 : end;
      this._lineStarts.push(this._nextStart);
      this._lineEnds.push(lineEnd);
      this._nextStart = end + 1;
      newline = data.indexOf(NEWLINE, newline + 1);
    }
  }

  endOfStream(): void {
    invariant(!this.isComplete, "end of stream signalled twice");
    if (this._length > this._nextStart) {
      this._lineStarts.push(this._nextStart);
      this._lineEnds.push(this._length);
      this._nextStart = this._length;
      this._trailingNewline = false;
    } else {
      this._trailingNewline = true;
    }
  }

  /** Bytes of logical line `index` without its terminator. */
  line(index: number): Uint8Array {
    if (index < 0 || index >= this.lineCount) {
      throw new RangeError(`Line index ${index} out of range [0, ${this.lineCount})`);
    }
    return this._lineBytes(index);
  }

  /** Cursor for a 1-based line number. */
  cursorToLineNumber(n: number): LineIndex {
    if (n < 1) {
      throw new RangeError(`Line numbers start at 1, got ${n}`);
    }
    return lineIndex(n - 1);
  }

  // ===========================================================================
  // Rows
  // ===========================================================================

  topRowAndCursor(): { row: TextRow; cursor: LineIndex } | undefined {
    if (this.lineCount === 0) return undefined;
    const cursor = lineIndex(0);
    return { row: this._startOfLine(cursor), cursor };
  }

  nextRow(row: TextRow): TextRow | undefined {
    if (row.segment) {
      const next = nextSegment(row.segment);
      if (next) return { lineIndex: row.lineIndex, segment: next };
    }
    const nextLine = row.lineIndex + 1;
    if (nextLine >= this.lineCount) return undefined;
    return this._startOfLine(lineIndex(nextLine));
  }

  prevRow(row: TextRow): TextRow | undefined {
    if (row.segment) {
      const prev = prevSegment(row.segment);
      if (prev) return { lineIndex: row.lineIndex, segment: prev };
    }
    if (row.lineIndex === 0) return undefined;
    return this._endOfLine(lineIndex(row.lineIndex - 1));
  }

  lineNumber(row: TextRow): number {
    return row.lineIndex + 1;
  }

  isWrappedRow(row: TextRow): boolean {
    return row.segment !== undefined;
  }

  isStartOfWrappedRow(row: TextRow): boolean {
    return row.segment !== undefined && isFirstSegment(row.segment);
  }

  isEndOfWrappedRow(row: TextRow): boolean {
    return row.segment !== undefined && isLastSegment(row.segment);
  }

  isAfterStartOfWrappedRow(row: TextRow): boolean {
    return row.segment !== undefined && !isFirstSegment(row.segment);
  }

  isBeforeEndOfWrappedRow(row: TextRow): boolean {
    return row.segment !== undefined && !isLastSegment(row.segment);
  }

  compareRows(a: TextRow, b: TextRow): number {
    if (a.lineIndex !== b.lineIndex) return a.lineIndex - b.lineIndex;
    if (!a.segment && !b.segment) return 0;
    invariant(
      a.segment !== undefined && b.segment !== undefined,
      `rows of line ${a.lineIndex} disagree on whether it wraps`,
    );
    invariant(
      a.segment.table.width === b.segment.table.width,
      `rows of line ${a.lineIndex} were wrapped at different widths: ${a.segment.table.width} and ${b.segment.table.width}`,
    );
    return a.segment.index - b.segment.index;
  }

  rowsEqual(a: TextRow, b: TextRow): boolean {
    if (a.lineIndex !== b.lineIndex) return false;
    if (!a.segment || !b.segment) return a.segment === b.segment;
    return a.segment.table.width === b.segment.table.width && a.segment.index === b.segment.index;
  }

  /** A read-only view into the buffer; appends may reallocate it. */
  rowContent(row: TextRow): Uint8Array {
    const bytes = this._lineBytes(row.lineIndex);
    if (!row.segment) return bytes;
    const { start, end } = row.segment.table.segmentBounds(row.segment.index, bytes.length);
    return bytes.subarray(start, end);
  }

  // ===========================================================================
  // Cursor
  // ===========================================================================

  cursorRange(cursor: LineIndex): CursorRange<TextRow> {
    const start = this._startOfLine(cursor);
    if (!start.segment) {
      return { start, end: start, rowCount: 1 };
    }
    const table = start.segment.table;
    return {
      start,
      end: { lineIndex: cursor, segment: lastSegmentOf(table) },
      rowCount: table.segmentCount,
    };
  }

  rowToCursor(row: TextRow, _prevCursor: LineIndex): LineIndex {
    return row.lineIndex;
  }

  moveCursorDown(count: number, cursor: LineIndex): LineIndex | undefined {
    const lastLine = this.lineCount - 1;
    if (cursor >= lastLine) return undefined;
    return lineIndex(Math.min(cursor + count, lastLine));
  }

  moveCursorUp(count: number, cursor: LineIndex): LineIndex | undefined {
    if (cursor <= 0) return undefined;
    return lineIndex(Math.max(cursor - count, 0));
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private _lineBytes(index: number): Uint8Array {
    const start = this._lineStarts[index] ?? 0;
    const end = this._lineEnds[index] ?? start;
    return this._data.subarray(start, end);
  }

  private _wrapTable(index: LineIndex): WrapTable | undefined {
    if (this._wrapTables.has(index)) {
      return this._wrapTables.get(index);
    }
    const start = this._lineStarts[index] ?? 0;
    const end = this._lineEnds[index] ?? start;
    const table = WrapTable.compute(end - start, this._width);
    this._wrapTables.set(index, table);
    return table;
  }

  private _startOfLine(index: LineIndex): TextRow {
    const table = this._wrapTable(index);
    return { lineIndex: index, segment: table ? { table, index: 0 } : undefined };
  }

  private _endOfLine(index: LineIndex): TextRow {
    const table = this._wrapTable(index);
    return { lineIndex: index, segment: table ? lastSegmentOf(table) : undefined };
  }

  private _reserve(capacity: number): void {
    if (capacity <= this._data.length) return;
    let next = this._data.length;
    while (next < capacity) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this._data.subarray(0, this._length));
    this._data = grown;
  }
}
