/**
 * BaseDocument: the parts of the Document contract that follow from the
 * navigation primitives. Concrete documents extend it and implement only
 * row construction, wrap predicates and cursor movement.
 */

import { invariant } from "../errors.ts";
import type { CursorLayoutDetails, CursorRange, Document } from "./types.ts";

export abstract class BaseDocument<Row, Cursor> implements Document<Row, Cursor> {
  abstract readonly width: number;
  abstract resize(width: number): void;
  abstract append(data: Uint8Array): void;
  abstract endOfStream(): void;
  abstract topRowAndCursor(): { row: Row; cursor: Cursor } | undefined;
  abstract nextRow(row: Row): Row | undefined;
  abstract prevRow(row: Row): Row | undefined;
  abstract lineNumber(row: Row): number;
  abstract isWrappedRow(row: Row): boolean;
  abstract isStartOfWrappedRow(row: Row): boolean;
  abstract isEndOfWrappedRow(row: Row): boolean;
  abstract isAfterStartOfWrappedRow(row: Row): boolean;
  abstract isBeforeEndOfWrappedRow(row: Row): boolean;
  abstract compareRows(a: Row, b: Row): number;
  abstract rowsEqual(a: Row, b: Row): boolean;
  abstract cursorRange(cursor: Cursor): CursorRange<Row>;
  abstract rowToCursor(row: Row, prevCursor: Cursor): Cursor;
  abstract moveCursorDown(count: number, cursor: Cursor): Cursor | undefined;
  abstract moveCursorUp(count: number, cursor: Cursor): Cursor | undefined;
  abstract rowContent(row: Row): Uint8Array;

  isFirstRowOfDocument(row: Row): boolean {
    return (
      this.lineNumber(row) === 1 && (!this.isWrappedRow(row) || this.isStartOfWrappedRow(row))
    );
  }

  rowIntersectsCursor(row: Row, cursor: Cursor): boolean {
    const { start, end } = this.cursorRange(cursor);
    return this.compareRows(start, row) <= 0 && this.compareRows(row, end) <= 0;
  }

  cursorLayoutDetails(cursor: Cursor, bound: number): CursorLayoutDetails<Row> {
    const range = this.cursorRange(cursor);

    let rowsBeforeStart = 0;
    let before = range.start;
    while (rowsBeforeStart < bound) {
      const prev = this.prevRow(before);
      if (prev === undefined) break;
      rowsBeforeStart++;
      before = prev;
    }

    let rowsAfterEnd = 0;
    let after = range.end;
    while (rowsAfterEnd < bound) {
      const next = this.nextRow(after);
      if (next === undefined) break;
      rowsAfterEnd++;
      after = next;
    }

    return { range, rowsBeforeStart, rowsAfterEnd };
  }

  rowDistance(a: Row, b: Row): number {
    invariant(this.compareRows(a, b) >= 0, "rowDistance requires a >= b");
    let distance = 0;
    let row = a;
    while (!this.rowsEqual(row, b)) {
      const prev = this.prevRow(row);
      invariant(prev !== undefined, "reached the start of the document before finding b");
      row = prev;
      distance++;
    }
    return distance;
  }
}
