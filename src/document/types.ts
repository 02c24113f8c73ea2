/**
 * Core types for viewable documents.
 *
 * Design principles:
 * - The viewer walks a document one displayed row at a time; there is no
 *   random access to "row N"
 * - Row and cursor representations belong to the document; the viewer only
 *   compares, copies and passes them back
 * - Rows are immutable values, so copying one is a reference copy
 */

// =============================================================================
// Primitive Types
// =============================================================================

/** Zero-based index of a logical (newline-delimited) line */
export type LineIndex = number & { readonly __brand: "LineIndex" };

/** Width and height of the viewport in cells / terminal rows */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

// =============================================================================
// Cursor Geometry
// =============================================================================

/**
 * The contiguous span of displayed rows the focused element occupies.
 * When nothing wraps, `start` equals `end` and `rowCount` is 1.
 */
export interface CursorRange<Row> {
  readonly start: Row;
  readonly end: Row;
  readonly rowCount: number;
}

/**
 * A cursor's range plus how close it sits to the document edges.
 * Both counts stop at the bound passed to `cursorLayoutDetails`, so
 * positioning never has to scan the whole document.
 */
export interface CursorLayoutDetails<Row> {
  readonly range: CursorRange<Row>;
  /** Rows before `range.start`, capped at the bound */
  readonly rowsBeforeStart: number;
  /** Rows after `range.end`, capped at the bound */
  readonly rowsAfterEnd: number;
}

// =============================================================================
// Document Interface
// =============================================================================

/**
 * Everything a backing store must provide to be shown by a DocumentViewer.
 *
 * `Row` identifies one displayed row; `Cursor` identifies the focused
 * element. A line-oriented document uses a line index as its cursor; a
 * structured document may use a node. Boundaries are reported as
 * `undefined`, never thrown.
 *
 * GOTCHA: rows built under different widths are not comparable.
 * `compareRows` throws on them; never keep a row across a `resize` and
 * compare it with a fresh one.
 */
export interface Document<Row, Cursor> {
  /** Width rows are currently wrapped at */
  readonly width: number;
  resize(width: number): void;

  /** Add bytes to the end of the document */
  append(data: Uint8Array): void;
  /** Signal that no more bytes will arrive */
  endOfStream(): void;

  /** First row and initial cursor, once the document has a line */
  topRowAndCursor(): { row: Row; cursor: Cursor } | undefined;

  nextRow(row: Row): Row | undefined;
  prevRow(row: Row): Row | undefined;

  /** 1-based logical line number */
  lineNumber(row: Row): number;

  isWrappedRow(row: Row): boolean;
  isStartOfWrappedRow(row: Row): boolean;
  isEndOfWrappedRow(row: Row): boolean;
  isAfterStartOfWrappedRow(row: Row): boolean;
  isBeforeEndOfWrappedRow(row: Row): boolean;
  isFirstRowOfDocument(row: Row): boolean;

  compareRows(a: Row, b: Row): number;
  rowsEqual(a: Row, b: Row): boolean;

  cursorRange(cursor: Cursor): CursorRange<Row>;
  rowIntersectsCursor(row: Row, cursor: Cursor): boolean;
  cursorLayoutDetails(cursor: Cursor, bound: number): CursorLayoutDetails<Row>;

  /**
   * Convert a row into a cursor. Documents with several focusable elements
   * per row should pick the one closest horizontally to `prevCursor`.
   */
  rowToCursor(row: Row, prevCursor: Cursor): Cursor;

  /** Number of rows from `b` forward to `a`. Requires `a >= b`. */
  rowDistance(a: Row, b: Row): number;

  /** `undefined` when the cursor is already at the last element */
  moveCursorDown(count: number, cursor: Cursor): Cursor | undefined;
  /** `undefined` when the cursor is already at the first element */
  moveCursorUp(count: number, cursor: Cursor): Cursor | undefined;

  /**
   * Bytes displayed on this row. The result may be a view into the
   * document's own storage; do not write to it or keep it across an append.
   */
  rowContent(row: Row): Uint8Array;
}
