/**
 * DocumentViewer: decides which part of a document is on screen.
 *
 * Keeps the focused element visible while the user moves the focus,
 * scrolls, or resizes the viewport, honouring a scroll margin (scrolloff)
 * that relaxes near the document edges and when the focused element is
 * taller than the screen. The document decides what goes on each row and
 * where lines wrap; the viewer only walks rows one step at a time.
 */

import type { CursorRange, Dimensions, Document } from "../document/types.ts";
import { invariant } from "../errors.ts";
import * as logger from "../logger.ts";
import type { Action } from "./action.ts";
import type { AcceptableStartIndexes, ScreenIndexRange, ScreenPosition } from "./types.ts";

export class DocumentViewer<Row, Cursor> {
  readonly document: Document<Row, Cursor>;
  private _topRow: Row;
  private _focus: Cursor;
  private _dimensions: Dimensions;
  /**
   * Configured margin. The margin actually applied is capped at half the
   * screen; see `effectiveScrolloff`.
   */
  private _scrolloff: number;
  /** Size of half-page jumps once a count has been given; reset by a height change */
  private _jumpSize: number | undefined = undefined;

  constructor(
    document: Document<Row, Cursor>,
    topRow: Row,
    focus: Cursor,
    dimensions: Dimensions,
    scrolloff: number,
  ) {
    assertDimensions(dimensions);
    assertScrolloff(scrolloff);
    this.document = document;
    this._topRow = topRow;
    this._focus = focus;
    this._dimensions = dimensions;
    this._scrolloff = scrolloff;
  }

  get topRow(): Row {
    return this._topRow;
  }

  get focus(): Cursor {
    return this._focus;
  }

  get dimensions(): Dimensions {
    return this._dimensions;
  }

  get scrolloff(): number {
    return this._scrolloff;
  }

  get jumpSize(): number {
    return this._jumpSize ?? Math.max(1, Math.floor(this._dimensions.height / 2));
  }

  /**
   * Scroll margin capped at half the screen.
   *
   * Height | Scrolloff | Effective
   *   15   |     8     |     7
   *   16   |     8     |     7
   *   17   |     8     |     8
   */
  get effectiveScrolloff(): number {
    return Math.min(this._scrolloff, Math.floor((this._dimensions.height - 1) / 2));
  }

  /** Takes effect on the next operation; does not reposition by itself. */
  setScrolloff(scrolloff: number): void {
    assertScrolloff(scrolloff);
    this._scrolloff = scrolloff;
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  dispatch(action: Action): void {
    switch (action.type) {
      case "noOp":
        break;
      case "moveCursorDown":
        this.moveCursorDown(action.count);
        break;
      case "moveCursorUp":
        this.moveCursorUp(action.count);
        break;
      case "scrollDown":
        this.scrollViewportDown(action.count);
        break;
      case "scrollUp":
        this.scrollViewportUp(action.count);
        break;
      case "focusTop":
        this.focusTop();
        break;
      case "focusBottom":
        this.focusBottom();
        break;
      case "jumpDown":
        this.jumpDown(action.count);
        break;
      case "jumpUp":
        this.jumpUp(action.count);
        break;
      case "moveFocusedToTop":
        this.moveFocusedToTop();
        break;
      case "moveFocusedToCenter":
        this.moveFocusedToCenter();
        break;
      case "moveFocusedToBottom":
        this.moveFocusedToBottom();
        break;
    }
  }

  moveCursorDown(count: number): void {
    this._showNewCursor(this.document.moveCursorDown(count, this._focus));
  }

  moveCursorUp(count: number): void {
    this._showNewCursor(this.document.moveCursorUp(count, this._focus));
  }

  focusTop(): void {
    this.moveCursorUp(Number.MAX_SAFE_INTEGER);
  }

  focusBottom(): void {
    this.moveCursorDown(Number.MAX_SAFE_INTEGER);
  }

  scrollViewportDown(count: number): void {
    const { row, moved } = this._walkTop(count, (row) => this.document.nextRow(row));
    if (moved > 0) {
      this._topRow = row;
      this._updateFocusAfterScroll();
    }
  }

  scrollViewportUp(count: number): void {
    const { row, moved } = this._walkTop(count, (row) => this.document.prevRow(row));
    if (moved > 0) {
      this._topRow = row;
      this._updateFocusAfterScroll();
    }
  }

  /**
   * Move the focus and the viewport down together by the jump size.
   * A count replaces the jump size for this and later jumps.
   */
  jumpDown(count?: number): void {
    if (count !== undefined) this._setJumpSize(count);
    const size = this.jumpSize;
    const cursor = this.document.moveCursorDown(size, this._focus);
    if (cursor === undefined) return;
    this._topRow = this._walkTop(size, (row) => this.document.nextRow(row)).row;
    this._showNewCursor(cursor);
  }

  jumpUp(count?: number): void {
    if (count !== undefined) this._setJumpSize(count);
    const size = this.jumpSize;
    const cursor = this.document.moveCursorUp(size, this._focus);
    if (cursor === undefined) return;
    this._topRow = this._walkTop(size, (row) => this.document.prevRow(row)).row;
    this._showNewCursor(cursor);
  }

  /** Put the start of the focused element at the top of the scroll band. */
  moveFocusedToTop(): void {
    const range = this.document.cursorRange(this._focus);
    this._topRow = this.rowsBeforeOrTopOfDocument(range.start, this.effectiveScrolloff);
  }

  moveFocusedToCenter(): void {
    const { height } = this._dimensions;
    const range = this.document.cursorRange(this._focus);
    if (range.rowCount >= height) {
      this._topRow = range.start;
      return;
    }
    const above = Math.floor((height - range.rowCount) / 2);
    this._topRow = this.rowsBeforeOrTopOfDocument(range.start, above);
  }

  /** Put the end of the focused element at the bottom of the scroll band. */
  moveFocusedToBottom(): void {
    const range = this.document.cursorRange(this._focus);
    const index = this._dimensions.height - 1 - this.effectiveScrolloff;
    this._topRow = this.rowsBeforeOrTopOfDocument(range.end, index);
  }

  appendDocumentData(data: Uint8Array): void {
    this.document.append(data);
  }

  documentEof(): void {
    this.document.endOfStream();
  }

  // ===========================================================================
  // Visibility
  // ===========================================================================

  /**
   * Screen indexes at which the start of `cursor`'s range may sit.
   *
   * Starts from the whole screen, shrinks by the scroll margin, relaxes the
   * margin near the document edges, then grows again for an element taller
   * than what is left.
   */
  acceptableStartIndexes(cursor: Cursor): {
    range: CursorRange<Row>;
    indexes: AcceptableStartIndexes;
  } {
    const { height } = this._dimensions;
    const lastScreenIndex = height - 1;
    const details = this.document.cursorLayoutDetails(cursor, lastScreenIndex);
    const cursorHeight = details.range.rowCount;
    const scrolloff = this.effectiveScrolloff;

    let first = scrolloff;
    let last = lastScreenIndex - scrolloff;
    const afterScrolloff = { first, last };

    // No margin before the first row of the document. At the end the margin
    // is relaxed too, so holding "down" parks the last line at the bottom.
    first = Math.min(first, details.rowsBeforeStart);
    last = Math.max(last, lastScreenIndex - details.rowsAfterEnd);
    const afterDocumentEdges = { first, last };

    const windowHeight = last - first + 1;
    if (cursorHeight >= height) {
      first = 0;
      last = lastScreenIndex;
    } else if (cursorHeight > windowHeight) {
      let needed = cursorHeight - windowHeight;
      const reclaimableAtStart = first;
      const reclaimableAtEnd = lastScreenIndex - last;

      // Give back the side with more slack first, so an element already
      // sitting well on screen is not pulled toward one edge.
      const fromOneSide = Math.min(Math.abs(reclaimableAtStart - reclaimableAtEnd), needed);
      needed -= fromOneSide;
      if (reclaimableAtStart > reclaimableAtEnd) {
        first -= fromOneSide;
      } else if (reclaimableAtEnd > reclaimableAtStart) {
        last += fromOneSide;
      }

      // Round up on both sides so the larger half is not always on top.
      const fromEachSide = Math.ceil(needed / 2);
      first -= fromEachSide;
      last += fromEachSide;
    }
    const afterCursorHeight = { first, last };

    const start = first;
    const end = Math.max(start, Math.max(0, last - (cursorHeight - 1)));

    return {
      range: details.range,
      indexes: {
        cursorHeight,
        lastScreenIndex,
        afterScrolloff,
        afterDocumentEdges,
        afterCursorHeight,
        start,
        end,
      },
    };
  }

  private _showNewCursor(cursor: Cursor | undefined): void {
    if (cursor === undefined) return;
    this._focus = cursor;

    const { range, indexes } = this.acceptableStartIndexes(cursor);
    const firstAcceptable = this.rowAtScreenIndex(indexes.start);
    const lastAcceptable = this.rowAtScreenIndex(indexes.end);

    // A missing row is past the end of the document, so the cursor is before it.
    const beforeFirst =
      firstAcceptable === undefined || this.document.compareRows(range.start, firstAcceptable) < 0;
    const atOrBeforeLast =
      lastAcceptable === undefined || this.document.compareRows(range.start, lastAcceptable) <= 0;

    if (beforeFirst) {
      this._topRow = this.rowsBefore(range.start, indexes.start);
    } else if (!atOrBeforeLast) {
      this._topRow = this.rowsBefore(range.start, indexes.end);
    }
  }

  /**
   * Screen indexes the focus must overlap after a scroll or resize.
   * No top margin is kept while the first row of the document is on top.
   */
  private _scrollBand(): ScreenIndexRange {
    const scrolloff = this.effectiveScrolloff;
    const first = this.document.isFirstRowOfDocument(this._topRow) ? 0 : scrolloff;
    return { first, last: this._dimensions.height - 1 - scrolloff };
  }

  /**
   * After a scroll, wrapped content may hang off screen, but if no part of
   * the focused element is inside the band the focus moves to the nearest
   * row that is.
   */
  private _updateFocusAfterScroll(): void {
    const band = this._scrollBand();
    // Clamping at the end keeps the band non-empty when the last row is on top.
    const firstRow = this.lastRowAtOrBeforeScreenIndex(band.first);
    const lastRow = this.lastRowAtOrBeforeScreenIndex(band.last);
    const range = this.document.cursorRange(this._focus);

    if (this.document.compareRows(range.end, firstRow) < 0) {
      this._focus = this.document.rowToCursor(firstRow, this._focus);
    } else if (this.document.compareRows(lastRow, range.start) < 0) {
      this._focus = this.document.rowToCursor(lastRow, this._focus);
    }
  }

  // ===========================================================================
  // Resize
  // ===========================================================================

  resize(dimensions: Dimensions): void {
    assertDimensions(dimensions);
    const before = this._dimensions;
    this.resizeWidth(dimensions.width);
    this.resizeHeight(dimensions.height);
    this._updateTopAfterResize();
    logger.debug("viewer resized", {
      from: `${before.width}x${before.height}`,
      to: `${dimensions.width}x${dimensions.height}`,
    });
  }

  /** Re-wrap at `width`, keeping the focused element anchored on screen. */
  resizeWidth(width: number): void {
    invariant(width >= 1, `width must be at least 1, got ${width}`);
    if (width === this._dimensions.width) return;

    const { height } = this._dimensions;
    const oldRange = this.document.cursorRange(this._focus);
    const start = this._positionOfRow(oldRange.start);
    const end = this._positionOfRow(oldRange.end);

    if (start.kind === "at") {
      this._setWidth(width);
      const range = this.document.cursorRange(this._focus);
      this._topRow = this.rowsBeforeOrTopOfDocument(range.start, start.index);
      return;
    }

    invariant(start.kind !== "below", "focused element starts below the screen");
    invariant(end.kind !== "above", "focused element ends above the screen");

    if (end.kind === "at") {
      // Only the end is visible: keep it where it was.
      this._setWidth(width);
      const range = this.document.cursorRange(this._focus);
      this._topRow = this.rowsBeforeOrTopOfDocument(range.end, end.index);
      return;
    }

    // The element covers the whole screen.
    const rowsAboveTop = this.document.rowDistance(this._topRow, oldRange.start);
    this._setWidth(width);
    const range = this.document.cursorRange(this._focus);

    if (range.rowCount === oldRange.rowCount) {
      this._topRow = this.rowsAfter(range.start, rowsAboveTop);
      return;
    }

    // Keep the same fraction of the element in the middle of the screen.
    const fraction = (rowsAboveTop + height / 2) / oldRange.rowCount;
    const middle = this.rowsAfter(range.start, Math.floor(fraction * range.rowCount));
    this._topRow = this.rowsBeforeOrTopOfDocument(middle, Math.floor(height / 2));
  }

  /** Change the height, keeping the focused element at the same fraction of the screen. */
  resizeHeight(height: number): void {
    invariant(height >= 1, `height must be at least 1, got ${height}`);
    const oldHeight = this._dimensions.height;
    if (height === oldHeight) return;

    // Index 0 and the last index map onto themselves.
    const mapIndex = (index: number): number =>
      oldHeight === 1 ? 0 : Math.round((index / (oldHeight - 1)) * (height - 1));

    const range = this.document.cursorRange(this._focus);
    const start = this._positionOfRow(range.start);
    const end = this._positionOfRow(range.end);

    invariant(start.kind !== "below", "focused element starts below the screen");
    invariant(end.kind !== "above", "focused element ends above the screen");

    let anchor: Row;
    let index: number;
    if (start.kind === "at" && end.kind === "at") {
      const middle = Math.floor((start.index + end.index) / 2);
      anchor = this.rowsAfter(this._topRow, middle);
      index = mapIndex(middle);
    } else if (start.kind === "at") {
      anchor = range.start;
      index = mapIndex(start.index);
    } else if (end.kind === "at") {
      anchor = range.end;
      index = mapIndex(end.index);
    } else {
      // The element covers the whole screen: keep the middle in the middle.
      anchor = this.rowsAfter(this._topRow, Math.floor(oldHeight / 2));
      index = Math.floor(height / 2);
    }

    this._topRow = this.rowsBeforeOrTopOfDocument(anchor, index);
    this._dimensions = { width: this._dimensions.width, height };
    this._jumpSize = undefined;
  }

  /**
   * Like the post-scroll correction, but moves the viewport instead of the
   * focus so a resize never changes what is focused. Near the start of the
   * document fewer rows than the band asks for may exist above the focus;
   * the top then stops at the first row.
   */
  private _updateTopAfterResize(): void {
    const band = this._scrollBand();
    const firstRow = this.lastRowAtOrBeforeScreenIndex(band.first);
    const lastRow = this.lastRowAtOrBeforeScreenIndex(band.last);
    const range = this.document.cursorRange(this._focus);

    if (this.document.compareRows(range.end, firstRow) < 0) {
      this._topRow = this.rowsBeforeOrTopOfDocument(range.end, band.first);
    } else if (this.document.compareRows(lastRow, range.start) < 0) {
      this._topRow = this.rowsBeforeOrTopOfDocument(range.start, band.last);
    }
  }

  private _setWidth(width: number): void {
    this._dimensions = { width, height: this._dimensions.height };
    this.document.resize(width);
  }

  // ===========================================================================
  // Row helpers
  // ===========================================================================

  /** The row `count` rows before `row`, which must exist. */
  rowsBefore(row: Row, count: number): Row {
    let current = row;
    for (let i = 0; i < count; i++) {
      const prev = this.document.prevRow(current);
      invariant(prev !== undefined, `expected ${count} rows before the given row`);
      current = prev;
    }
    return current;
  }

  /** The row `count` rows after `row`, which must exist. */
  rowsAfter(row: Row, count: number): Row {
    let current = row;
    for (let i = 0; i < count; i++) {
      const next = this.document.nextRow(current);
      invariant(next !== undefined, `expected ${count} rows after the given row`);
      current = next;
    }
    return current;
  }

  /** Up to `count` rows before `row`, stopping at the first row of the document. */
  rowsBeforeOrTopOfDocument(row: Row, count: number): Row {
    let current = row;
    for (let i = 0; i < count; i++) {
      const prev = this.document.prevRow(current);
      if (prev === undefined) break;
      current = prev;
    }
    return current;
  }

  /** The row at screen index `index`, or undefined past the end of the document. */
  rowAtScreenIndex(index: number): Row | undefined {
    let current = this._topRow;
    for (let i = 0; i < index; i++) {
      const next = this.document.nextRow(current);
      if (next === undefined) return undefined;
      current = next;
    }
    return current;
  }

  /** The row at screen index `index`, or the last row of the document if that comes first. */
  lastRowAtOrBeforeScreenIndex(index: number): Row {
    let current = this._topRow;
    for (let i = 0; i < index; i++) {
      const next = this.document.nextRow(current);
      if (next === undefined) return current;
      current = next;
    }
    return current;
  }

  private _positionOfRow(row: Row): ScreenPosition {
    if (this.document.compareRows(row, this._topRow) < 0) {
      return { kind: "above" };
    }
    let current = this._topRow;
    for (let index = 0; index < this._dimensions.height; index++) {
      if (this.document.rowsEqual(row, current)) {
        return { kind: "at", index };
      }
      const next = this.document.nextRow(current);
      invariant(next !== undefined, "row is after the top row but not in the document");
      current = next;
    }
    return { kind: "below" };
  }

  private _walkTop(count: number, step: (row: Row) => Row | undefined): { row: Row; moved: number } {
    let row = this._topRow;
    let moved = 0;
    while (moved < count) {
      const next = step(row);
      if (next === undefined) break;
      row = next;
      moved++;
    }
    return { row, moved };
  }

  private _setJumpSize(count: number): void {
    invariant(Number.isInteger(count) && count >= 1, `jump size must be a positive integer, got ${count}`);
    this._jumpSize = count;
  }

  // ===========================================================================
  // Rendering
  // ===========================================================================

  /**
   * Exactly `height` entries starting at the top row; `undefined` past the
   * end of the document. Each call starts a fresh walk.
   */
  *viewportRows(): Generator<Row | undefined, void, undefined> {
    let next: Row | undefined = this._topRow;
    for (let i = 0; i < this._dimensions.height; i++) {
      if (next === undefined) {
        yield undefined;
        continue;
      }
      yield next;
      next = this.document.nextRow(next);
    }
  }
}

/**
 * Create a viewer positioned at the top of `document`, or undefined while
 * the document has no complete line.
 */
export function createDocumentViewer<Row, Cursor>(
  document: Document<Row, Cursor>,
  dimensions: Dimensions,
  scrolloff: number,
): DocumentViewer<Row, Cursor> | undefined {
  const top = document.topRowAndCursor();
  if (!top) return undefined;
  return new DocumentViewer(document, top.row, top.cursor, dimensions, scrolloff);
}

function assertDimensions(dimensions: Dimensions): void {
  invariant(
    Number.isInteger(dimensions.width) && dimensions.width >= 1,
    `width must be a positive integer, got ${dimensions.width}`,
  );
  invariant(
    Number.isInteger(dimensions.height) && dimensions.height >= 1,
    `height must be a positive integer, got ${dimensions.height}`,
  );
}

function assertScrolloff(scrolloff: number): void {
  invariant(
    Number.isInteger(scrolloff) && scrolloff >= 0,
    `scrolloff must be a non-negative integer, got ${scrolloff}`,
  );
}
