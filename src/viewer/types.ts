/**
 * Viewer state and positioning types.
 */

/** Inclusive range of screen indexes (0 = top row of the viewport). */
export interface ScreenIndexRange {
  readonly first: number;
  readonly last: number;
}

/** Where a row sits relative to the visible screen. */
export type ScreenPosition =
  | { readonly kind: "above" }
  | { readonly kind: "at"; readonly index: number }
  | { readonly kind: "below" };

/**
 * Screen indexes at which the first row of the focused element may appear,
 * with the window as it stood after each step of the computation.
 */
export interface AcceptableStartIndexes {
  readonly cursorHeight: number;
  readonly lastScreenIndex: number;
  readonly afterScrolloff: ScreenIndexRange;
  readonly afterDocumentEdges: ScreenIndexRange;
  readonly afterCursorHeight: ScreenIndexRange;
  readonly start: number;
  readonly end: number;
}
