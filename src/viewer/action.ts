/**
 * Viewer actions.
 *
 * Produced by key dispatch and applied one at a time with
 * `DocumentViewer.dispatch`.
 */

/** All viewer actions. */
export type Action =
  | { type: "noOp" }
  | { type: "moveCursorDown"; count: number }
  | { type: "moveCursorUp"; count: number }
  | { type: "scrollDown"; count: number }
  | { type: "scrollUp"; count: number }
  | { type: "focusTop" }
  | { type: "focusBottom" }
  /** Half-page jump; a count becomes the jump size for later jumps */
  | { type: "jumpDown"; count: number | undefined }
  | { type: "jumpUp"; count: number | undefined }
  | { type: "moveFocusedToTop" }
  | { type: "moveFocusedToCenter" }
  | { type: "moveFocusedToBottom" };
