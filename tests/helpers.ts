/**
 * Test helpers and utilities.
 */

import { TextDocument, type TextRow } from "../src/document/text-document.ts";
import type { LineIndex } from "../src/document/types.ts";
import { DocumentViewer } from "../src/viewer/document-viewer.ts";

// =============================================================================
// Constructors (for tests only)
// =============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(data: Uint8Array): string {
  return decoder.decode(data);
}

/** A complete document (end of stream already signalled). */
export function doc(contents: string, width: number): TextDocument {
  const document = new TextDocument(width);
  document.append(bytes(contents));
  document.endOfStream();
  return document;
}

export type TextViewer = DocumentViewer<TextRow, LineIndex>;

/** A viewer over a complete document, focused on the first line. */
export function init(
  contents: string,
  width: number,
  height: number,
  scrolloff: number,
): TextViewer {
  const document = doc(contents, width);
  const top = document.topRowAndCursor();
  if (!top) throw new Error("test document has no lines");
  return new DocumentViewer(document, top.row, top.cursor, { width, height }, scrolloff);
}

// =============================================================================
// Rendering
// =============================================================================

/** Every logical line as a string. */
export function lines(document: TextDocument): string[] {
  const result: string[] = [];
  for (let i = 0; i < document.lineCount; i++) {
    result.push(text(document.line(i)));
  }
  return result;
}

/** Every row of the document from the top, padded to the width and boxed in `|`. */
export function rows(document: TextDocument): string[] {
  const top = document.topRowAndCursor();
  const result: string[] = [];
  let row = top?.row;
  while (row) {
    result.push(`|${text(document.rowContent(row)).padEnd(document.width)}|`);
    row = document.nextRow(row);
  }
  return result;
}

/**
 * Draw the viewport as a box: screen index, focus marker, line number,
 * then the row with wrap markers (↪ continues the row above, ↩ continues below).
 * Rows past the end of the document show `~`.
 */
export function render(viewer: TextViewer): string[] {
  const document = viewer.document;
  const width = viewer.dimensions.width;
  const out = [`┌SI┬─L#┬─${"─".repeat(width)}─┐`];
  let index = 0;
  for (const row of viewer.viewportRows()) {
    const screenIndex = String(index).padStart(2);
    index++;
    if (row === undefined) {
      out.push(`│${screenIndex}│ ~ │ ${" ".repeat(width)} │`);
      continue;
    }
    const focused = document.rowIntersectsCursor(row, viewer.focus) ? "*" : " ";
    const lineNumber = String(document.lineNumber(row)).padEnd(2);
    const from = document.isAfterStartOfWrappedRow(row) ? "↪" : " ";
    const onto = document.isBeforeEndOfWrappedRow(row) ? "↩" : " ";
    const content = text(document.rowContent(row)).padEnd(width);
    out.push(`│${screenIndex}│${focused}${lineNumber}│${from}${content}${onto}│`);
  }
  out.push(`└──┴───┴─${"─".repeat(width)}─┘`);
  return out;
}

/** Line numbers of the rows on screen, with undefined for rows past the end. */
export function visibleLineNumbers(viewer: TextViewer): (number | undefined)[] {
  return [...viewer.viewportRows()].map((row) =>
    row === undefined ? undefined : viewer.document.lineNumber(row),
  );
}
