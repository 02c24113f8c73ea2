/**
 * Frame building: turns the viewer's visible rows into plain values a
 * terminal renderer can draw. Never mutates the viewer.
 */

import type { DocumentViewer } from "../viewer/document-viewer.ts";
import type { FrameLine } from "./types.ts";

export const INVALID_UTF8_PLACEHOLDER = "line is not valid UTF-8";

const decoder = new TextDecoder("utf-8", { fatal: true });

/** Decode a row's bytes, falling back to a placeholder for invalid UTF-8. */
export function decodeRow(bytes: Uint8Array): string {
  try {
    return decoder.decode(bytes);
  } catch {
    return INVALID_UTF8_PLACEHOLDER;
  }
}

export function buildFrame<Row, Cursor>(viewer: DocumentViewer<Row, Cursor>): FrameLine[] {
  const doc = viewer.document;
  const lines: FrameLine[] = [];
  for (const row of viewer.viewportRows()) {
    if (row === undefined) {
      lines.push({ kind: "filler" });
      continue;
    }
    lines.push({
      kind: "row",
      lineNumber: doc.lineNumber(row),
      text: decodeRow(doc.rowContent(row)),
      focused: doc.rowIntersectsCursor(row, viewer.focus),
      wrapsFromPrevious: doc.isAfterStartOfWrappedRow(row),
      wrapsOntoNext: doc.isBeforeEndOfWrappedRow(row),
    });
  }
  return lines;
}
