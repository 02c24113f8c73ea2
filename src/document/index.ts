export { BaseDocument } from "./base-document.ts";
export { lineIndex, TextDocument, type TextRow } from "./text-document.ts";
export type {
  CursorLayoutDetails,
  CursorRange,
  Dimensions,
  Document,
  LineIndex,
} from "./types.ts";
export {
  isFirstSegment,
  isLastSegment,
  lastSegmentOf,
  nextSegment,
  prevSegment,
  type WrapSegment,
  WrapTable,
} from "./wrap-table.ts";
