export type { Action } from "./action.ts";
export { createDocumentViewer, DocumentViewer } from "./document-viewer.ts";
export type { AcceptableStartIndexes, ScreenIndexRange, ScreenPosition } from "./types.ts";
