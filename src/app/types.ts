/**
 * Application events and frames.
 */

import type { Key } from "node:readline";
import type { Dimensions } from "../document/types.ts";

/** Everything that can happen to the pager, in arrival order. */
export type AppEvent =
  | { type: "data"; bytes: Uint8Array }
  | { type: "eof" }
  | { type: "key"; key: Key }
  | { type: "resize"; dimensions: Dimensions }
  | { type: "dataError"; error: unknown };

/** One screen line of a viewport frame. */
export type FrameLine =
  | {
      kind: "row";
      /** 1-based logical line number */
      lineNumber: number;
      text: string;
      focused: boolean;
      /** Continues a line wrapped from the row above */
      wrapsFromPrevious: boolean;
      /** Continues onto the row below */
      wrapsOntoNext: boolean;
    }
  | { kind: "filler" };

/** What to draw: a status message until a viewer exists, then the viewport. */
export type Frame =
  | { kind: "status"; message: string }
  | { kind: "viewport"; lines: readonly FrameLine[] };
