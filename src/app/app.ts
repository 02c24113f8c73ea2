/**
 * App: routes pager events to the document and its viewer.
 *
 * The viewer needs a first row, so the document is held on its own until
 * its first complete line arrives. Until then the frame is a status message.
 * Logging follows the `log.*` settings for as long as the app listens.
 */

import type { Settings } from "../config/settings.ts";
import { TextDocument, type TextRow } from "../document/text-document.ts";
import type { Dimensions, LineIndex } from "../document/types.ts";
import * as logger from "../logger.ts";
import { createDocumentViewer, type DocumentViewer } from "../viewer/document-viewer.ts";
import { buildFrame } from "./frame.ts";
import { InputHandler } from "./input-handler.ts";
import type { AppEvent, Frame } from "./types.ts";

export const WAITING_FOR_INPUT = "Waiting for input...";
export const RECEIVED_NO_INPUT = "Received no input...";

export class App {
  private readonly _document: TextDocument;
  private _viewer: DocumentViewer<TextRow, LineIndex> | undefined = undefined;
  private _dimensions: Dimensions;
  private readonly _settings: Settings;
  private readonly _input = new InputHandler();
  private readonly _unsubscribes: (() => void)[];

  constructor(settings: Settings, dimensions?: Dimensions) {
    this._settings = settings;
    this._dimensions = dimensions ?? {
      width: settings.get("viewer.initialWidth"),
      height: settings.get("viewer.initialHeight"),
    };
    this._document = new TextDocument(this._dimensions.width);
    this._applyLogging();
    this._unsubscribes = [
      settings.onChange("viewer.scrolloff", (scrolloff) => {
        this._viewer?.setScrolloff(scrolloff);
      }),
      settings.onChange("log.level", () => this._applyLogging()),
      settings.onChange("log.file", () => this._applyLogging()),
    ];
  }

  get viewer(): DocumentViewer<TextRow, LineIndex> | undefined {
    return this._viewer;
  }

  get dimensions(): Dimensions {
    return this._dimensions;
  }

  /** Apply one event. Returns "quit" when the user asked to leave. */
  handleEvent(event: AppEvent): "quit" | undefined {
    switch (event.type) {
      case "data":
        this._handleData(event.bytes);
        return undefined;
      case "eof":
        this._handleEof();
        return undefined;
      case "dataError":
        logger.error("reading document data failed", {
          error: event.error instanceof Error ? event.error.message : String(event.error),
        });
        this._handleEof();
        return undefined;
      case "resize":
        this._handleResize(event.dimensions);
        return undefined;
      case "key": {
        const outcome = this._input.handleKey(event.key);
        if (outcome === "quit") return "quit";
        if (outcome && this._viewer) {
          this._viewer.dispatch(outcome);
        }
        return undefined;
      }
    }
  }

  frame(): Frame {
    if (this._viewer) {
      return { kind: "viewport", lines: buildFrame(this._viewer) };
    }
    return {
      kind: "status",
      message: this._document.isComplete ? RECEIVED_NO_INPUT : WAITING_FOR_INPUT,
    };
  }

  /** Stop listening to settings. */
  dispose(): void {
    for (const unsubscribe of this._unsubscribes) {
      unsubscribe();
    }
  }

  private _applyLogging(): void {
    logger.configureLogging({
      level: this._settings.get("log.level"),
      file: this._settings.get("log.file"),
    });
  }

  private _handleData(bytes: Uint8Array): void {
    if (this._document.isComplete) {
      logger.warn("data received after end of stream", { bytes: bytes.length });
      return;
    }
    if (this._viewer) {
      this._viewer.appendDocumentData(bytes);
      return;
    }
    this._document.append(bytes);
    this._tryCreateViewer();
  }

  private _handleEof(): void {
    if (this._document.isComplete) return;
    if (this._viewer) {
      this._viewer.documentEof();
      return;
    }
    // A final unterminated line may give the viewer its first row.
    this._document.endOfStream();
    this._tryCreateViewer();
  }

  private _handleResize(dimensions: Dimensions): void {
    this._dimensions = dimensions;
    if (this._viewer) {
      this._viewer.resize(dimensions);
    } else {
      this._document.resize(dimensions.width);
    }
  }

  private _tryCreateViewer(): void {
    const viewer = createDocumentViewer<TextRow, LineIndex>(
      this._document,
      this._dimensions,
      this._settings.get("viewer.scrolloff"),
    );
    if (!viewer) return;
    logger.debug("viewer created", {
      width: this._dimensions.width,
      height: this._dimensions.height,
    });
    this._viewer = viewer;
  }
}
