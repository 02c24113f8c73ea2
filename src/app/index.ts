export { App, RECEIVED_NO_INPUT, WAITING_FOR_INPUT } from "./app.ts";
export { AppEventQueue, runEventLoop } from "./event-queue.ts";
export { buildFrame, decodeRow, INVALID_UTF8_PLACEHOLDER } from "./frame.ts";
export type { KeyOutcome } from "./input-handler.ts";
export { InputHandler, keyToAction } from "./input-handler.ts";
export type { AppEvent, Frame, FrameLine } from "./types.ts";
