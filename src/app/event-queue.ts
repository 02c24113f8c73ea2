/**
 * Ordered event channel between the pager's producers (keyboard, resize,
 * data source) and the single loop that owns the App.
 */

import * as logger from "../logger.ts";
import type { App } from "./app.ts";
import type { AppEvent, Frame } from "./types.ts";

export class AppEventQueue {
  private readonly _events: AppEvent[] = [];
  private readonly _waiters: Array<(event: AppEvent | undefined) => void> = [];
  private _closed = false;

  get closed(): boolean {
    return this._closed;
  }

  /** Number of events waiting to be taken. */
  get size(): number {
    return this._events.length;
  }

  /** Enqueue an event. Events pushed after `close()` are dropped. */
  push(event: AppEvent): void {
    if (this._closed) {
      logger.warn("event pushed after queue closed", { type: event.type });
      return;
    }
    const waiter = this._waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this._events.push(event);
    }
  }

  /** Stop accepting events. Queued events are still delivered. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const waiter of this._waiters.splice(0)) {
      waiter(undefined);
    }
  }

  /** Next event, or undefined once the queue is closed and drained. */
  async next(): Promise<AppEvent | undefined> {
    const event = this._events.shift();
    if (event) return event;
    if (this._closed) return undefined;
    return await new Promise<AppEvent | undefined>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<AppEvent, void, undefined> {
    for (;;) {
      const event = await this.next();
      if (event === undefined) return;
      yield event;
    }
  }
}

/**
 * Feed events to `app` one at a time until the user quits or the queue
 * closes. `draw` is called with a fresh frame after every event.
 */
export async function runEventLoop(
  app: App,
  queue: AppEventQueue,
  draw: (frame: Frame) => void,
): Promise<void> {
  draw(app.frame());
  for await (const event of queue) {
    const outcome = app.handleEvent(event);
    if (outcome === "quit") {
      logger.info("quit requested");
      queue.close();
      return;
    }
    draw(app.frame());
  }
}
