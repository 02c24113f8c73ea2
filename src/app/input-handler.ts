/**
 * Keyboard input handler.
 *
 * Maps keypresses (as emitted by `readline.emitKeypressEvents`) to viewer
 * Actions. Keeps the two bits of state a pager needs between keys: a
 * numeric count prefix and a pending `z` command.
 */

import type { Key } from "node:readline";
import type { Action } from "../viewer/action.ts";

/** Result of one keypress: an action, a request to quit, or nothing yet. */
export type KeyOutcome = Action | "quit" | undefined;

const MAX_COUNT = 999_999_999;

export class InputHandler {
  private _count: number | undefined = undefined;
  private _pendingZ = false;

  /** The count typed so far, if any. */
  get count(): number | undefined {
    return this._count;
  }

  get hasPendingCommand(): boolean {
    return this._pendingZ;
  }

  handleKey(key: Key): KeyOutcome {
    if (key.ctrl && key.name === "c") {
      this.reset();
      return "quit";
    }

    if (this._pendingZ) {
      this.reset();
      return zCommandToAction(key);
    }

    const digit = digitOf(key);
    if (digit !== undefined && (digit > 0 || this._count !== undefined)) {
      this._count = Math.min((this._count ?? 0) * 10 + digit, MAX_COUNT);
      return undefined;
    }

    if (!key.ctrl && !key.meta && key.name === "z" && !key.shift) {
      this._pendingZ = true;
      return undefined;
    }

    const count = this._count;
    this.reset();
    return keyToAction(key, count);
  }

  /** Drop any count and pending command. */
  reset(): void {
    this._count = undefined;
    this._pendingZ = false;
  }
}

/**
 * Map a single key (after any count prefix) to an Action.
 * `q` yields "quit"; unknown keys yield undefined.
 */
export function keyToAction(key: Key, count: number | undefined): KeyOutcome {
  if (key.meta) return undefined;

  if (key.ctrl) {
    switch (key.name) {
      case "c":
        return "quit";
      case "e":
        return { type: "scrollDown", count: count ?? 1 };
      case "y":
        return { type: "scrollUp", count: count ?? 1 };
      case "d":
        return { type: "jumpDown", count };
      case "u":
        return { type: "jumpUp", count };
      default:
        return undefined;
    }
  }

  switch (key.name) {
    case "q":
      return key.shift ? undefined : "quit";
    case "j":
      return key.shift ? undefined : { type: "moveCursorDown", count: count ?? 1 };
    case "down":
      return { type: "moveCursorDown", count: count ?? 1 };
    case "k":
      return key.shift ? undefined : { type: "moveCursorUp", count: count ?? 1 };
    case "up":
      return { type: "moveCursorUp", count: count ?? 1 };
    case "g":
      return key.shift ? { type: "focusBottom" } : { type: "focusTop" };
    default:
      return undefined;
  }
}

function zCommandToAction(key: Key): Action | undefined {
  if (key.ctrl || key.meta || key.shift) return undefined;
  switch (key.name) {
    case "t":
      return { type: "moveFocusedToTop" };
    case "z":
      return { type: "moveFocusedToCenter" };
    case "b":
      return { type: "moveFocusedToBottom" };
    default:
      return undefined;
  }
}

function digitOf(key: Key): number | undefined {
  if (key.ctrl || key.meta) return undefined;
  const name = key.name ?? key.sequence;
  if (name === undefined || name.length !== 1) return undefined;
  const code = name.charCodeAt(0) - 0x30;
  return code >= 0 && code <= 9 ? code : undefined;
}
