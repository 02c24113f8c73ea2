/**
 * Pager settings.
 *
 * Flat dotted keys with defaults, typed accessors and change listeners.
 * Values coming from outside (settings files, environment) are validated
 * against a TypeBox schema before they reach a Settings instance.
 */

import { readFile } from "node:fs/promises";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// =============================================================================
// Schema
// =============================================================================

export const LogLevelSchema = Type.Union([
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
]);

export const PagerSettingsSchema = Type.Object(
  {
    /** Minimum rows kept between the focused line and the screen edge. */
    "viewer.scrolloff": Type.Integer({ minimum: 0 }),
    /** Grid size used until the first resize event arrives. */
    "viewer.initialWidth": Type.Integer({ minimum: 1 }),
    "viewer.initialHeight": Type.Integer({ minimum: 1 }),
    "log.level": LogLevelSchema,
    /** Log file path; empty disables file logging. */
    "log.file": Type.String(),
  },
  { additionalProperties: false },
);

export type PagerSettings = Static<typeof PagerSettingsSchema>;

const PartialPagerSettingsSchema = Type.Partial(PagerSettingsSchema);

export const SETTING_KEYS: readonly (keyof PagerSettings)[] = [
  "viewer.scrolloff",
  "viewer.initialWidth",
  "viewer.initialHeight",
  "log.level",
  "log.file",
];

export function defaultSettings(): PagerSettings {
  return {
    "viewer.scrolloff": 2,
    "viewer.initialWidth": 80,
    "viewer.initialHeight": 24,
    "log.level": "warn",
    "log.file": "",
  };
}

/** Settings input that failed validation. */
export class SettingsError extends Error {
  override readonly name = "SettingsError";
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid settings: ${problems.join("; ")}`);
    this.problems = problems;
  }
}

/**
 * Validate an untrusted settings object (e.g. parsed JSON).
 * Every key is optional; unknown keys are rejected.
 */
export function parseSettings(input: unknown): Partial<PagerSettings> {
  if (Value.Check(PartialPagerSettingsSchema, input)) {
    return input;
  }
  const problems = [...Value.Errors(PartialPagerSettingsSchema, input)].map(
    (e) => `${e.path || "/"}: ${e.message}`,
  );
  throw new SettingsError(problems);
}

/**
 * Read overrides from environment variables.
 *
 * PAGEVIEW_SCROLLOFF, PAGEVIEW_LOG_LEVEL, PAGEVIEW_LOG_FILE
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<PagerSettings> {
  const raw: Record<string, unknown> = {};
  const scrolloff = env["PAGEVIEW_SCROLLOFF"];
  if (scrolloff !== undefined && scrolloff !== "") {
    raw["viewer.scrolloff"] = Number(scrolloff);
  }
  const level = env["PAGEVIEW_LOG_LEVEL"];
  if (level !== undefined && level !== "") {
    raw["log.level"] = level;
  }
  const file = env["PAGEVIEW_LOG_FILE"];
  if (file !== undefined) {
    raw["log.file"] = file;
  }
  return parseSettings(raw);
}

/** Load and validate a JSON settings file. */
export async function loadSettingsFile(path: string): Promise<Partial<PagerSettings>> {
  const text = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new SettingsError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseSettings(parsed);
}

// =============================================================================
// Settings
// =============================================================================

type Listener<K extends keyof PagerSettings> = (value: PagerSettings[K]) => void;

type ListenerMap = { [K in keyof PagerSettings]?: Set<Listener<K>> };

export class Settings {
  private _values: PagerSettings;
  private _listeners: ListenerMap = {};

  constructor(initial: Partial<PagerSettings> = {}) {
    this._values = { ...defaultSettings(), ...initial };
  }

  get<K extends keyof PagerSettings>(key: K): PagerSettings[K] {
    return this._values[key];
  }

  set<K extends keyof PagerSettings>(key: K, value: PagerSettings[K]): void {
    const oldValue = this._values[key];
    this._values[key] = value;
    if (oldValue !== value) {
      this._notify(key);
    }
  }

  getAll(): PagerSettings {
    return { ...this._values };
  }

  /** Apply several settings; listeners fire for each changed key. */
  update(partial: Partial<PagerSettings>): void {
    for (const key of SETTING_KEYS) {
      this._copyFrom(partial, key);
    }
  }

  /** Restore defaults, notifying listeners of every key that changed. */
  reset(): void {
    this.update(defaultSettings());
  }

  /**
   * Listen for changes to one setting.
   * Returns a function that removes the listener.
   */
  onChange<K extends keyof PagerSettings>(key: K, callback: Listener<K>): () => void {
    const listenerMap: { [P in K]?: Set<Listener<P>> } = this._listeners;
    const listeners: Set<Listener<K>> = listenerMap[key] ?? new Set<Listener<K>>();
    listenerMap[key] = listeners;
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  }

  private _copyFrom<K extends keyof PagerSettings>(from: Partial<PagerSettings>, key: K): void {
    const value = from[key];
    if (value !== undefined) {
      this.set(key, value);
    }
  }

  private _notify<K extends keyof PagerSettings>(key: K): void {
    const listeners = this._listeners[key];
    if (!listeners) return;
    const value = this._values[key];
    for (const listener of listeners) {
      listener(value);
    }
  }
}

export interface LoadSettingsOptions {
  readonly env: NodeJS.ProcessEnv;
  /** JSON settings file; environment variables override its values. */
  readonly file?: string;
}

/** Settings from an optional file and the environment, over the defaults. */
export async function loadSettings(options: LoadSettingsOptions): Promise<Settings> {
  const fromFile = options.file === undefined ? {} : await loadSettingsFile(options.file);
  return new Settings({ ...fromFile, ...settingsFromEnv(options.env) });
}
