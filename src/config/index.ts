export {
  defaultSettings,
  type LoadSettingsOptions,
  loadSettings,
  loadSettingsFile,
  LogLevelSchema,
  type PagerSettings,
  PagerSettingsSchema,
  parseSettings,
  SETTING_KEYS,
  Settings,
  SettingsError,
  settingsFromEnv,
} from "./settings.ts";
