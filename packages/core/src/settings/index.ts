export {
  SettingsStore,
  SettingsSchema,
  SettingsPatchSchema,
  defaultSettings,
  redactSettings,
  REDACTED,
} from './settings.js'
export type { Settings, SettingsPatch } from './settings.js'
