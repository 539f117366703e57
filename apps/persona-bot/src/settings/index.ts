export { SettingsManager } from './settings-manager';
export type { SettingsManagerOptions } from './settings-manager';
export {
  DEFAULT_SETTINGS,
  ENV_OVERRIDES,
  PERSONALITIES,
  SECTION_NAMES,
  isSectionName,
  settingsSchema,
  settingsWarnings,
} from './schema';
export type {
  Settings,
  SectionName,
  Personality,
  EmulatorSettings,
  ChatSettings,
  FeatureSettings,
  SecuritySettings,
} from './schema';
