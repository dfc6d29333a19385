export { settingsFileSchema, type SettingsFile } from './schema.js';
export {
  toSettings,
  type Settings,
  type LogoSettings,
  type SegmentSettings,
  type DirectorySettings,
  type OutputSettings,
  type QualitySettings,
  type PerformanceSettings,
  type FileManagementSettings,
  type RetrySettings,
  type OutputNaming,
  type SourceAction,
  type HwAccel,
  type SettingsLogLevel,
} from './model.js';
export { loadSettings, parseSettings } from './loader.js';
