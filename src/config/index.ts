export { loadScannerDefaults, parseScannerDefaults } from "./defaults.js";
export {
  applyProjectConfig,
  buildScanSettings,
  createScanConfig,
  readEnvSettings,
} from "./settings.js";
export type { ProjectLocation, SettingsOverrides } from "./settings.js";
export { loadProjectConfig, validateProjectConfig } from "./project-config.js";
export { splitPatternList } from "./validation.js";
export type {
  EnvSettings,
  ProjectConfigFile,
  ScanConfig,
  ScannerDefaults,
  ScanSettings,
} from "./types.js";
