// Sky settings module.
// 天空设置模块

export type {
  DeepPartial,
  SkySettings,
  TimeSettings,
  SkyAppSettings,
  SkyAppSettingsPatch,
} from "./types";

export { createDefaultSkySettings } from "./defaults";

export {
  applySettingsPatch,
  cloneSettings,
  setSettings,
  mergeSettingsWithDefaults,
} from "./utils";
