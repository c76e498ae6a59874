// Core module barrel exports.
// Core 模块桶导出

export {
  SkyError,
  InvalidArgumentError,
  IllegalStateError,
  ConfigurationOverflowError,
  assertNever,
  type SkyErrorCode,
} from "./errors";
export { consoleLogger, silentLogger, type SkyLogger } from "./logging";
export { SettingsManager, type SettingsChangeCallback } from "./SettingsManager";
