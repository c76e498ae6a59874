// Sky settings utility functions.
// 天空设置工具函数

import { silentLogger, type SkyLogger } from "@core/logging";
import type { SkyAppSettings, SkyAppSettingsPatch } from "./types";
import { createDefaultSkySettings } from "./defaults";

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge source into target (mutates target).
 * 深度合并 source 到 target（修改 target）
 *
 * Only keys already present in target are copied, and only when the value
 * has the same primitive type.
 * 仅复制 target 中已有的键，且值的原始类型必须相同。
 */
function deepMerge<T extends object>(target: T, source: unknown): T {
  if (!isPlainObject(source)) return target;

  for (const [key, sourceVal] of Object.entries(source)) {
    if (sourceVal === undefined || sourceVal === null) continue;

    const targetVal: unknown = Reflect.get(target, key);
    if (isPlainObject(targetVal)) {
      deepMerge(targetVal, sourceVal);
    } else if (targetVal !== undefined && typeof targetVal === typeof sourceVal) {
      Reflect.set(target, key, sourceVal);
    }
  }
  return target;
}

/**
 * Apply a partial settings patch to existing settings (mutates settings).
 * 应用部分设置补丁到现有设置（修改 settings）
 */
export function applySettingsPatch(settings: SkyAppSettings, patch: SkyAppSettingsPatch): void {
  deepMerge(settings, patch);
}

/**
 * Clone settings (deep copy).
 * 克隆设置（深拷贝）
 */
export function cloneSettings(settings: SkyAppSettings): SkyAppSettings {
  return structuredClone(settings);
}

/**
 * Replace all settings values (mutates target).
 * 替换所有设置值（修改 target）
 */
export function setSettings(target: SkyAppSettings, source: SkyAppSettings): void {
  deepMerge(target, source);
}

/**
 * Merge partial settings JSON with defaults.
 * 将部分设置 JSON 与默认设置合并
 *
 * @param json Settings JSON string (may be partial or malformed).
 * @returns Complete settings with defaults for missing fields.
 */
export function mergeSettingsWithDefaults(json: string | null, logger: SkyLogger = silentLogger): SkyAppSettings {
  const defaults = createDefaultSkySettings();
  if (!json) return defaults;

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    logger.warn(`[Settings] Ignoring malformed settings JSON: ${error instanceof Error ? error.message : String(error)}`);
    return defaults;
  }
  return deepMerge(defaults, parsed);
}
