// SettingsManager: sky settings management with change notifications.
// SettingsManager：天空设置管理，带变化通知

import { MathUtils } from "three";
import {
  applySettingsPatch,
  cloneSettings,
  createDefaultSkySettings,
  setSettings,
  type SkyAppSettings,
  type SkyAppSettingsPatch,
  type SkySettings,
} from "@settings/index";
import { isLunarPhasePreset } from "@sky/LunarPhase";
import type { SkySystem } from "@sky/SkySystem";
import { InvalidArgumentError } from "./errors";
import { requireInRange } from "./validate";

export type SettingsChangeCallback = (settings: SkyAppSettings, patch: SkyAppSettingsPatch) => void;

/**
 * Manages sky settings with immediate application and change tracking.
 * 管理天空设置，支持即时应用和变化跟踪
 *
 * A patch is committed only after the sky accepted it. A rejected patch
 * re-applies the committed settings, so the sky matches `current` again.
 * 补丁只有在天空接受后才会提交；被拒绝时重新应用已提交的设置，使天空与 `current` 一致。
 */
export class SettingsManager {
  private readonly settings: SkyAppSettings;
  private readonly skySystem: SkySystem;
  private onChangeCallbacks: SettingsChangeCallback[] = [];

  // Callback for time updates (e.g. to sync a clock display).
  // 时间更新回调（例如同步时钟显示）
  private onTimeUpdateCallback: ((timeOfDay: number) => void) | null = null;

  constructor(skySystem: SkySystem, initial?: SkyAppSettings) {
    this.skySystem = skySystem;
    this.settings = initial ? cloneSettings(initial) : createDefaultSkySettings();
    this.applyAll(this.settings);
  }

  /**
   * Get current settings snapshot.
   * 获取当前设置快照
   */
  getSnapshot(): SkyAppSettings {
    return cloneSettings(this.settings);
  }

  /**
   * Get raw settings reference (for systems that need direct access).
   * 获取原始设置引用（供需要直接访问的系统使用）
   */
  get current(): Readonly<SkyAppSettings> {
    return this.settings;
  }

  /**
   * Update settings with a partial patch.
   * 使用部分补丁更新设置
   */
  update(patch: SkyAppSettingsPatch): void {
    const candidate = cloneSettings(this.settings);
    applySettingsPatch(candidate, patch);
    try {
      this.applyChanges(candidate, patch);
    } catch (error) {
      this.applyAll(this.settings);
      throw error;
    }
    setSettings(this.settings, candidate);
    this.notifyChange(patch);
  }

  /**
   * Apply complete settings (e.g. loaded from a file).
   * 应用完整设置（例如从文件加载）
   */
  applyFull(newSettings: SkyAppSettings): void {
    try {
      this.applyAll(newSettings);
    } catch (error) {
      this.applyAll(this.settings);
      throw error;
    }
    setSettings(this.settings, newSettings);
    this.notifyChange({});
  }

  /**
   * Reset to default settings.
   * 重置为默认设置
   */
  reset(): void {
    this.applyFull(createDefaultSkySettings());
  }

  /**
   * Set callback for time updates.
   * 设置时间更新回调
   */
  setOnTimeUpdate(callback: ((timeOfDay: number) => void) | null): void {
    this.onTimeUpdateCallback = callback;
  }

  /**
   * Advance world time by `dt` real seconds and move the sky's hour along.
   * 将世界时间推进 `dt` 真实秒，并同步天空的小时数
   */
  updateWorldTime(dt: number): void {
    requireInRange("SettingsManager", "dt", dt, 0, Number.MAX_VALUE);
    const time = this.settings.time;

    if (!time.timePaused && time.timeSpeed > 0) {
      const hoursElapsed = (dt * time.timeSpeed) / 3600;
      time.timeOfDay = (time.timeOfDay + hoursElapsed) % 24;
      this.skySystem.timeAndPlace.setHour(time.timeOfDay);
      this.onTimeUpdateCallback?.(time.timeOfDay);
    }
  }

  /**
   * Register a callback for settings changes.
   * 注册设置变化回调
   */
  onChange(callback: SettingsChangeCallback): () => void {
    this.onChangeCallbacks.push(callback);
    return () => {
      const index = this.onChangeCallbacks.indexOf(callback);
      if (index !== -1) {
        this.onChangeCallbacks.splice(index, 1);
      }
    };
  }

  private applyChanges(settings: SkyAppSettings, patch: SkyAppSettingsPatch): void {
    // Apply sky settings immediately.
    // 立即应用天空设置
    if (patch.sky) {
      this.applySkySettings(settings.sky);
    }

    // Apply time of day.
    // 应用一天中的时间
    if (patch.time?.timeOfDay !== undefined) {
      this.skySystem.timeAndPlace.setHour(settings.time.timeOfDay);
    }
  }

  private applyAll(settings: SkyAppSettings): void {
    this.applySkySettings(settings.sky);
    this.skySystem.timeAndPlace.setHour(settings.time.timeOfDay);
  }

  private applySkySettings(sky: SkySettings): void {
    const { degToRad } = MathUtils;
    const sys = this.skySystem;

    sys.timeAndPlace.setObserverLatitude(degToRad(sky.latitudeDegrees));
    sys.timeAndPlace.setSolarLongitude(degToRad(sky.solarLongitudeDegrees));

    if (sky.lunarPhase === "none") {
      sys.setPhase(null);
    } else if (sky.lunarPhase === "custom") {
      sys.setCustomPhase(degToRad(sky.customLongitudeDifferenceDegrees), degToRad(sky.customLunarLatitudeDegrees));
    } else if (isLunarPhasePreset(sky.lunarPhase)) {
      sys.setPhase(sky.lunarPhase);
    } else {
      throw new InvalidArgumentError("SettingsManager", `Unknown lunar phase "${String(sky.lunarPhase)}"`);
    }

    sys.setCloudiness(sky.cloudiness);
    sys.setCloudsRate(sky.cloudsRate);
    sys.setCloudsYOffset(sky.cloudsYOffset);
    sys.setCloudModulation(sky.cloudModulation);
    sys.setSolarDiameter(degToRad(sky.solarDiameterDegrees));
    sys.setLunarDiameter(degToRad(sky.lunarDiameterDegrees));
    sys.setTopVerticalAngle(degToRad(sky.topVerticalAngleDegrees));
  }

  private notifyChange(patch: SkyAppSettingsPatch): void {
    const snapshot = this.getSnapshot();
    for (const callback of this.onChangeCallbacks) {
      callback(snapshot, patch);
    }
  }
}
