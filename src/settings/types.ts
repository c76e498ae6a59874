// Sky settings type definitions.
// 天空设置类型定义
//
// Types are derived from runtime config objects using `typeof`.
// This ensures settings always match config without manual synchronization.
// 类型通过 `typeof` 从运行时配置对象派生。
// 这确保设置始终与配置匹配，无需手动同步。

import type { skyRuntimeConfig } from "@config/sky";

/** DeepPartial: recursively makes all fields optional. / 递归使所有字段可选 */
export type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

// Derive settings types from config objects.
// 从配置对象派生设置类型
export type SkySettings = typeof skyRuntimeConfig;

// Time settings (no config equivalent - runtime-only state).
// 时间设置（无对应 config - 仅运行时状态）
export type TimeSettings = {
    /** Current time of day in hours (0-24). / 当前时间（小时，0-24） */
    timeOfDay: number;
    /** Time flow speed multiplier (0 = paused, 1 = realtime, 60 = 1 min/sec). / 时间流逝速度倍数 */
    timeSpeed: number;
    /** Whether time is paused. / 是否暂停时间 */
    timePaused: boolean;
};

/**
 * Sky application settings - all values can be modified at runtime.
 * 天空应用设置 - 所有值都可以在运行时修改
 *
 * Changes are applied to the sky immediately.
 * 修改立即应用到天空。
 */
export type SkyAppSettings = {
    sky: SkySettings;
    time: TimeSettings;
};

/** Partial settings patch type (all fields optional). / 部分设置补丁类型（所有字段可选） */
export type SkyAppSettingsPatch = DeepPartial<SkyAppSettings>;
