// Default sky settings factory.
// 默认天空设置工厂

import { skyRuntimeConfig } from "@config/sky";
import type { SkyAppSettings } from "./types";

export function createDefaultSkySettings(): SkyAppSettings {
  return {
    sky: { ...skyRuntimeConfig },
    time: {
      timeOfDay: 12, // Noon / 正午
      timeSpeed: 60, // 1 game minute per real second / 每真实秒1游戏分钟
      timePaused: false,
    },
  };
}
