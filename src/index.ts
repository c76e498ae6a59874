// Procedural sky: public entry point.
// 程序化天空：公共入口

export * from "./sky";
export * from "./core";
export * from "./settings";
export {
  domeStaticConfig,
  skyRuntimeConfig,
  skyStaticConfig,
  lunarPhasePresets,
  type LunarPhasePreset,
  type LunarPhaseSetting,
} from "./config";
