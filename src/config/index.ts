// Config module - re-exports all config modules.
// 配置模块 - 重新导出所有配置模块

// Dome projection.
// 穹顶投影
export { domeStaticConfig, stretchCoefficient } from "./dome";

// Sky.
// 天空
export {
  skyRuntimeConfig,
  skyStaticConfig,
  lunarPhasePresets,
  type LunarPhasePreset,
  type LunarPhaseSetting,
} from "./sky";
