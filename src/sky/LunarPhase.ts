// LunarPhase: named phase presets and their geometry.
// LunarPhase：命名的月相预设及其几何参数

import { lunarPhasePresets, skyStaticConfig, type LunarPhasePreset } from "@config/sky";
import { InvalidArgumentError } from "@core/errors";
import { modulo } from "@core/math";

export { lunarPhasePresets, type LunarPhasePreset };

/** A preset, or "custom" for an externally supplied phase angle. / 预设，或 "custom" 表示外部提供的相位角 */
export type LunarPhase = LunarPhasePreset | "custom";

export function isLunarPhasePreset(value: string): value is LunarPhasePreset {
  return lunarPhasePresets.some((preset) => preset === value);
}

/**
 * Parse a phase description such as "waxing-gibbous" or "custom".
 * 解析月相描述，例如 "waxing-gibbous" 或 "custom"
 */
export function lunarPhaseFromDescription(description: string): LunarPhase {
  if (description === "custom" || isLunarPhasePreset(description)) {
    return description;
  }
  throw new InvalidArgumentError("LunarPhase", `Unknown lunar phase "${description}"`);
}

/**
 * Celestial longitude of the moon minus that of the sun (radians, [0, 2π)).
 * 月亮黄经减去太阳黄经（弧度，[0, 2π)）
 */
export function lunarLongitudeDifference(preset: LunarPhasePreset): number {
  return skyStaticConfig.lunarPhaseLongitudes[preset] * Math.PI;
}

/** Asset path of a preset's moon texture. / 预设月亮纹理的资源路径 */
export function lunarPhaseImagePath(preset: LunarPhasePreset): string {
  return `${skyStaticConfig.textures.moonDirectory}/${preset}.png`;
}

/** Object slot that carries a preset's texture. / 承载预设纹理的天体槽位 */
export function lunarPhaseObjectIndex(preset: LunarPhasePreset): number {
  return skyStaticConfig.firstMoonObjectIndex + lunarPhasePresets.indexOf(preset);
}

/**
 * Preset whose longitude difference is closest (around the circle) to an angle.
 * 经度差（沿圆周）最接近给定角度的预设
 */
export function nearestLunarPhasePreset(longitudeDifference: number): LunarPhasePreset {
  let best: LunarPhasePreset = lunarPhasePresets[0];
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const preset of lunarPhasePresets) {
    const delta = modulo(longitudeDifference - lunarLongitudeDifference(preset), 2 * Math.PI);
    const distance = Math.min(delta, 2 * Math.PI - delta);
    if (distance < bestDistance) {
      best = preset;
      bestDistance = distance;
    }
  }
  return best;
}
