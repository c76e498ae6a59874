// DayNightCycle: altitude-driven sky colors and light intensities.
// DayNightCycle：由高度驱动的天空颜色与光照强度
//
// Altitudes are passed as sines (the y component of a unit world direction).
// 高度以正弦值传入（单位世界方向的 y 分量）。

import { Color, MathUtils, Vector3 } from "three";
import { skyStaticConfig } from "@config/sky";
import { channelSum, lerpColors, maxChannel, saturate } from "@core/math";

const { colors, lighting } = skyStaticConfig;

export type PaletteColor = keyof typeof colors;

/**
 * Fresh copy of a palette color.
 * 调色板颜色的新副本
 */
export function paletteColor(name: PaletteColor): Color {
  const [r, g, b] = colors[name];
  return new Color(r, g, b);
}

/**
 * Direction of the starlight fallback (not quite vertical).
 * 星光后备方向（并非完全垂直）
 */
export function starlightDirection(): Vector3 {
  const [x, y, z] = lighting.starlightDirection;
  return new Vector3(x, y, z).normalize();
}

/** Which body lights the scene. / 照亮场景的天体 */
export type MainLightSource = "sun" | "moon" | "stars";

/**
 * Calculate how far the clear-sky color is phased in (0 = night, 1 = day).
 * 计算晴空颜色的淡入程度（0 = 夜晚，1 = 白天）
 */
export function calculateDayFraction(sineSolarAltitude: number): number {
  return saturate(1 + sineSolarAltitude / lighting.limitOfTwilight);
}

/**
 * Illuminated fraction of the moon's visible disc, as a light weight.
 * 月亮可见圆盘的受照比例，作为光照权重
 *
 * @param longitudeDifference - Lunar minus solar celestial longitude (radians).
 * @param lunarLatitude - Moon's ecliptic latitude (radians).
 */
export function calculateMoonIllumination(longitudeDifference: number, lunarLatitude = 0): number {
  let fullAngle = Math.abs(longitudeDifference - Math.PI);
  if (lunarLatitude !== 0) {
    fullAngle = Math.acos(Math.cos(fullAngle) * Math.cos(lunarLatitude));
  }
  return 1 - saturate(lighting.moonIlluminationFalloff * fullAngle);
}

/**
 * Pick the main light: the sun if up, else an illuminated moon if up, else starlight.
 * 选择主光源：太阳在地平线上则为太阳，否则为在地平线上且受照的月亮，否则为星光
 */
export function chooseMainLightSource(sunUp: boolean, moonUp: boolean, moonWeight: number): MainLightSource {
  if (sunUp) return "sun";
  if (moonUp && moonWeight > 0) return "moon";
  return "stars";
}

/**
 * Calculate the base color used for haze, the bottom dome and backgrounds.
 * 计算用于雾霾、底部穹顶和背景的基础颜色
 *
 * Sunlight above 0.25, twilight at 0, the night blend below -0.04, linear in between.
 * 0.25 以上为日光，0 处为曙暮光，-0.04 以下为夜晚混合色，中间线性插值
 */
export function calculateBaseColor(sineSolarAltitude: number, moonUp: boolean, moonWeight: number): Color {
  const twilight = paletteColor("twilight");
  if (sineSolarAltitude >= 0) {
    const dayWeight = saturate(sineSolarAltitude / lighting.sunriseBlendAltitude);
    return lerpColors(new Color(), twilight, paletteColor("sunlight"), dayWeight);
  }

  const starlight = paletteColor("starlight");
  const blend =
    moonUp && moonWeight > 0
      ? lerpColors(new Color(), starlight, paletteColor("moonlight"), moonWeight)
      : starlight;
  const nightWeight = saturate(-sineSolarAltitude / lighting.nightBlendDepth);
  return lerpColors(new Color(), twilight, blend, nightWeight);
}

/**
 * Calculate the cloud color: the base color scaled so its brightest channel is 1,
 * darkened when neither sun nor moon is up.
 * 计算云颜色：基础颜色缩放至最亮通道为 1，太阳和月亮都不在时变暗
 */
export function calculateCloudsColor(baseColor: Color, sunUp: boolean, moonUp: boolean): Color {
  const max = maxChannel(baseColor);
  const result = max > 0 ? baseColor.clone().multiplyScalar(1 / max) : new Color(1, 1, 1);
  if (!sunUp && !moonUp) {
    result.multiplyScalar(lighting.overcastCloudBrightness);
  }
  return result;
}

/**
 * Calculate the main light color.
 * 计算主光颜色
 *
 * @param transmission - Fraction of light passing through the clouds.
 */
export function calculateMainLightColor(
  source: MainLightSource,
  baseColor: Color,
  sineSolarAltitude: number,
  transmission: number,
  moonWeight: number
): Color {
  switch (source) {
    case "sun":
      return baseColor.clone().multiplyScalar(transmission * Math.cbrt(sineSolarAltitude));
    case "moon":
      return lerpColors(new Color(), paletteColor("starlight"), paletteColor("moonlight"), transmission * moonWeight);
    case "stars":
      return paletteColor("starlight");
  }
}

/**
 * Ambient light: cloud color scaled by the slack left by the main light's strongest channel.
 * 环境光：云颜色乘以主光最强通道剩余的余量
 */
export function calculateAmbientColor(cloudsColor: Color, mainColor: Color): Color {
  const slack = Math.max(0, 1 - maxChannel(mainColor));
  return cloudsColor.clone().multiplyScalar(slack);
}

/**
 * Shadow intensity: the directional share of the total light, in [0, 1].
 * 阴影强度：方向光占总光量的比例，范围 [0, 1]
 */
export function calculateShadowIntensity(mainColor: Color, ambientColor: Color): number {
  const mainAmount = channelSum(mainColor);
  const total = mainAmount + channelSum(ambientColor);
  return total > 0 ? saturate(mainAmount / total) : 0;
}

/**
 * Bloom intensity from the sun's altitude, in [0, 1.7].
 * 根据太阳高度计算的泛光强度，范围 [0, 1.7]
 */
export function calculateBloomIntensity(sineSolarAltitude: number): number {
  return MathUtils.clamp(lighting.bloomGain * sineSolarAltitude, 0, lighting.maxBloom);
}

/** Sun disc color: redder near the horizon. / 太阳圆盘颜色：接近地平线时更红 */
export function calculateSunColor(sineSolarAltitude: number): Color {
  return new Color(1, saturate(3 * sineSolarAltitude), saturate(sineSolarAltitude - 0.1));
}

/** Moon disc color: yellower near the horizon. / 月亮圆盘颜色：接近地平线时更黄 */
export function calculateMoonColor(sineLunarAltitude: number): Color {
  return new Color(1, saturate(2 * sineLunarAltitude + 0.6), saturate(5 * sineLunarAltitude + 0.1));
}
