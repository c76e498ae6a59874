// Scalar and color helpers shared by the sky modules.
// 天空模块共用的标量与颜色辅助函数

import { MathUtils, type Color } from "three";

/**
 * Floored modulo: result has the sign of the divisor, so `modulo(-1, 24) === 23`.
 * 向下取整取模：结果与除数同号
 */
export function modulo(value: number, divisor: number): number {
  const result = value % divisor;
  if (result >= 0) return result;

  // A tiny negative remainder can round up to the divisor itself.
  // 极小的负余数加上除数后可能舍入为除数本身
  const wrapped = result + divisor;
  return wrapped >= divisor ? 0 : wrapped;
}

/** Wrap into [0, 1). / 包裹到 [0, 1) */
export function wrapFraction(value: number): number {
  return modulo(value, 1);
}

/** Clamp into [0, 1]. / 限制到 [0, 1] */
export function saturate(value: number): number {
  return MathUtils.clamp(value, 0, 1);
}

/** Largest of the three color channels. / 三个颜色通道中的最大值 */
export function maxChannel(color: Color): number {
  return Math.max(color.r, color.g, color.b);
}

/** Sum of the three color channels, used as a light "energy". / 三通道之和，作为光“能量” */
export function channelSum(color: Color): number {
  return color.r + color.g + color.b;
}

/**
 * Blend two colors into `target`: `a + (b - a) * t`.
 * 将两种颜色混合到 `target`
 */
export function lerpColors(target: Color, a: Color, b: Color, t: number): Color {
  return target.copy(a).lerp(b, t);
}
