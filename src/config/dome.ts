// Dome projection configuration.
// 穹顶投影配置

export const domeStaticConfig = {
  // Texture coordinates of the zenith (top anchor).
  // 天顶（顶部锚点）的纹理坐标
  topU: 0.5,
  topV: 0.5,

  // UV distance from the anchor to the horizon (angle from top = π/2).
  // 从锚点到地平线（离顶角 = π/2）的 UV 距离
  uvScale: 0.44,

  // Angle from the zenith to the rim of a default dome (radians).
  // 默认穹顶从天顶到边缘的角度（弧度）
  defaultVerticalAngle: Math.PI / 2,

  // Upper bound for the top dome's vertical angle (radians, exclusive).
  // 顶部穹顶垂直角的上限（弧度，开区间）
  maxTopVerticalAngle: 1.785,

  // Object discs cover this fraction of their texture's width.
  // 天体圆盘占其纹理宽度的比例
  discDiameter: 0.25,

  // Sample counts for the sky domes.
  // 天空穹顶的采样数
  rimSamples: 60,
  quadrantSamples: 16,
  bottomQuadrantSamples: 2,
} as const;

/**
 * Radial stretch coefficient that keeps object discs round near the horizon:
 * (π/2 − 1) / uvScale².
 * 径向拉伸系数，使天体圆盘在地平线附近保持圆形
 */
export const stretchCoefficient =
  (Math.PI / 2 - 1) / (domeStaticConfig.uvScale * domeStaticConfig.uvScale);
