// Sky configuration (time and place, moon, clouds, lighting palette).
// 天空配置（时间与地点、月亮、云层、光照调色板）

// Lunar phase presets, ordered by object slot (slot = 1 + preset position).
// 月相预设，按天体槽位排序（槽位 = 1 + 预设位置）
export const lunarPhasePresets = [
  "full",
  "waning-crescent",
  "waning-gibbous",
  "waxing-crescent",
  "waxing-gibbous",
] as const;

export type LunarPhasePreset = (typeof lunarPhasePresets)[number];

// Phase selection as stored in settings ("none" hides the moon).
// 设置中保存的月相选择（"none" 隐藏月亮）
export type LunarPhaseSetting = LunarPhasePreset | "custom" | "none";

// ============================================================================
// Runtime config - can be modified at runtime via settings.
// 运行时配置 - 可通过设置在运行时修改
// ============================================================================
export const skyRuntimeConfig = {
  // Observer latitude in degrees north of the equator (-90 to 90).
  // 观察者纬度（度，赤道以北，-90 到 90）
  latitudeDegrees: 51.1788,
  // Sun's celestial longitude in degrees (0 = vernal equinox, 0 to 360).
  // 太阳黄经（度，0 = 春分点，0 到 360）
  solarLongitudeDegrees: 0,

  lunarPhase: "full" as LunarPhaseSetting,
  // Used only when lunarPhase is "custom".
  // 仅在 lunarPhase 为 "custom" 时使用
  customLongitudeDifferenceDegrees: 180,
  customLunarLatitudeDegrees: 0,

  // Opacity of every cloud layer (0-1).
  // 所有云层的不透明度（0-1）
  cloudiness: 0,
  // Cloud animation speed multiplier (negative runs backwards).
  // 云动画速度倍数（负数为倒放）
  cloudsRate: 1,
  // Vertical offset of the cloud dome (0-1), needs a flattened cloud dome.
  // 云穹顶的垂直偏移（0-1），需要压扁的云穹顶
  cloudsYOffset: 0,
  // Dim the main light as clouds pass in front of it.
  // 云层经过时减弱主光
  cloudModulation: false,

  // Angular diameters in degrees (0-180, exclusive).
  // 角直径（度，0-180，开区间）
  solarDiameterDegrees: 4.0906,
  lunarDiameterDegrees: 4.0906,

  // Angle from the zenith to the rim of the top dome, in degrees.
  // 从天顶到顶部穹顶边缘的角度（度）
  topVerticalAngleDegrees: 90,
};

// ============================================================================
// Static config - fixed at compile time, not exposed to settings.
// 静态配置 - 编译时固定，不暴露给设置
// ============================================================================
export const skyStaticConfig = {
  // Earth's axial tilt in degrees.
  // 地轴倾角（度）
  obliquityDegrees: 23.44,
  // Day of year of the vernal equinox in the leap year 2000 (March 20).
  // 2000 闰年中春分的年积日（3 月 20 日）
  vernalEquinoxDayOfYear: 80,
  daysPerYear: 366,
  referenceYear: 2000,

  numCloudLayers: 6,
  sunObjectIndex: 0,
  firstMoonObjectIndex: 1,

  // Lighting palette (linear RGB).
  // 光照调色板（线性 RGB）
  colors: {
    clearDay: [0.4, 0.6, 1] as const,
    moonlight: [0.4, 0.4, 0.6] as const,
    starlight: [0.03, 0.03, 0.03] as const,
    sunlight: [0.8, 0.8, 0.75] as const,
    twilight: [0.6, 0.3, 0.15] as const,
  },

  lighting: {
    // Sine of solar altitude where the clear color fades out completely.
    // 晴空颜色完全消失时的太阳高度正弦
    limitOfTwilight: 0.1,
    // Sun altitude (sine) where twilight turns into full sunlight.
    // 曙暮光转为全日光时的太阳高度（正弦）
    sunriseBlendAltitude: 0.25,
    // Sun depth (sine) where twilight has faded into night.
    // 曙暮光完全转为夜晚时的太阳深度（正弦）
    nightBlendDepth: 0.04,
    // Cloud brightness while neither sun nor moon is up.
    // 太阳和月亮都不在地平线以上时的云亮度
    overcastCloudBrightness: 0.25,
    // Not perfectly vertical, to avoid shadow-map aliasing.
    // 不完全垂直，以避免阴影贴图走样
    starlightDirection: [1, 9, 1] as const,
    bloomGain: 6,
    maxBloom: 1.7,
    // Slope of the moon's illumination falloff away from full.
    // 月亮照度偏离满月时的衰减斜率
    moonIlluminationFalloff: 0.6,
  },

  // Angular offset (radians) of the probe point used to orient the moon texture.
  // 用于确定月亮纹理方向的探测点角度偏移（弧度）
  lunarRotationProbe: 0.01,

  objectScales: {
    sun: 0.08,
    moon: 0.02,
  },

  // Longitude of the moon relative to the sun, in units of π.
  // 月亮相对太阳的黄经差（以 π 为单位）
  lunarPhaseLongitudes: {
    full: 1,
    "waning-crescent": 1.75,
    "waning-gibbous": 1.25,
    "waxing-crescent": 0.25,
    "waxing-gibbous": 0.75,
  },

  clouds: {
    defaultScale: 1.5,
    // Layers below this index start with the default cloud texture.
    // 索引低于此值的云层使用默认云纹理
    texturedLayers: 2,
    evenLayerMotion: { u0: 0.4, uRate: -0.0005, v0: 0.3, vRate: 0.003 },
    oddLayerMotion: { u0: 0, uRate: 0.0003, v0: 0, vRate: 0.001 },
  },

  textures: {
    clouds: "Textures/skies/clouds/clouds.png",
    sun: "Textures/skies/suns/hazy-disc.png",
    haze: "Textures/skies/haze.png",
    moonDirectory: "Textures/skies/moon",
    starMapDirectory: "Textures/skies/star-maps",
  },
} as const;
