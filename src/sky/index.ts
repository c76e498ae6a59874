// Sky module barrel exports.
// Sky 模块桶导出

export { TimeAndPlace, convertToEquatorial, dayOfYear } from "./TimeAndPlace";
export { DomeMesh, type DomeMeshOptions } from "./DomeMesh";
export { CloudLayer, type CloudMotion } from "./CloudLayer";
export {
  SkyMaterialState,
  computeObjectTransform,
  parameterName,
  pickMaterialShape,
  cloudParameterKinds,
  globalParameterKinds,
  objectParameterKinds,
  type CloudParameterKind,
  type CloudSlot,
  type GlobalParameterKind,
  type ObjectParameterKind,
  type ObjectSlot,
  type ObjectTransform,
  type SkyMaterialShape,
  type SkyMaterialStateOptions,
  type SkyParameterKey,
  type SkyParameterValue,
  type SkyUniforms,
} from "./SkyMaterialState";
export {
  isLunarPhasePreset,
  lunarLongitudeDifference,
  lunarPhaseFromDescription,
  lunarPhaseImagePath,
  lunarPhaseObjectIndex,
  nearestLunarPhasePreset,
  type LunarPhase,
} from "./LunarPhase";
export {
  calculateAmbientColor,
  calculateBaseColor,
  calculateBloomIntensity,
  calculateCloudsColor,
  calculateDayFraction,
  calculateMainLightColor,
  calculateMoonColor,
  calculateMoonIllumination,
  calculateShadowIntensity,
  calculateSunColor,
  chooseMainLightSource,
  paletteColor,
  starlightDirection,
  type MainLightSource,
  type PaletteColor,
} from "./DayNightCycle";
export { intersectCloudDome } from "./cloudDome";
export {
  LightingUpdater,
  type BloomTarget,
  type LightingSink,
  type LightingSnapshot,
  type ShadowTarget,
} from "./LightingUpdater";
export {
  ImageRaster,
  TextureRegistry,
  createClearTexture,
  createSolidTexture,
  type SkyTextureSource,
  type TextureRegistryOptions,
} from "./textures";
export { SkySystem, type LunarPhaseMode, type SkySystemOptions } from "./SkySystem";
