// SkyMaterialState: shading parameters for sky objects and cloud layers.
// SkyMaterialState：天体与云层的着色参数
//
// Slots are bound lazily and never removed; a hidden object keeps its texture and colors.
// 槽位延迟绑定且不会移除；隐藏的天体保留其纹理和颜色。

import { Color, Vector2, Vector4, type Texture } from "three";
import { domeStaticConfig, stretchCoefficient } from "@config/dome";
import { skyStaticConfig } from "@config/sky";
import {
  ConfigurationOverflowError,
  IllegalStateError,
  InvalidArgumentError,
  assertNever,
} from "@core/errors";
import { saturate, wrapFraction } from "@core/math";
import { requireFinite, requireIndex, requireIntegerAtLeast, requirePositive } from "@core/validate";
import { ImageRaster } from "./textures";

const COMPONENT = "SkyMaterialState";

// ============================================================================
// Material shapes
// 材质形态
// ============================================================================

/** `domeOL`: O = object capacity, L = cloud-layer capacity. / O = 天体容量，L = 云层容量 */
export type SkyMaterialShape = "dome02" | "dome20" | "dome22" | "dome06" | "dome60" | "dome66";

const MAX_SHAPE_CAPACITY = 6;

/**
 * Smallest shape that holds the requested counts.
 * 能容纳所请求数量的最小形态
 */
export function pickMaterialShape(maxObjects: number, maxCloudLayers: number): SkyMaterialShape {
  requireIntegerAtLeast(COMPONENT, "maxObjects", maxObjects, 0);
  requireIntegerAtLeast(COMPONENT, "maxCloudLayers", maxCloudLayers, 0);

  if (maxObjects === 0 && maxCloudLayers <= 2) return "dome02";
  if (maxObjects <= 2 && maxCloudLayers === 0) return "dome20";
  if (maxObjects <= 2 && maxCloudLayers <= 2) return "dome22";
  if (maxObjects === 0 && maxCloudLayers <= MAX_SHAPE_CAPACITY) return "dome06";
  if (maxObjects <= MAX_SHAPE_CAPACITY && maxCloudLayers === 0) return "dome60";
  if (maxObjects <= MAX_SHAPE_CAPACITY && maxCloudLayers <= MAX_SHAPE_CAPACITY) return "dome66";

  throw new ConfigurationOverflowError(
    COMPONENT,
    `Too many objects/cloud layers: ${maxObjects} objects, ${maxCloudLayers} layers (max ${MAX_SHAPE_CAPACITY} each)`
  );
}

// ============================================================================
// Slots
// 槽位
// ============================================================================

export type ObjectSlot =
  | { kind: "unconfigured" }
  | { kind: "hidden"; texture: Texture; color: Color; glow: Color }
  | {
      kind: "visible";
      texture: Texture;
      color: Color;
      glow: Color;
      center: Vector2;
      transformU: Vector2;
      transformV: Vector2;
    };

type BoundObjectSlot = Exclude<ObjectSlot, { kind: "unconfigured" }>;

export type CloudSlot =
  | { kind: "unconfigured" }
  | {
      kind: "bound";
      texture: Texture;
      raster: ImageRaster;
      /** RGB plus opacity in alpha. / RGB 加 alpha 中的不透明度 */
      color: Vector4;
      glow: Color;
      offset: Vector2;
      scale: number;
    };

type BoundCloudSlot = Extract<CloudSlot, { kind: "bound" }>;

// ============================================================================
// Parameter keys
// 参数键
// ============================================================================

export const objectParameterKinds = [
  "colorMap",
  "center",
  "transformU",
  "transformV",
  "color",
  "glow",
  "visible",
] as const;
export const cloudParameterKinds = ["alphaMap", "color", "glow", "offset", "scale"] as const;
export const globalParameterKinds = [
  "clearColor",
  "clearGlow",
  "hazeAlphaMap",
  "hazeColor",
  "starsColorMap",
  "topCoord",
] as const;

export type ObjectParameterKind = (typeof objectParameterKinds)[number];
export type CloudParameterKind = (typeof cloudParameterKinds)[number];
export type GlobalParameterKind = (typeof globalParameterKinds)[number];

export type SkyParameterKey =
  | { scope: "object"; index: number; kind: ObjectParameterKind }
  | { scope: "clouds"; index: number; kind: CloudParameterKind }
  | { scope: "global"; kind: GlobalParameterKind };

export type SkyParameterValue = number | boolean | Vector2 | Vector4 | Color | Texture;

/** three.js-style uniform map handed to a renderer. / 交给渲染器的 three.js 风格 uniform 映射 */
export type SkyUniforms = Record<string, { value: SkyParameterValue }>;

function capitalize(kind: string): string {
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}

/**
 * Uniform name of a parameter, e.g. "Object0Center", "Clouds1Offset", "ClearColor".
 * 参数的 uniform 名称
 */
export function parameterName(key: SkyParameterKey): string {
  switch (key.scope) {
    case "object":
      return `Object${key.index}${capitalize(key.kind)}`;
    case "clouds":
      return `Clouds${key.index}${capitalize(key.kind)}`;
    case "global":
      return capitalize(key.kind);
    default:
      return assertNever(key, "Unknown parameter scope");
  }
}

export type ObjectTransform = { u: Vector2; v: Vector2 };

export type SkyMaterialStateOptions = {
  /** Texture coordinates of the zenith. / 天顶的纹理坐标 */
  topCoord?: Vector2;
};

/**
 * Shading-parameter store for one sky dome material.
 * 单个天空穹顶材质的着色参数存储
 */
export class SkyMaterialState {
  readonly maxObjects: number;
  readonly maxCloudLayers: number;
  readonly shape: SkyMaterialShape;

  private readonly objects: ObjectSlot[];
  private readonly clouds: CloudSlot[];
  private readonly topCoord: Vector2;

  private readonly clearColor: Vector4;
  private readonly clearGlow = new Color(0, 0, 0);
  private haze: { alphaMap: Texture; color: Color } | null = null;
  private starsColorMap: Texture | null = null;

  constructor(maxObjects: number, maxCloudLayers: number, options: SkyMaterialStateOptions = {}) {
    this.shape = pickMaterialShape(maxObjects, maxCloudLayers);
    this.maxObjects = maxObjects;
    this.maxCloudLayers = maxCloudLayers;
    this.objects = Array.from({ length: maxObjects }, (): ObjectSlot => ({ kind: "unconfigured" }));
    this.clouds = Array.from({ length: maxCloudLayers }, (): CloudSlot => ({ kind: "unconfigured" }));
    this.topCoord = options.topCoord?.clone() ?? new Vector2(domeStaticConfig.topU, domeStaticConfig.topV);

    const [r, g, b] = skyStaticConfig.colors.clearDay;
    this.clearColor = new Vector4(r, g, b, 1);
  }

  // ==========================================================================
  // Objects
  // 天体
  // ==========================================================================

  /**
   * Bind a texture to an object slot. The first bind places it at the zenith,
   * scale 1, white with no glow.
   * 将纹理绑定到天体槽位。首次绑定时位于天顶，缩放 1，白色无辉光
   */
  addObject(index: number, texture: Texture): void {
    this.requireObjectIndex(index);
    const slot = this.objects[index];
    if (slot.kind !== "unconfigured") {
      slot.texture = texture;
      return;
    }
    this.objects[index] = {
      kind: "visible",
      texture,
      color: new Color(1, 1, 1),
      glow: new Color(0, 0, 0),
      center: this.topCoord.clone(),
      transformU: new Vector2(1, 0),
      transformV: new Vector2(0, 1),
    };
  }

  /**
   * Place and size an object, revealing it if hidden.
   * 放置并缩放天体，如已隐藏则显示
   *
   * @param center - Texture coordinates of the object's center.
   * @param scale - Angular scale (> 0); larger objects need smaller texture transforms.
   * @param rotation - Direction of the texture's "up" in UV space; null keeps the radial orientation.
   */
  setObjectTransform(index: number, center: Vector2, scale: number, rotation: Vector2 | null = null): void {
    const slot = this.boundObject(index);
    requirePositive(COMPONENT, "scale", scale);
    if (rotation && rotation.lengthSq() === 0) {
      throw new InvalidArgumentError(COMPONENT, "rotation must be non-zero");
    }

    const { u, v } = computeObjectTransform(center.clone().sub(this.topCoord), scale, rotation);
    this.objects[index] = {
      kind: "visible",
      texture: slot.texture,
      color: slot.color,
      glow: slot.glow,
      center: center.clone(),
      transformU: u,
      transformV: v,
    };
  }

  /**
   * Hide an object until its next transform.
   * 隐藏天体，直到下一次设置变换
   */
  hideObject(index: number): void {
    const slot = this.boundObject(index);
    this.objects[index] = { kind: "hidden", texture: slot.texture, color: slot.color, glow: slot.glow };
  }

  setObjectColor(index: number, color: Color): void {
    this.boundObject(index).color.copy(color);
  }

  setObjectGlow(index: number, glow: Color): void {
    this.boundObject(index).glow.copy(glow);
  }

  isObjectVisible(index: number): boolean {
    return this.boundObject(index).kind === "visible";
  }

  /** Center UV of a visible object, null while hidden. / 可见天体的中心 UV，隐藏时为 null */
  getObjectCenter(index: number): Vector2 | null {
    const slot = this.boundObject(index);
    return slot.kind === "visible" ? slot.center.clone() : null;
  }

  getObjectTransform(index: number): ObjectTransform | null {
    const slot = this.boundObject(index);
    return slot.kind === "visible" ? { u: slot.transformU.clone(), v: slot.transformV.clone() } : null;
  }

  getObjectColor(index: number): Color {
    return this.boundObject(index).color.clone();
  }

  getObjectSlotKind(index: number): ObjectSlot["kind"] {
    this.requireObjectIndex(index);
    return this.objects[index].kind;
  }

  // ==========================================================================
  // Cloud layers
  // 云层
  // ==========================================================================

  /**
   * Bind an alpha map to a cloud layer. The texture must carry pixel data.
   * 将 alpha 贴图绑定到云层。纹理必须带有像素数据
   */
  addClouds(index: number, texture: Texture): void {
    this.requireCloudIndex(index);
    const raster = ImageRaster.fromTexture(texture);
    const slot = this.clouds[index];
    if (slot.kind === "bound") {
      slot.texture = texture;
      slot.raster = raster;
      return;
    }
    this.clouds[index] = {
      kind: "bound",
      texture,
      raster,
      color: new Vector4(1, 1, 1, 1),
      glow: new Color(0, 0, 0),
      offset: new Vector2(0, 0),
      scale: 1,
    };
  }

  /**
   * Set a layer's color; alpha is the layer's opacity.
   * 设置云层颜色；alpha 为云层不透明度
   */
  setCloudsColor(index: number, color: Vector4): void {
    this.boundClouds(index).color.copy(color);
  }

  setCloudsGlow(index: number, glow: Color): void {
    this.boundClouds(index).glow.copy(glow);
  }

  /** Texture offset, wrapped into [0, 1). / 纹理偏移，包裹到 [0, 1) */
  setCloudsOffset(index: number, u: number, v: number): void {
    const slot = this.boundClouds(index);
    requireFinite(COMPONENT, "u", u);
    requireFinite(COMPONENT, "v", v);
    slot.offset.set(wrapFraction(u), wrapFraction(v));
  }

  setCloudsScale(index: number, scale: number): void {
    const slot = this.boundClouds(index);
    requirePositive(COMPONENT, "scale", scale);
    slot.scale = scale;
  }

  getCloudsColor(index: number): Vector4 {
    return this.boundClouds(index).color.clone();
  }

  getCloudsOffset(index: number): Vector2 {
    return this.boundClouds(index).offset.clone();
  }

  getCloudsScale(index: number): number {
    return this.boundClouds(index).scale;
  }

  isCloudsBound(index: number): boolean {
    this.requireCloudIndex(index);
    return this.clouds[index].kind === "bound";
  }

  // ==========================================================================
  // Global parameters
  // 全局参数
  // ==========================================================================

  /** Clear-sky color; alpha fades it in and out. / 晴空颜色；alpha 控制淡入淡出 */
  setClearColor(color: Vector4): void {
    this.clearColor.copy(color);
  }

  getClearColor(): Vector4 {
    return this.clearColor.clone();
  }

  setClearGlow(glow: Color): void {
    this.clearGlow.copy(glow);
  }

  addHaze(alphaMap: Texture): void {
    if (this.haze) {
      this.haze.alphaMap = alphaMap;
    } else {
      this.haze = { alphaMap, color: new Color(1, 1, 1) };
    }
  }

  setHazeColor(color: Color): void {
    if (!this.haze) {
      throw new IllegalStateError(COMPONENT, "Haze not yet added");
    }
    this.haze.color.copy(color);
  }

  getHazeColor(): Color | null {
    return this.haze ? this.haze.color.clone() : null;
  }

  addStars(colorMap: Texture): void {
    this.starsColorMap = colorMap;
  }

  removeStars(): void {
    this.starsColorMap = null;
  }

  // ==========================================================================
  // Transmission
  // 透射率
  // ==========================================================================

  /**
   * Fraction of light passing through every bound cloud layer, in [0, 1].
   * 穿过所有已绑定云层的光比例，范围 [0, 1]
   */
  getTransmission(coordinates: Vector2): number;
  /**
   * Transmission at an object's center (the hidden sentinel (0, 0) while hidden).
   * 天体中心处的透射率（隐藏时使用哨兵坐标 (0, 0)）
   */
  getTransmission(objectIndex: number): number;
  getTransmission(target: Vector2 | number): number {
    const coordinates = typeof target === "number" ? this.objectSampleCoordinates(target) : target;
    requireFinite(COMPONENT, "coordinates.x", coordinates.x);
    requireFinite(COMPONENT, "coordinates.y", coordinates.y);

    let result = 1;
    for (const slot of this.clouds) {
      if (slot.kind !== "bound") continue;

      const u = wrapFraction(coordinates.x * slot.scale + slot.offset.x);
      const v = wrapFraction(coordinates.y * slot.scale + slot.offset.y);
      const opacity = slot.raster.sampleRed(u, v) * saturate(slot.color.w);
      result *= 1 - opacity;
    }
    return saturate(result);
  }

  // ==========================================================================
  // Renderer boundary
  // 渲染器边界
  // ==========================================================================

  /**
   * Current value of one parameter; undefined while its slot is unbound or the
   * optional feature (haze, stars) is absent.
   * 单个参数的当前值；槽位未绑定或可选功能（雾霾、星空）缺失时为 undefined
   */
  getParameter(key: SkyParameterKey): SkyParameterValue | undefined {
    switch (key.scope) {
      case "object":
        this.requireObjectIndex(key.index);
        requireKind(objectParameterKinds, key.kind);
        return this.objectParameter(this.objects[key.index], key.kind);
      case "clouds":
        this.requireCloudIndex(key.index);
        requireKind(cloudParameterKinds, key.kind);
        return this.cloudParameter(this.clouds[key.index], key.kind);
      case "global":
        requireKind(globalParameterKinds, key.kind);
        return this.globalParameter(key.kind);
      default:
        return assertNever(key, "Unknown parameter scope");
    }
  }

  /**
   * Every defined parameter as named uniforms.
   * 所有已定义参数，以命名 uniform 形式输出
   */
  exportUniforms(): SkyUniforms {
    const uniforms: SkyUniforms = {};
    const put = (key: SkyParameterKey): void => {
      const value = this.getParameter(key);
      if (value !== undefined) {
        uniforms[parameterName(key)] = { value };
      }
    };

    for (let index = 0; index < this.maxObjects; index++) {
      for (const kind of objectParameterKinds) put({ scope: "object", index, kind });
    }
    for (let index = 0; index < this.maxCloudLayers; index++) {
      for (const kind of cloudParameterKinds) put({ scope: "clouds", index, kind });
    }
    for (const kind of globalParameterKinds) put({ scope: "global", kind });
    return uniforms;
  }

  // ==========================================================================
  // Private helpers
  // 私有辅助函数
  // ==========================================================================

  private objectParameter(slot: ObjectSlot, kind: ObjectParameterKind): SkyParameterValue | undefined {
    if (slot.kind === "unconfigured") return undefined;

    switch (kind) {
      case "colorMap":
        return slot.texture;
      case "color":
        return slot.color.clone();
      case "glow":
        return slot.glow.clone();
      case "visible":
        return slot.kind === "visible";
      case "center":
        return slot.kind === "visible" ? slot.center.clone() : new Vector2(0, 0);
      case "transformU":
        return slot.kind === "visible" ? slot.transformU.clone() : new Vector2(0, 0);
      case "transformV":
        return slot.kind === "visible" ? slot.transformV.clone() : new Vector2(0, 0);
      default:
        return assertNever(kind, "Unknown object parameter");
    }
  }

  private cloudParameter(slot: CloudSlot, kind: CloudParameterKind): SkyParameterValue | undefined {
    if (slot.kind === "unconfigured") return undefined;

    switch (kind) {
      case "alphaMap":
        return slot.texture;
      case "color":
        return slot.color.clone();
      case "glow":
        return slot.glow.clone();
      case "offset":
        return slot.offset.clone();
      case "scale":
        return slot.scale;
      default:
        return assertNever(kind, "Unknown cloud parameter");
    }
  }

  private globalParameter(kind: GlobalParameterKind): SkyParameterValue | undefined {
    switch (kind) {
      case "clearColor":
        return this.clearColor.clone();
      case "clearGlow":
        return this.clearGlow.clone();
      case "hazeAlphaMap":
        return this.haze?.alphaMap;
      case "hazeColor":
        return this.haze?.color.clone();
      case "starsColorMap":
        return this.starsColorMap ?? undefined;
      case "topCoord":
        return this.topCoord.clone();
      default:
        return assertNever(kind, "Unknown global parameter");
    }
  }

  private objectSampleCoordinates(index: number): Vector2 {
    const slot = this.boundObject(index);
    return slot.kind === "visible" ? slot.center : new Vector2(0, 0);
  }

  private requireObjectIndex(index: number): void {
    requireIndex(COMPONENT, "objectIndex", index, this.maxObjects);
  }

  private requireCloudIndex(index: number): void {
    requireIndex(COMPONENT, "layerIndex", index, this.maxCloudLayers);
  }

  private boundObject(index: number): BoundObjectSlot {
    this.requireObjectIndex(index);
    const slot = this.objects[index];
    if (slot.kind === "unconfigured") {
      throw new IllegalStateError(COMPONENT, `Object ${index} not yet added`);
    }
    return slot;
  }

  private boundClouds(index: number): BoundCloudSlot {
    this.requireCloudIndex(index);
    const slot = this.clouds[index];
    if (slot.kind === "unconfigured") {
      throw new IllegalStateError(COMPONENT, `Cloud layer ${index} not yet added`);
    }
    return slot;
  }
}

function requireKind(kinds: readonly string[], kind: string): void {
  if (!kinds.includes(kind)) {
    throw new InvalidArgumentError(COMPONENT, `Unknown parameter kind "${kind}"`);
  }
}

/**
 * Texture-coordinate transform of an object disc.
 * 天体圆盘的纹理坐标变换
 *
 * Near the horizon the disc is stretched radially by 1 + k·d², where d is the
 * UV distance from the zenith, so it still looks round on the dome.
 * 在地平线附近，圆盘沿径向拉伸 1 + k·d²（d 为到天顶的 UV 距离），使其在穹顶上仍呈圆形
 *
 * @param offset - Object center minus the top anchor, in UV.
 */
export function computeObjectTransform(offset: Vector2, scale: number, rotation: Vector2 | null): ObjectTransform {
  const topDistance = offset.length();
  const u = new Vector2();
  const v = new Vector2();

  if (topDistance > 0) {
    const a = offset.x / topDistance;
    const b = offset.y / topDistance;
    const tU = new Vector2(b, -a);
    const tV = new Vector2(a, b);
    tU.divideScalar(1 + stretchCoefficient * topDistance * topDistance);

    if (rotation) {
      u.set(tU.x * b + tV.x * a, tU.y * b + tV.y * a);
      v.set(tV.x * b - tU.x * a, tV.y * b - tU.y * a);
    } else {
      u.copy(tU);
      v.copy(tV);
    }
  } else {
    u.set(1, 0);
    v.set(0, 1);
  }

  if (rotation) {
    // Turn "up" toward the north horizon, then by the requested rotation.
    // 先将“上”转向北方地平线，再按请求的旋转角旋转
    const tU = v.clone();
    const tV = new Vector2(-u.x, -u.y);
    const norm = rotation.clone().normalize();
    u.set(tU.x * norm.x + tV.x * norm.y, tU.y * norm.x + tV.y * norm.y);
    v.set(tV.x * norm.x - tU.x * norm.y, tV.y * norm.x - tU.y * norm.y);
  }

  u.divideScalar(scale);
  v.divideScalar(scale);
  return { u, v };
}
