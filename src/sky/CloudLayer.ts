// CloudLayer: animation and appearance of one cloud layer.
// CloudLayer：单个云层的动画与外观

import { Color, Vector4 } from "three";
import { skyStaticConfig } from "@config/sky";
import { requireFinite, requireFraction, requireIndex, requirePositive } from "@core/validate";
import type { SkyMaterialState } from "./SkyMaterialState";
import { createClearTexture, type SkyTextureSource } from "./textures";

const COMPONENT = "CloudLayer";

/** Texture drift: initial offset plus rate in cycles per second. / 纹理漂移：初始偏移加速率（周期/秒） */
export type CloudMotion = {
  u0: number;
  uRate: number;
  v0: number;
  vRate: number;
};

/**
 * One layer of the cloud deck, rendered through a sky material's cloud slot.
 * 云层中的一层，通过天空材质的云槽位渲染
 *
 * Even and odd layers drift in different directions by default.
 * 偶数层与奇数层默认向不同方向漂移
 */
export class CloudLayer {
  readonly index: number;
  private readonly material: SkyMaterialState;
  private readonly textures: SkyTextureSource;

  private opacity = 0;
  private readonly color = new Color(1, 1, 1);
  private motion: CloudMotion;

  constructor(material: SkyMaterialState, index: number, textures: SkyTextureSource) {
    requireIndex(COMPONENT, "layerIndex", index, material.maxCloudLayers);
    this.material = material;
    this.index = index;
    this.textures = textures;

    const { clouds } = skyStaticConfig;
    this.motion = { ...(index % 2 === 0 ? clouds.evenLayerMotion : clouds.oddLayerMotion) };

    if (index < clouds.texturedLayers) {
      this.setTexture(skyStaticConfig.textures.clouds, clouds.defaultScale);
    } else {
      this.clearTexture();
    }
    this.applyColor();
  }

  getOpacity(): number {
    return this.opacity;
  }

  /**
   * Set the layer's opacity (0 = clear, 1 = fully opaque).
   * 设置云层不透明度（0 = 透明，1 = 完全不透明）
   */
  setOpacity(opacity: number): void {
    requireFraction(COMPONENT, "opacity", opacity);
    this.opacity = opacity;
    this.applyColor();
  }

  /**
   * Set the layer's color; the current opacity becomes its alpha.
   * 设置云层颜色；当前不透明度作为 alpha
   */
  setColor(color: Color): void {
    this.color.copy(color);
    this.applyColor();
  }

  getColor(): Color {
    return this.color.clone();
  }

  setGlow(glow: Color): void {
    this.material.setCloudsGlow(this.index, glow);
  }

  getMotion(): CloudMotion {
    return { ...this.motion };
  }

  setMotion(u0: number, uRate: number, v0: number, vRate: number): void {
    requireFinite(COMPONENT, "u0", u0);
    requireFinite(COMPONENT, "uRate", uRate);
    requireFinite(COMPONENT, "v0", v0);
    requireFinite(COMPONENT, "vRate", vRate);
    this.motion = { u0, uRate, v0, vRate };
  }

  /**
   * Bind an alpha map by asset path.
   * 按资源路径绑定 alpha 贴图
   *
   * @param scale - UV scale factor (> 0); larger values repeat the texture more.
   */
  setTexture(path: string, scale: number): void {
    requirePositive(COMPONENT, "scale", scale);
    this.material.addClouds(this.index, this.textures.load(path));
    this.material.setCloudsScale(this.index, scale);
  }

  /** Bind the transparent placeholder. / 绑定透明占位纹理 */
  clearTexture(): void {
    this.material.addClouds(this.index, createClearTexture());
    this.material.setCloudsScale(this.index, 1);
  }

  /**
   * Move the texture to its position at an animation time (seconds).
   * 将纹理移动到某个动画时间（秒）对应的位置
   */
  updateOffset(time: number): void {
    requireFinite(COMPONENT, "time", time);
    const { u0, uRate, v0, vRate } = this.motion;
    this.material.setCloudsOffset(this.index, u0 + time * uRate, v0 + time * vRate);
  }

  private applyColor(): void {
    const { r, g, b } = this.color;
    this.material.setCloudsColor(this.index, new Vector4(r, g, b, this.opacity));
  }
}
