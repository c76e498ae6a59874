// Sky textures: texture source contract, in-memory registry and CPU-side raster sampling.
// 天空纹理：纹理源接口、内存注册表与 CPU 端栅格采样

import { DataTexture, RGBAFormat, RepeatWrapping, type Texture } from "three";
import { IllegalStateError, InvalidArgumentError } from "@core/errors";
import { modulo } from "@core/math";

/**
 * Supplies textures by asset path. Loading from storage is the host's job.
 * 按资源路径提供纹理。从存储加载由宿主负责
 */
export interface SkyTextureSource {
  load(path: string): Texture;
}

type PixelArray = Uint8Array | Uint8ClampedArray | Float32Array;

function isPixelArray(value: unknown): value is PixelArray {
  return value instanceof Uint8Array || value instanceof Uint8ClampedArray || value instanceof Float32Array;
}

/**
 * Single-color RGBA texture (channels in [0, 1]).
 * 单色 RGBA 纹理（通道在 [0, 1]）
 */
export function createSolidTexture(r: number, g: number, b: number, a = 1): DataTexture {
  const data = new Uint8Array([r, g, b, a].map((channel) => Math.round(channel * 255)));
  const texture = new DataTexture(data, 1, 1, RGBAFormat);
  texture.wrapS = RepeatWrapping;
  texture.wrapT = RepeatWrapping;
  texture.needsUpdate = true;
  return texture;
}

/**
 * Fully transparent placeholder bound to unused cloud layers.
 * 绑定到未使用云层的全透明占位纹理
 */
export function createClearTexture(): DataTexture {
  const texture = createSolidTexture(0, 0, 0, 0);
  texture.name = "clear";
  return texture;
}

export type TextureRegistryOptions = {
  /** Called for unregistered paths; without it, unknown paths throw. / 未注册路径时调用；没有则抛出异常 */
  fallback?: (path: string) => Texture;
};

/**
 * In-memory texture source keyed by asset path.
 * 以资源路径为键的内存纹理源
 */
export class TextureRegistry implements SkyTextureSource {
  private readonly textures = new Map<string, Texture>();
  private readonly fallback: ((path: string) => Texture) | null;

  constructor(options: TextureRegistryOptions = {}) {
    this.fallback = options.fallback ?? null;
  }

  register(path: string, texture: Texture): this {
    if (path.length === 0) {
      throw new InvalidArgumentError("TextureRegistry", "path must not be empty");
    }
    this.textures.set(path, texture);
    return this;
  }

  has(path: string): boolean {
    return this.textures.has(path);
  }

  load(path: string): Texture {
    const texture = this.textures.get(path);
    if (texture) {
      return texture;
    }
    if (!this.fallback) {
      throw new InvalidArgumentError("TextureRegistry", `No texture registered for "${path}"`);
    }
    const created = this.fallback(path);
    this.textures.set(path, created);
    return created;
  }

  dispose(): void {
    for (const texture of this.textures.values()) {
      texture.dispose();
    }
    this.textures.clear();
  }
}

/**
 * Read-only view of a texture's pixels for transmittance sampling.
 * 用于透射率采样的纹理像素只读视图
 *
 * 8-bit data is normalized by 255; float data is clamped into [0, 1].
 */
export class ImageRaster {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  private readonly data: PixelArray;

  private constructor(data: PixelArray, width: number, height: number, channels: number) {
    this.data = data;
    this.width = width;
    this.height = height;
    this.channels = channels;
  }

  /**
   * Wrap the pixel data of a texture (e.g. a DataTexture).
   * 包装纹理的像素数据（例如 DataTexture）
   */
  static fromTexture(texture: Texture): ImageRaster {
    const image: unknown = texture.image;
    if (typeof image !== "object" || image === null || !("data" in image) || !("width" in image) || !("height" in image)) {
      throw new IllegalStateError("ImageRaster", `Texture "${texture.name}" has no CPU-side pixel data`);
    }
    const { data, width, height } = image;
    if (!isPixelArray(data) || typeof width !== "number" || typeof height !== "number") {
      throw new IllegalStateError("ImageRaster", `Texture "${texture.name}" has unsupported pixel data`);
    }
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new IllegalStateError("ImageRaster", `Texture "${texture.name}" has invalid size ${width}x${height}`);
    }
    const channels = data.length / (width * height);
    if (!Number.isInteger(channels) || channels < 1) {
      throw new IllegalStateError(
        "ImageRaster",
        `Texture "${texture.name}" has ${data.length} values for ${width}x${height} pixels`
      );
    }
    return new ImageRaster(data, width, height, channels);
  }

  /**
   * Red channel of one pixel, in [0, 1]. Coordinates wrap.
   * 单个像素的红色通道，范围 [0, 1]。坐标环绕
   */
  red(x: number, y: number): number {
    const column = modulo(x, this.width);
    const row = modulo(y, this.height);
    const value = this.data[(row * this.width + column) * this.channels];
    if (this.data instanceof Float32Array) {
      return Math.min(1, Math.max(0, value));
    }
    return value / 255;
  }

  /**
   * Bilinearly filtered red channel at texture coordinates, with repeat wrapping.
   * 纹理坐标处双线性过滤的红色通道，重复环绕
   */
  sampleRed(u: number, v: number): number {
    const x = modulo(u, 1) * this.width;
    const y = modulo(v, 1) * this.height;
    const x0 = Math.floor(x);
    const y0 = Math.floor(y);
    const fx = x - x0;
    const fy = y - y0;

    const top = this.red(x0, y0) * (1 - fx) + this.red(x0 + 1, y0) * fx;
    const bottom = this.red(x0, y0 + 1) * (1 - fx) + this.red(x0 + 1, y0 + 1) * fx;
    return top * (1 - fy) + bottom * fy;
  }
}
