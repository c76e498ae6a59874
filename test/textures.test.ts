import { describe, expect, it } from "vitest";
import { DataTexture, FloatType, RGBAFormat, Texture } from "three";
import { IllegalStateError, InvalidArgumentError } from "@core/errors";
import { ImageRaster, TextureRegistry, createClearTexture, createSolidTexture } from "@sky/textures";

function stripe(): DataTexture {
  // 2x1 RGBA: red 0 on the left pixel, 255 on the right.
  const data = new Uint8Array([0, 0, 0, 255, 255, 0, 0, 255]);
  return new DataTexture(data, 2, 1, RGBAFormat);
}

function pixelData(texture: DataTexture): Uint8Array {
  const data: unknown = texture.image.data;
  if (!(data instanceof Uint8Array)) throw new Error("expected 8-bit data");
  return data;
}

describe("createSolidTexture", () => {
  it("stores the color as 8-bit RGBA", () => {
    const texture = createSolidTexture(1, 0.5, 0);
    expect(Array.from(pixelData(texture))).toEqual([255, 128, 0, 255]);
  });

  it("names the transparent placeholder", () => {
    const clear = createClearTexture();
    expect(clear.name).toBe("clear");
    expect(ImageRaster.fromTexture(clear).sampleRed(0.3, 0.7)).toBe(0);
  });
});

describe("ImageRaster", () => {
  it("reads the red channel of each pixel", () => {
    const raster = ImageRaster.fromTexture(stripe());
    expect(raster.width).toBe(2);
    expect(raster.height).toBe(1);
    expect(raster.channels).toBe(4);
    expect(raster.red(0, 0)).toBe(0);
    expect(raster.red(1, 0)).toBe(1);
    expect(raster.red(2, 0)).toBe(0);
    expect(raster.red(-1, 0)).toBe(1);
  });

  it("interpolates bilinearly with wrapping", () => {
    const raster = ImageRaster.fromTexture(stripe());
    expect(raster.sampleRed(0, 0)).toBe(0);
    expect(raster.sampleRed(0.25, 0)).toBeCloseTo(0.5, 10);
    expect(raster.sampleRed(0.5, 0)).toBe(1);
    expect(raster.sampleRed(0.75, 0)).toBeCloseTo(0.5, 10);
    expect(raster.sampleRed(1.25, 0.6)).toBeCloseTo(0.5, 10);
  });

  it("clamps float pixel data", () => {
    const data = new Float32Array([2, 0, 0, 1]);
    const texture = new DataTexture(data, 1, 1, RGBAFormat, FloatType);
    expect(ImageRaster.fromTexture(texture).red(0, 0)).toBe(1);
  });

  it("rejects textures without CPU-side pixels", () => {
    expect(() => ImageRaster.fromTexture(new Texture())).toThrow(IllegalStateError);
  });

  it("rejects pixel data that does not fit the size", () => {
    const texture = new DataTexture(new Uint8Array(7), 2, 1, RGBAFormat);
    expect(() => ImageRaster.fromTexture(texture)).toThrow(IllegalStateError);
  });
});

describe("TextureRegistry", () => {
  it("returns registered textures", () => {
    const texture = createSolidTexture(1, 1, 1);
    const registry = new TextureRegistry().register("sun.png", texture);

    expect(registry.has("sun.png")).toBe(true);
    expect(registry.load("sun.png")).toBe(texture);
  });

  it("throws for unknown paths without a fallback", () => {
    const registry = new TextureRegistry();
    expect(() => registry.load("missing.png")).toThrow(InvalidArgumentError);
    expect(() => registry.register("", createClearTexture())).toThrow(InvalidArgumentError);
  });

  it("creates and caches fallback textures", () => {
    const requested: string[] = [];
    const registry = new TextureRegistry({
      fallback: (path) => {
        requested.push(path);
        return createClearTexture();
      },
    });

    const first = registry.load("a.png");
    expect(registry.load("a.png")).toBe(first);
    expect(requested).toEqual(["a.png"]);
    expect(registry.has("a.png")).toBe(true);

    registry.dispose();
    expect(registry.has("a.png")).toBe(false);
  });
});
