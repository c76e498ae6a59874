import { expect } from "vitest";
import type { Color, Vector2, Vector3, Vector4 } from "three";
import type { SkyLogger } from "@core/logging";
import { TextureRegistry, createSolidTexture } from "@sky/textures";

export type LoggedLine = { level: "info" | "warn" | "error"; message: string };

export function recordingLogger(): SkyLogger & { lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  return {
    lines,
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    error: (message) => lines.push({ level: "error", message }),
  };
}

/** Every unregistered path resolves to a 1x1 texture with the given red channel. */
export function solidTextures(red = 1): TextureRegistry {
  return new TextureRegistry({ fallback: () => createSolidTexture(red, red, red, 1) });
}

export function expectVec2(actual: Vector2 | null, x: number, y: number, digits = 6): void {
  expect(actual).not.toBeNull();
  if (!actual) return;
  expect(actual.x).toBeCloseTo(x, digits);
  expect(actual.y).toBeCloseTo(y, digits);
}

export function expectVec3(actual: Vector3 | null, x: number, y: number, z: number, digits = 6): void {
  expect(actual).not.toBeNull();
  if (!actual) return;
  expect(actual.x).toBeCloseTo(x, digits);
  expect(actual.y).toBeCloseTo(y, digits);
  expect(actual.z).toBeCloseTo(z, digits);
}

export function expectVec4(actual: Vector4, x: number, y: number, z: number, w: number, digits = 6): void {
  expect(actual.x).toBeCloseTo(x, digits);
  expect(actual.y).toBeCloseTo(y, digits);
  expect(actual.z).toBeCloseTo(z, digits);
  expect(actual.w).toBeCloseTo(w, digits);
}

export function expectColor(actual: Color, r: number, g: number, b: number, digits = 6): void {
  expect(actual.r).toBeCloseTo(r, digits);
  expect(actual.g).toBeCloseTo(g, digits);
  expect(actual.b).toBeCloseTo(b, digits);
}
