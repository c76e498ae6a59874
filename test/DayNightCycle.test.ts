import { describe, expect, it } from "vitest";
import { Color } from "three";
import {
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
  starlightDirection,
} from "@sky/DayNightCycle";
import { expectColor, expectVec3 } from "./helpers";

describe("DayNightCycle", () => {
  it("fades the clear color through twilight", () => {
    expect(calculateDayFraction(0.5)).toBe(1);
    expect(calculateDayFraction(0)).toBe(1);
    expect(calculateDayFraction(-0.05)).toBeCloseTo(0.5, 10);
    expect(calculateDayFraction(-0.2)).toBe(0);
  });

  it("weights the moon by its phase", () => {
    expect(calculateMoonIllumination(Math.PI)).toBe(1);
    expect(calculateMoonIllumination(0)).toBe(0);
    expect(calculateMoonIllumination(Math.PI / 2)).toBeCloseTo(1 - 0.3 * Math.PI, 10);
    expect(calculateMoonIllumination(Math.PI, 0.5)).toBeCloseTo(0.7, 10);
  });

  it("chooses the sun, then a lit moon, then the stars", () => {
    expect(chooseMainLightSource(true, true, 1)).toBe("sun");
    expect(chooseMainLightSource(false, true, 0.5)).toBe("moon");
    expect(chooseMainLightSource(false, true, 0)).toBe("stars");
    expect(chooseMainLightSource(false, false, 1)).toBe("stars");
  });

  it("blends the base color from sunlight to night", () => {
    expectColor(calculateBaseColor(0.5, false, 0), 0.8, 0.8, 0.75);
    expectColor(calculateBaseColor(0, false, 0), 0.6, 0.3, 0.15);
    expectColor(calculateBaseColor(0.125, false, 0), 0.7, 0.55, 0.45);
    expectColor(calculateBaseColor(-0.02, false, 0), 0.315, 0.165, 0.09);
    expectColor(calculateBaseColor(-1, false, 0), 0.03, 0.03, 0.03);
    expectColor(calculateBaseColor(-1, true, 1), 0.4, 0.4, 0.6);
  });

  it("uses pure starlight when a lit moon is below the horizon", () => {
    expectColor(calculateBaseColor(-0.5, false, 1), 0.03, 0.03, 0.03);
    expect(chooseMainLightSource(false, false, 1)).toBe("stars");
    expectColor(calculateMainLightColor("stars", new Color(0.03, 0.03, 0.03), -0.5, 1, 1), 0.03, 0.03, 0.03);
  });

  it("normalizes the cloud color and darkens it on moonless nights", () => {
    expectColor(calculateCloudsColor(new Color(0.8, 0.8, 0.75), true, false), 1, 1, 0.9375);
    expectColor(calculateCloudsColor(new Color(0, 0, 0), true, false), 1, 1, 1);
    expectColor(calculateCloudsColor(new Color(0.03, 0.03, 0.03), false, false), 0.25, 0.25, 0.25);
    expectColor(calculateCloudsColor(new Color(0.4, 0.4, 0.6), false, true), 2 / 3, 2 / 3, 1);
  });

  it("colors the main light by source", () => {
    const base = new Color(0.8, 0.8, 0.75);
    expectColor(calculateMainLightColor("sun", base, 1, 0.5, 0), 0.4, 0.4, 0.375);
    expectColor(calculateMainLightColor("sun", base, 0.125, 1, 0), 0.4, 0.4, 0.375);
    expectColor(calculateMainLightColor("moon", base, -1, 1, 1), 0.4, 0.4, 0.6);
    expectColor(calculateMainLightColor("moon", base, -1, 0, 1), 0.03, 0.03, 0.03);
    expectColor(calculateMainLightColor("stars", base, -1, 1, 0), 0.03, 0.03, 0.03);
  });

  it("fills the ambient light up to the main light's slack", () => {
    expectColor(calculateAmbientColor(new Color(1, 1, 1), new Color(0.4, 0.4, 0.375)), 0.6, 0.6, 0.6);
    expectColor(calculateAmbientColor(new Color(1, 1, 1), new Color(1.2, 0, 0)), 0, 0, 0);
  });

  it("computes shadow intensity as the main light's share", () => {
    const night = calculateShadowIntensity(new Color(0.03, 0.03, 0.03), new Color(0.2425, 0.2425, 0.2425));
    expect(night).toBeCloseTo(0.09 / 0.8175, 10);
    expect(calculateShadowIntensity(new Color(0, 0, 0), new Color(0, 0, 0))).toBe(0);
    expect(calculateShadowIntensity(new Color(1, 1, 1), new Color(0, 0, 0))).toBe(1);
  });

  it("limits bloom to [0, 1.7]", () => {
    expect(calculateBloomIntensity(0.1)).toBeCloseTo(0.6, 10);
    expect(calculateBloomIntensity(1)).toBe(1.7);
    expect(calculateBloomIntensity(-1)).toBe(0);
  });

  it("reddens the sun and yellows the moon near the horizon", () => {
    expectColor(calculateSunColor(0.5), 1, 1, 0.4);
    expectColor(calculateSunColor(0), 1, 0, 0);
    expectColor(calculateMoonColor(0.5), 1, 1, 1);
    expectColor(calculateMoonColor(0), 1, 0.6, 0.1);
  });

  it("tilts starlight slightly off vertical", () => {
    const n = Math.sqrt(83);
    expectVec3(starlightDirection(), 1 / n, 9 / n, 1 / n);
  });
});
