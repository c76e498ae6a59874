import { describe, expect, it } from "vitest";
import {
  applySettingsPatch,
  cloneSettings,
  createDefaultSkySettings,
  mergeSettingsWithDefaults,
} from "@settings/index";
import { recordingLogger } from "./helpers";

describe("sky settings", () => {
  it("creates defaults from the runtime config", () => {
    const settings = createDefaultSkySettings();
    expect(settings.sky.latitudeDegrees).toBe(51.1788);
    expect(settings.sky.lunarPhase).toBe("full");
    expect(settings.time).toEqual({ timeOfDay: 12, timeSpeed: 60, timePaused: false });
  });

  it("patches nested values in place", () => {
    const settings = createDefaultSkySettings();
    applySettingsPatch(settings, { sky: { cloudiness: 0.5 }, time: { timePaused: true } });

    expect(settings.sky.cloudiness).toBe(0.5);
    expect(settings.sky.cloudsRate).toBe(1);
    expect(settings.time.timePaused).toBe(true);
  });

  it("clones deeply", () => {
    const settings = createDefaultSkySettings();
    const copy = cloneSettings(settings);
    copy.sky.cloudiness = 0.9;
    expect(settings.sky.cloudiness).toBe(0);
  });

  it("fills missing fields from defaults", () => {
    const merged = mergeSettingsWithDefaults('{"sky":{"cloudiness":0.25,"lunarPhase":"none"}}');
    expect(merged.sky.cloudiness).toBe(0.25);
    expect(merged.sky.lunarPhase).toBe("none");
    expect(merged.sky.latitudeDegrees).toBe(51.1788);
    expect(merged.time.timeOfDay).toBe(12);
  });

  it("ignores unknown keys and mistyped values", () => {
    const merged = mergeSettingsWithDefaults('{"sky":{"cloudiness":"lots","fog":1},"time":{"timeSpeed":null},"extra":true}');
    expect(merged).toEqual(createDefaultSkySettings());
  });

  it("falls back to defaults for malformed JSON", () => {
    const logger = recordingLogger();
    const merged = mergeSettingsWithDefaults("{not json", logger);

    expect(merged).toEqual(createDefaultSkySettings());
    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0].level).toBe("warn");
    expect(logger.lines[0].message.startsWith("[Settings] Ignoring malformed settings JSON: ")).toBe(true);
  });

  it("returns defaults for empty input", () => {
    expect(mergeSettingsWithDefaults(null)).toEqual(createDefaultSkySettings());
    expect(mergeSettingsWithDefaults("")).toEqual(createDefaultSkySettings());
  });
});
