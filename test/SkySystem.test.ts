import { describe, expect, it } from "vitest";
import { Group, Mesh, MeshBasicMaterial, PerspectiveCamera, Quaternion, Vector3 } from "three";
import { IllegalStateError, InvalidArgumentError } from "@core/errors";
import { silentLogger } from "@core/logging";
import { lunarPhasePresets } from "@config/sky";
import { LightingUpdater, type LightingSink, type LightingSnapshot } from "@sky/LightingUpdater";
import { lunarPhaseObjectIndex } from "@sky/LunarPhase";
import { SkySystem, type SkySystemOptions } from "@sky/SkySystem";
import type { TextureRegistry } from "@sky/textures";
import { expectColor, expectVec3, recordingLogger, solidTextures } from "./helpers";

class RecordingSink implements LightingSink {
  readonly snapshots: LightingSnapshot[] = [];

  update(snapshot: Readonly<LightingSnapshot>): void {
    this.snapshots.push({ ...snapshot });
  }

  get last(): LightingSnapshot {
    const snapshot = this.snapshots.at(-1);
    if (!snapshot) throw new Error("no snapshot recorded");
    return snapshot;
  }
}

function createSky(options: Partial<SkySystemOptions> = {}): {
  sky: SkySystem;
  sink: RecordingSink;
  textures: TextureRegistry;
} {
  const sink = new RecordingSink();
  const textures = solidTextures();
  const sky = new SkySystem({
    textures,
    rimSamples: 12,
    quadrantSamples: 4,
    lightingSink: sink,
    logger: silentLogger,
    ...options,
  });
  sky.setHost(new Group());
  sky.setEnabled(true);
  return { sky, sink, textures };
}

const starlight = new Vector3(1, 9, 1).normalize();

describe("SkySystem attachment", () => {
  it("cannot be enabled without a host", () => {
    const sky = new SkySystem({ textures: solidTextures(), rimSamples: 12, quadrantSamples: 4, logger: silentLogger });
    expect(() => sky.setEnabled(true)).toThrow(IllegalStateError);
    expect(sky.isEnabled()).toBe(false);
  });

  it("attaches its subtree to the host while enabled", () => {
    const logger = recordingLogger();
    const host = new Group();
    const sky = new SkySystem({ textures: solidTextures(), rimSamples: 12, quadrantSamples: 4, logger });
    sky.setHost(host);

    sky.setEnabled(true);
    expect(sky.getSubtree().parent).toBe(host);

    sky.setEnabled(false);
    expect(sky.getSubtree().parent).toBeNull();
    expect(logger.lines.filter((line) => line.message.startsWith("[SkySystem]"))).toEqual([
      { level: "info", message: "[SkySystem] Enabled" },
      { level: "info", message: "[SkySystem] Disabled" },
    ]);
  });

  it("disables itself when the host is cleared", () => {
    const { sky } = createSky();
    sky.setHost(null);
    expect(sky.isEnabled()).toBe(false);
  });

  it("builds the top and bottom domes", () => {
    const { sky } = createSky();
    const names = sky.getSubtree().children.map((child) => child.name);
    expect(names).toEqual(["top", "bottom"]);
    expect(sky.getTopMesh().vertexCount).toBe(37);
  });

  it("sizes the domes from the camera", () => {
    const { sky } = createSky();
    const camera = new PerspectiveCamera(60, 1, 1, 999);
    camera.position.set(3, 4, 5);
    sky.setCamera(camera);
    sky.update(0);

    expect(sky.getSubtree().scale.x).toBe(500);
    expectVec3(sky.getSubtree().position, 3, 4, 5);
  });

  it("follows the camera in world space under a transformed host", () => {
    const { sky } = createSky();
    const host = new Group();
    host.position.set(10, 0, 0);
    host.scale.setScalar(2);
    sky.setHost(host);

    const camera = new PerspectiveCamera(60, 1, 1, 999);
    camera.position.set(3, 4, 5);
    sky.setCamera(camera);
    sky.update(0);

    const subtree = sky.getSubtree();
    expectVec3(subtree.position, -3.5, 2, 2.5);
    expect(subtree.scale.x).toBe(250);
    expectVec3(subtree.getWorldPosition(new Vector3()), 3, 4, 5);
    expect(subtree.getWorldScale(new Vector3()).x).toBeCloseTo(500, 6);
  });

  it("defaults to a LightingUpdater sink", () => {
    const sky = new SkySystem({ textures: solidTextures(), rimSamples: 12, quadrantSamples: 4, logger: silentLogger });
    expect(sky.getLightingSink()).toBeInstanceOf(LightingUpdater);
  });
});

describe("SkySystem frame update", () => {
  it("rejects negative elapsed time", () => {
    const { sky } = createSky();
    expect(() => sky.update(-1)).toThrow(InvalidArgumentError);
  });

  it("does nothing while disabled", () => {
    const { sky, sink } = createSky();
    sky.setEnabled(false);
    sky.update(1);

    expect(sink.snapshots).toHaveLength(0);
    expect(sky.getCloudsAnimationTime()).toBe(0);
  });

  it("lights a clear noon with the sun", () => {
    const { sky, sink } = createSky();
    sky.timeAndPlace.setHour(12);
    sky.update(0);

    const snapshot = sink.last;
    const sun = sky.sunDirection();
    expectVec3(snapshot.mainDirection, sun.x, sun.y, sun.z);
    expectColor(snapshot.backgroundColor, 0.8, 0.8, 0.75);
    expect(snapshot.bloomIntensity).toBe(1.7);
    expect(sky.getTopMaterial().isObjectVisible(0)).toBe(true);
    expect(sky.getTopMaterial().getClearColor().w).toBe(1);
  });

  it("falls back to starlight on a moonless night", () => {
    const { sky, sink } = createSky();
    sky.setPhase(null);
    sky.timeAndPlace.setHour(0);
    sky.update(0);

    const snapshot = sink.last;
    expectVec3(snapshot.mainDirection, starlight.x, starlight.y, starlight.z);
    expectColor(snapshot.mainColor, 0.03, 0.03, 0.03);
    expectColor(snapshot.ambientColor, 0.2425, 0.2425, 0.2425);
    expect(snapshot.shadowIntensity).toBeCloseTo(0.09 / 0.8175, 6);
    expect(snapshot.bloomIntensity).toBe(0);
    expect(sky.getTopMaterial().isObjectVisible(0)).toBe(false);
    expect(sky.getTopMaterial().getClearColor().w).toBe(0);
    expectColor(sky.getCloudLayer(0).getColor(), 0.25, 0.25, 0.25);
  });

  it("ignores a lit moon below the horizon", () => {
    const { sky, sink } = createSky();
    sky.timeAndPlace.setObserverLatitude(0);
    sky.timeAndPlace.setHour(3);
    sky.setCustomPhase(Math.PI - 1, 0);
    sky.update(0);

    expect(sky.getMoonIllumination()).toBeCloseTo(0.4, 10);
    expect(sky.sunDirection().y).toBeCloseTo(-Math.SQRT1_2, 10);
    expect(sky.moonDirection()?.y).toBeLessThan(0);

    const snapshot = sink.last;
    expectVec3(snapshot.mainDirection, starlight.x, starlight.y, starlight.z);
    expectColor(snapshot.backgroundColor, 0.03, 0.03, 0.03);
    expectColor(snapshot.mainColor, 0.03, 0.03, 0.03);
    expect(snapshot.shadowIntensity).toBeCloseTo(0.09 / 0.8175, 6);
  });

  it("lights a full-moon midnight with the moon", () => {
    const { sky, sink } = createSky();
    sky.setPhase("full");
    sky.timeAndPlace.setHour(0);
    sky.update(0);

    const snapshot = sink.last;
    const sun = sky.sunDirection();
    expectVec3(snapshot.mainDirection, -sun.x, -sun.y, -sun.z);
    expectColor(snapshot.mainColor, 0.4, 0.4, 0.6);
    expectColor(snapshot.backgroundColor, 0.4, 0.4, 0.6);
    expect(snapshot.shadowIntensity).toBeCloseTo(0.6, 6);
    expect(sky.getTopMaterial().isObjectVisible(lunarPhaseObjectIndex("full"))).toBe(true);
  });

  it("shows only the active moon slot", () => {
    const { sky } = createSky();
    sky.setPhase("waxing-gibbous");
    sky.timeAndPlace.setHour(20);
    sky.update(0);

    const material = sky.getTopMaterial();
    for (const preset of lunarPhasePresets) {
      if (preset === "waxing-gibbous") continue;
      expect(material.getObjectSlotKind(lunarPhaseObjectIndex(preset))).toBe("hidden");
    }
  });

  it("shows the nearest preset for a custom phase", () => {
    const { sky } = createSky();
    sky.setCustomPhase(0.95 * Math.PI, 0);
    sky.timeAndPlace.setHour(0);
    sky.update(0);

    expect(sky.getPhase()).toEqual({ kind: "custom", longitudeDifference: 0.95 * Math.PI, lunarLatitude: 0 });
    expect(sky.getTopMaterial().isObjectVisible(lunarPhaseObjectIndex("full"))).toBe(true);
    expect(sky.getMoonIllumination()).toBeCloseTo(1 - 0.6 * 0.05 * Math.PI, 10);
  });

  it("hides every moon slot without a moon", () => {
    const { sky } = createSky();
    sky.setPhase(null);
    sky.update(0);

    expect(sky.moonDirection()).toBeNull();
    expect(sky.getMoonIllumination()).toBe(0);
    for (const preset of lunarPhasePresets) {
      expect(sky.getTopMaterial().isObjectVisible(lunarPhaseObjectIndex(preset))).toBe(false);
    }
  });

  it("keeps emitted values in range over a day", () => {
    const { sky, sink } = createSky();
    sky.setCloudiness(0.5);
    sky.setCloudModulation(true);
    for (let hour = 0; hour <= 24; hour += 0.5) {
      sky.timeAndPlace.setHour(hour);
      sky.update(1);
    }

    for (const snapshot of sink.snapshots) {
      expect(snapshot.shadowIntensity).toBeGreaterThanOrEqual(0);
      expect(snapshot.shadowIntensity).toBeLessThanOrEqual(1);
      expect(snapshot.bloomIntensity).toBeGreaterThanOrEqual(0);
      expect(snapshot.bloomIntensity).toBeLessThanOrEqual(1.7);
      expect(snapshot.mainDirection.length()).toBeCloseTo(1, 6);
    }
  });

  it("dims the sun behind opaque clouds when modulation is on", () => {
    const { sky, sink } = createSky();
    sky.setCloudiness(1);
    sky.setCloudModulation(true);
    sky.timeAndPlace.setHour(12);
    sky.update(0);

    expectColor(sink.last.mainColor, 0, 0, 0);
    expectColor(sink.last.ambientColor, 1, 1, 0.9375);
    expect(sink.last.shadowIntensity).toBe(0);
  });
});

describe("SkySystem clouds", () => {
  it("sets every layer's opacity", () => {
    const { sky } = createSky();
    sky.setCloudiness(0.7);
    sky.update(0);

    expect(sky.numCloudLayers).toBe(6);
    for (let index = 0; index < sky.numCloudLayers; index++) {
      expect(sky.getCloudLayer(index).getOpacity()).toBe(0.7);
      expect(sky.getCloudsMaterial().getCloudsColor(index).w).toBe(0.7);
    }
    expect(() => sky.setCloudiness(1.1)).toThrow(InvalidArgumentError);
  });

  it("advances the animation clock by the rate", () => {
    const { sky } = createSky();
    sky.setCloudsRate(2);
    sky.update(10);
    sky.setCloudsRate(-1);
    sky.update(5);

    expect(sky.getCloudsAnimationTime()).toBe(15);
    expect(() => sky.setCloudsRate(Number.POSITIVE_INFINITY)).toThrow(InvalidArgumentError);
  });

  it("needs a flattened cloud dome for a y-offset", () => {
    const { sky } = createSky();
    sky.setCloudsYOffset(0);
    expect(() => sky.setCloudsYOffset(0.5)).toThrow(IllegalStateError);
    expect(sky.getCloudsYOffset()).toBe(0);
  });

  it("lowers a flattened cloud dome", () => {
    const { sky } = createSky({ cloudFlattening: 0.5 });
    sky.setCloudsYOffset(0.5);

    expect(sky.getCloudsYOffset()).toBe(0.5);
    expect(sky.getCloudsMaterial()).not.toBe(sky.getTopMaterial());
    expect(sky.getCloudsMaterial().maxObjects).toBe(0);
    expect(sky.getTopMaterial().maxCloudLayers).toBe(0);

    const clouds = sky.getSubtree().getObjectByName("clouds");
    expect(clouds?.position.y).toBeCloseTo(-0.25, 10);
    expect(clouds?.scale.y).toBe(0.5);
    expect(() => sky.setCloudsYOffset(1)).toThrow(InvalidArgumentError);
  });

  it("rejects a cloud flattening of one", () => {
    expect(() => createSky({ cloudFlattening: 1 })).toThrow(InvalidArgumentError);
  });
});

describe("SkySystem objects and stars", () => {
  it("round-trips angular diameters", () => {
    const { sky } = createSky();
    sky.setSolarDiameter(0.05);
    sky.setLunarDiameter(0.1);

    expect(sky.getSolarDiameter()).toBeCloseTo(0.05, 10);
    expect(sky.getLunarDiameter()).toBeCloseTo(0.1, 10);
    expect(() => sky.setSolarDiameter(0)).toThrow(InvalidArgumentError);
  });

  it("rebuilds the domes for a new top vertical angle", () => {
    const { sky } = createSky();
    sky.setTopVerticalAngle(1.7);

    expect(sky.getTopVerticalAngle()).toBe(1.7);
    expect(sky.getTopMesh().verticalAngle).toBe(1.7);
    expect(() => sky.setTopVerticalAngle(2)).toThrow(InvalidArgumentError);
  });

  it("maps a static star map onto the top dome", () => {
    const { sky, textures } = createSky();
    sky.setStarMaps("stars");

    expect(textures.has("stars/equator.png")).toBe(true);
    expect(sky.getTopMaterial().getParameter({ scope: "global", kind: "starsColorMap" })).toBeDefined();

    sky.clearStarMaps();
    expect(sky.getTopMaterial().getParameter({ scope: "global", kind: "starsColorMap" })).toBeUndefined();
  });

  it("rotates northern and southern star domes with star motion", () => {
    const { sky, textures } = createSky({ starMotion: true });
    const north = sky.getSubtree().getObjectByName("northern stars");
    if (!(north instanceof Mesh) || !(north.material instanceof MeshBasicMaterial)) {
      throw new Error("northern star dome missing");
    }
    expect(north.material.visible).toBe(false);

    sky.setStarMaps("stars");
    expect(north.material.visible).toBe(true);
    expect(textures.has("stars/northern.png")).toBe(true);
    expect(textures.has("stars/southern.png")).toBe(true);

    sky.timeAndPlace.setHour(3);
    sky.update(0);
    expect(north.quaternion.equals(new Quaternion())).toBe(false);

    sky.clearStarMaps();
    expect(north.material.visible).toBe(false);
  });
});
