// LightingUpdater: receives lighting snapshots and applies them to scene lights.
// LightingUpdater：接收光照快照并应用到场景灯光

import { Color, Vector3, type AmbientLight, type DirectionalLight, type Scene } from "three";
import { skyStaticConfig } from "@config/sky";
import { silentLogger, type SkyLogger } from "@core/logging";
import { requireFraction, requireInRange, requireUnitVector } from "@core/validate";

const COMPONENT = "LightingUpdater";

/**
 * Lighting recommended for the current frame.
 * 当前帧推荐的光照
 */
export type LightingSnapshot = {
  ambientColor: Color;
  backgroundColor: Color;
  mainColor: Color;
  /** Unit vector pointing toward the main light source. / 指向主光源的单位向量 */
  mainDirection: Vector3;
  /** [0, 1] */
  shadowIntensity: number;
  /** [0, 1.7] */
  bloomIntensity: number;
};

/**
 * Consumer of lighting snapshots, called once per frame.
 * 光照快照的消费者，每帧调用一次
 */
export interface LightingSink {
  update(snapshot: Readonly<LightingSnapshot>): void;
}

/** Anything with a shadow intensity, e.g. a light's shadow. / 具有阴影强度的对象 */
export interface ShadowTarget {
  intensity: number;
}

/** Anything with a bloom strength, e.g. an UnrealBloomPass. / 具有泛光强度的对象 */
export interface BloomTarget {
  strength: number;
}

/**
 * Default lighting sink: keeps the last snapshot and forwards it to lights,
 * scene backgrounds, shadow targets and bloom targets.
 * 默认光照接收器：保存最近一次快照并转发给灯光、场景背景、阴影目标和泛光目标
 */
export class LightingUpdater implements LightingSink {
  private readonly ambientColor = new Color(1, 1, 1);
  private readonly backgroundColor = new Color(0, 0, 0);
  private readonly mainColor = new Color(1, 1, 1);
  private readonly mainDirection = new Vector3(0, 1, 0);
  private shadowIntensity = 0;
  private bloomIntensity = 0;

  private mainLight: DirectionalLight | null = null;
  private mainLightDistance = 100;
  private ambientLight: AmbientLight | null = null;
  private readonly backgrounds: Scene[] = [];
  private readonly shadowTargets: ShadowTarget[] = [];
  private readonly bloomTargets: BloomTarget[] = [];

  private readonly logger: SkyLogger;

  constructor(logger: SkyLogger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Light positioned along the main direction, `distance` from its target.
   * 沿主方向放置的灯光，与目标相距 `distance`
   */
  setMainLight(light: DirectionalLight | null, distance = 100): void {
    this.mainLight = light;
    this.mainLightDistance = distance;
    this.applyMainLight();
  }

  setAmbientLight(light: AmbientLight | null): void {
    this.ambientLight = light;
    light?.color.copy(this.ambientColor);
  }

  addBackground(scene: Scene): void {
    if (!this.backgrounds.includes(scene)) {
      this.backgrounds.push(scene);
      scene.background = this.backgroundColor.clone();
    }
  }

  removeBackground(scene: Scene): void {
    removeFrom(this.backgrounds, scene, this.logger, "background");
  }

  addShadowTarget(target: ShadowTarget): void {
    if (!this.shadowTargets.includes(target)) {
      this.shadowTargets.push(target);
      target.intensity = this.shadowIntensity;
    }
  }

  removeShadowTarget(target: ShadowTarget): void {
    removeFrom(this.shadowTargets, target, this.logger, "shadow target");
  }

  addBloomTarget(target: BloomTarget): void {
    if (!this.bloomTargets.includes(target)) {
      this.bloomTargets.push(target);
      target.strength = this.bloomIntensity;
    }
  }

  removeBloomTarget(target: BloomTarget): void {
    removeFrom(this.bloomTargets, target, this.logger, "bloom target");
  }

  /**
   * Record a snapshot and apply it. Invalid snapshots change nothing.
   * 记录并应用快照。无效快照不会改变任何状态
   */
  update(snapshot: Readonly<LightingSnapshot>): void {
    requireFraction(COMPONENT, "shadowIntensity", snapshot.shadowIntensity);
    requireInRange(COMPONENT, "bloomIntensity", snapshot.bloomIntensity, 0, skyStaticConfig.lighting.maxBloom);
    requireUnitVector(COMPONENT, "mainDirection", snapshot.mainDirection);

    this.ambientColor.copy(snapshot.ambientColor);
    this.backgroundColor.copy(snapshot.backgroundColor);
    this.mainColor.copy(snapshot.mainColor);
    this.mainDirection.copy(snapshot.mainDirection);
    this.shadowIntensity = snapshot.shadowIntensity;
    this.bloomIntensity = snapshot.bloomIntensity;

    this.applyMainLight();
    this.ambientLight?.color.copy(this.ambientColor);
    for (const scene of this.backgrounds) {
      if (scene.background instanceof Color) {
        scene.background.copy(this.backgroundColor);
      } else {
        scene.background = this.backgroundColor.clone();
      }
    }
    for (const target of this.shadowTargets) {
      target.intensity = this.shadowIntensity;
    }
    for (const target of this.bloomTargets) {
      target.strength = this.bloomIntensity;
    }
  }

  /**
   * Copy of the last applied snapshot.
   * 最近一次应用的快照副本
   */
  getSnapshot(): LightingSnapshot {
    return {
      ambientColor: this.ambientColor.clone(),
      backgroundColor: this.backgroundColor.clone(),
      mainColor: this.mainColor.clone(),
      mainDirection: this.mainDirection.clone(),
      shadowIntensity: this.shadowIntensity,
      bloomIntensity: this.bloomIntensity,
    };
  }

  private applyMainLight(): void {
    const light = this.mainLight;
    if (!light) return;

    light.color.copy(this.mainColor);
    light.position.copy(light.target.position).addScaledVector(this.mainDirection, this.mainLightDistance);
  }
}

function removeFrom<T>(list: T[], item: T, logger: SkyLogger, description: string): void {
  const index = list.indexOf(item);
  if (index === -1) {
    logger.warn(`[${COMPONENT}] ${description} not removed: it was never added`);
    return;
  }
  list.splice(index, 1);
}
