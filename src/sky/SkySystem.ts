// SkySystem: per-frame sky coordinator for sun, moon, stars, clouds and scene lighting.
// SkySystem：每帧的天空协调器，负责太阳、月亮、星空、云层和场景光照

import {
  Group,
  Mesh,
  MeshBasicMaterial,
  Vector2,
  Vector3,
  Vector4,
  type BufferGeometry,
  type Object3D,
  type PerspectiveCamera,
} from "three";
import { domeStaticConfig } from "@config/dome";
import { lunarPhasePresets, skyStaticConfig, type LunarPhasePreset } from "@config/sky";
import { IllegalStateError } from "@core/errors";
import { consoleLogger, type SkyLogger } from "@core/logging";
import { modulo } from "@core/math";
import {
  requireFinite,
  requireFraction,
  requireIndex,
  requireInHalfOpenRange,
  requireInOpenRange,
  requireInRange,
} from "@core/validate";
import { CloudLayer } from "./CloudLayer";
import { intersectCloudDome } from "./cloudDome";
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
} from "./DayNightCycle";
import { DomeMesh } from "./DomeMesh";
import { LightingUpdater, type LightingSink, type LightingSnapshot } from "./LightingUpdater";
import {
  lunarLongitudeDifference,
  lunarPhaseImagePath,
  lunarPhaseObjectIndex,
  nearestLunarPhasePreset,
} from "./LunarPhase";
import { SkyMaterialState } from "./SkyMaterialState";
import type { SkyTextureSource } from "./textures";
import { TimeAndPlace } from "./TimeAndPlace";

const COMPONENT = "SkySystem";

const NUM_OBJECTS = 1 + lunarPhasePresets.length;

export type SkySystemOptions = {
  textures: SkyTextureSource;
  /** Flattening of a separate cloud dome, [0, 1); 0 puts clouds on the top dome. / 独立云穹顶的压扁度 */
  cloudFlattening?: number;
  /** Two star domes that rotate with sidereal time. / 随恒星时旋转的两个星空穹顶 */
  starMotion?: boolean;
  /** Dome below the horizon, colored like the haze. / 地平线以下的穹顶，颜色与雾霾相同 */
  bottomDome?: boolean;
  rimSamples?: number;
  quadrantSamples?: number;
  /** Receives the lighting snapshot each frame; defaults to a LightingUpdater. / 每帧接收光照快照 */
  lightingSink?: LightingSink;
  logger?: SkyLogger;
};

/**
 * Moon configuration: hidden, a preset phase, or an externally driven phase angle.
 * 月亮配置：隐藏、预设月相，或外部驱动的相位角
 */
export type LunarPhaseMode =
  | { kind: "none" }
  | { kind: "preset"; phase: LunarPhasePreset }
  | { kind: "custom"; longitudeDifference: number; lunarLatitude: number };

/**
 * SkySystem: owns the dome meshes and sky material states and turns time of day
 * into texture transforms, colors and a lighting snapshot.
 * SkySystem：持有穹顶网格和天空材质状态，将一天中的时间转化为纹理变换、颜色和光照快照
 *
 * Starts disabled; enabling attaches the sky subtree to a host object.
 * 初始为禁用状态；启用时将天空子树挂接到宿主对象
 */
export class SkySystem {
  readonly timeAndPlace = new TimeAndPlace();

  private readonly textures: SkyTextureSource;
  private readonly logger: SkyLogger;
  private readonly sink: LightingSink;

  private readonly cloudFlattening: number;
  private readonly topMaterial: SkyMaterialState;
  private readonly cloudsMaterial: SkyMaterialState;
  private readonly cloudLayers: CloudLayer[];

  // Scene graph.
  // 场景图
  private readonly subtree = new Group();
  private topMesh: DomeMesh;
  private readonly hemisphereMesh: DomeMesh;
  private bottomMesh: DomeMesh | null = null;
  private readonly topDome: Mesh<BufferGeometry, MeshBasicMaterial>;
  private readonly bottomDome: Mesh<BufferGeometry, MeshBasicMaterial> | null = null;
  private readonly cloudsDome: Mesh<BufferGeometry, MeshBasicMaterial> | null = null;
  private readonly northStars: Mesh<BufferGeometry, MeshBasicMaterial> | null = null;
  private readonly southStars: Mesh<BufferGeometry, MeshBasicMaterial> | null = null;

  private host: Object3D | null = null;
  private camera: PerspectiveCamera | null = null;
  private enabled = false;

  // Runtime state.
  // 运行时状态
  private phase: LunarPhaseMode = { kind: "preset", phase: "full" };
  private cloudsAnimationTime = 0;
  private cloudsRate = 1;
  private cloudsYOffset = 0;
  private cloudModulation = false;
  private sunScale: number = skyStaticConfig.objectScales.sun;
  private moonScale: number = skyStaticConfig.objectScales.moon;
  private topVerticalAngle: number = domeStaticConfig.defaultVerticalAngle;

  constructor(options: SkySystemOptions) {
    const {
      textures,
      cloudFlattening = 0,
      starMotion = false,
      bottomDome = true,
      rimSamples = domeStaticConfig.rimSamples,
      quadrantSamples = domeStaticConfig.quadrantSamples,
      logger = consoleLogger,
    } = options;
    requireInHalfOpenRange(COMPONENT, "cloudFlattening", cloudFlattening, 0, 1);

    this.textures = textures;
    this.logger = logger;
    this.sink = options.lightingSink ?? new LightingUpdater(logger);
    this.cloudFlattening = cloudFlattening;

    const numLayers = skyStaticConfig.numCloudLayers;
    const separateClouds = cloudFlattening > 0;

    // Materials: objects (and clouds, unless they get their own dome) on the top dome.
    // 材质：天体（以及云层，除非有独立穹顶）位于顶部穹顶
    this.topMaterial = new SkyMaterialState(NUM_OBJECTS, separateClouds ? 0 : numLayers);
    this.cloudsMaterial = separateClouds ? new SkyMaterialState(0, numLayers) : this.topMaterial;

    this.topMaterial.addObject(skyStaticConfig.sunObjectIndex, textures.load(skyStaticConfig.textures.sun));
    for (const preset of lunarPhasePresets) {
      this.topMaterial.addObject(lunarPhaseObjectIndex(preset), textures.load(lunarPhaseImagePath(preset)));
    }
    this.topMaterial.addHaze(textures.load(skyStaticConfig.textures.haze));

    this.cloudLayers = Array.from(
      { length: numLayers },
      (_, index) => new CloudLayer(this.cloudsMaterial, index, textures)
    );

    // Meshes.
    // 网格
    this.hemisphereMesh = new DomeMesh({ rimSamples, quadrantSamples }, logger);
    this.topMesh = this.hemisphereMesh;
    this.subtree.name = "sky";

    if (starMotion) {
      this.northStars = this.createDome("northern stars", this.hemisphereMesh);
      this.southStars = this.createDome("southern stars", this.hemisphereMesh);
      this.northStars.material.visible = false;
      this.southStars.material.visible = false;
    }

    this.topDome = this.createDome("top", this.topMesh);

    if (bottomDome) {
      this.bottomMesh = new DomeMesh(
        { rimSamples, quadrantSamples: domeStaticConfig.bottomQuadrantSamples },
        logger
      );
      this.bottomDome = this.createDome("bottom", this.bottomMesh);
      this.bottomDome.rotation.x = Math.PI;
    }

    if (separateClouds) {
      this.cloudsDome = this.createDome("clouds", this.hemisphereMesh);
      this.cloudsDome.material.transparent = true;
      this.cloudsDome.scale.set(1, 1 - cloudFlattening, 1);
    }
  }

  // ==========================================================================
  // Attachment
  // 挂接
  // ==========================================================================

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Host object the sky subtree attaches to while enabled.
   * 启用时天空子树挂接的宿主对象
   */
  setHost(host: Object3D | null): void {
    if (this.enabled) {
      if (host === null) {
        this.setEnabled(false);
      } else {
        host.add(this.subtree);
      }
    }
    this.host = host;
  }

  /**
   * Camera whose position the sky follows; its near/far planes size the domes.
   * 天空跟随其位置的相机；近/远裁剪面决定穹顶大小
   */
  setCamera(camera: PerspectiveCamera | null): void {
    this.camera = camera;
    this.fitToCamera();
  }

  setEnabled(enabled: boolean): void {
    if (enabled === this.enabled) return;
    if (enabled) {
      const host = this.host;
      if (!host) {
        throw new IllegalStateError(COMPONENT, "Cannot enable without a host object");
      }
      host.add(this.subtree);
      this.fitToCamera();
      this.logger.info(`[${COMPONENT}] Enabled`);
    } else {
      this.subtree.removeFromParent();
      this.logger.info(`[${COMPONENT}] Disabled`);
    }
    this.enabled = enabled;
  }

  /** Root of the sky's scene graph. / 天空场景图的根节点 */
  getSubtree(): Group {
    return this.subtree;
  }

  // ==========================================================================
  // Accessors
  // 访问器
  // ==========================================================================

  getTopMaterial(): SkyMaterialState {
    return this.topMaterial;
  }

  getCloudsMaterial(): SkyMaterialState {
    return this.cloudsMaterial;
  }

  getTopMesh(): DomeMesh {
    return this.topMesh;
  }

  /** Mesh the cloud textures are mapped on. / 云纹理映射所在的网格 */
  getCloudsMesh(): DomeMesh {
    return this.cloudsDome ? this.hemisphereMesh : this.topMesh;
  }

  getLightingSink(): LightingSink {
    return this.sink;
  }

  getCloudLayer(index: number): CloudLayer {
    requireIndex(COMPONENT, "layerIndex", index, this.cloudLayers.length);
    return this.cloudLayers[index];
  }

  get numCloudLayers(): number {
    return this.cloudLayers.length;
  }

  // ==========================================================================
  // Moon
  // 月亮
  // ==========================================================================

  getPhase(): LunarPhaseMode {
    return { ...this.phase };
  }

  /**
   * Select a preset phase, or null to hide the moon.
   * 选择预设月相，或传入 null 隐藏月亮
   */
  setPhase(phase: LunarPhasePreset | null): void {
    this.phase = phase === null ? { kind: "none" } : { kind: "preset", phase };
  }

  /**
   * Drive the moon from an external phase angle.
   * 由外部相位角驱动月亮
   *
   * @param longitudeDifference - Lunar minus solar celestial longitude, [0, 2π].
   * @param lunarLatitude - Moon's ecliptic latitude, [-π/2, π/2].
   */
  setCustomPhase(longitudeDifference: number, lunarLatitude: number): void {
    requireInRange(COMPONENT, "longitudeDifference", longitudeDifference, 0, 2 * Math.PI);
    requireInRange(COMPONENT, "lunarLatitude", lunarLatitude, -Math.PI / 2, Math.PI / 2);
    this.phase = { kind: "custom", longitudeDifference, lunarLatitude };
  }

  /**
   * Illuminated fraction of the moon as a light weight, 0 without a moon.
   * 月亮受照比例（作为光照权重），没有月亮时为 0
   */
  getMoonIllumination(): number {
    switch (this.phase.kind) {
      case "none":
        return 0;
      case "preset":
        return calculateMoonIllumination(lunarLongitudeDifference(this.phase.phase));
      case "custom":
        return calculateMoonIllumination(this.phase.longitudeDifference, this.phase.lunarLatitude);
    }
  }

  /**
   * World direction to the moon, null without a moon.
   * 指向月亮的世界方向，没有月亮时为 null
   */
  moonDirection(): Vector3 | null {
    const geometry = this.moonGeometry();
    if (!geometry) return null;
    return this.timeAndPlace.convertToWorld(geometry.latitude, geometry.longitude);
  }

  sunDirection(): Vector3 {
    return this.timeAndPlace.sunDirection();
  }

  // ==========================================================================
  // Objects
  // 天体
  // ==========================================================================

  /** Sun's angular diameter in radians. / 太阳角直径（弧度） */
  getSolarDiameter(): number {
    const { uvScale, discDiameter } = domeStaticConfig;
    return (this.sunScale * discDiameter * (Math.PI / 2)) / uvScale;
  }

  setSolarDiameter(diameter: number): void {
    requireInOpenRange(COMPONENT, "diameter", diameter, 0, Math.PI);
    const { uvScale, discDiameter } = domeStaticConfig;
    this.sunScale = (diameter * uvScale) / (discDiameter * (Math.PI / 2));
  }

  /** Moon's angular diameter in radians. / 月亮角直径（弧度） */
  getLunarDiameter(): number {
    return (this.moonScale * (Math.PI / 2)) / domeStaticConfig.uvScale;
  }

  setLunarDiameter(diameter: number): void {
    requireInOpenRange(COMPONENT, "diameter", diameter, 0, Math.PI);
    this.moonScale = (diameter * domeStaticConfig.uvScale) / (Math.PI / 2);
  }

  /**
   * Angle from the zenith to the rim of the top dome; raise it above π/2 when
   * the terrain's horizon lies below the horizontal.
   * 从天顶到顶部穹顶边缘的角度；地形地平线低于水平面时将其调到 π/2 以上
   */
  setTopVerticalAngle(angle: number): void {
    requireInOpenRange(COMPONENT, "angle", angle, 0, domeStaticConfig.maxTopVerticalAngle);
    if (angle === this.topVerticalAngle) return;

    this.topMesh = this.hemisphereMesh.withVerticalAngle(angle);
    replaceGeometry(this.topDome, this.topMesh);

    if (this.bottomDome && this.bottomMesh) {
      this.bottomMesh = this.bottomMesh.withVerticalAngle(Math.PI - angle);
      replaceGeometry(this.bottomDome, this.bottomMesh);
    }
    this.topVerticalAngle = angle;
  }

  getTopVerticalAngle(): number {
    return this.topVerticalAngle;
  }

  /**
   * Load star maps: northern/southern domes with star motion, else a static top-dome map.
   * 加载星图：有星空运动时为南北穹顶，否则为顶部穹顶静态星图
   */
  setStarMaps(directory: string = skyStaticConfig.textures.starMapDirectory): void {
    if (this.northStars && this.southStars) {
      const north = this.textures.load(`${directory}/northern.png`);
      const south = this.textures.load(`${directory}/southern.png`);
      setDomeMap(this.northStars, north);
      setDomeMap(this.southStars, south);
    } else {
      this.topMaterial.addStars(this.textures.load(`${directory}/equator.png`));
    }
  }

  clearStarMaps(): void {
    if (this.northStars && this.southStars) {
      setDomeMap(this.northStars, null);
      setDomeMap(this.southStars, null);
    } else {
      this.topMaterial.removeStars();
    }
  }

  // ==========================================================================
  // Clouds
  // 云层
  // ==========================================================================

  /**
   * Set every layer's opacity.
   * 设置所有云层的不透明度
   */
  setCloudiness(cloudiness: number): void {
    requireFraction(COMPONENT, "cloudiness", cloudiness);
    for (const layer of this.cloudLayers) {
      layer.setOpacity(cloudiness);
    }
  }

  /** Cloud animation speed multiplier (negative runs backwards). / 云动画速度倍数（负数为倒放） */
  setCloudsRate(rate: number): void {
    requireFinite(COMPONENT, "rate", rate);
    this.cloudsRate = rate;
  }

  getCloudsRate(): number {
    return this.cloudsRate;
  }

  getCloudsAnimationTime(): number {
    return this.cloudsAnimationTime;
  }

  /**
   * Lower the cloud dome by a fraction of its height, [0, 1).
   * 将云穹顶下移其高度的一部分，范围 [0, 1)
   */
  setCloudsYOffset(offset: number): void {
    requireInHalfOpenRange(COMPONENT, "offset", offset, 0, 1);
    const dome = this.cloudsDome;
    if (!dome) {
      if (offset !== 0) {
        throw new IllegalStateError(COMPONENT, "Clouds y-offset needs a flattened cloud dome");
      }
      return;
    }
    this.cloudsYOffset = offset;
    dome.position.y = -offset * dome.scale.y;
  }

  getCloudsYOffset(): number {
    return this.cloudsYOffset;
  }

  /** Dim the main light as clouds pass in front of it. / 云层经过时减弱主光 */
  setCloudModulation(enabled: boolean): void {
    this.cloudModulation = enabled;
  }

  // ==========================================================================
  // Frame update
  // 帧更新
  // ==========================================================================

  /**
   * Advance the sky by `elapsed` seconds and emit a lighting snapshot.
   * 将天空推进 `elapsed` 秒并发出光照快照
   */
  update(elapsed: number): void {
    requireInRange(COMPONENT, "elapsed", elapsed, 0, Number.MAX_VALUE);
    if (!this.enabled) return;

    this.followCamera();
    this.updateClouds(elapsed);

    const sunDirection = this.updateSun();
    const moonDirection = this.updateMoon();

    const [r, g, b] = skyStaticConfig.colors.clearDay;
    this.topMaterial.setClearColor(new Vector4(r, g, b, calculateDayFraction(sunDirection.y)));
    this.sink.update(this.updateLighting(sunDirection, moonDirection));

    if (this.northStars || this.southStars) {
      this.timeAndPlace.orientStarDomes(this.northStars, this.southStars);
    }
  }

  dispose(): void {
    this.subtree.removeFromParent();
    this.subtree.traverse((object) => {
      if (object instanceof Mesh) {
        object.geometry.dispose();
        const material: unknown = object.material;
        if (material instanceof MeshBasicMaterial) {
          material.dispose();
        }
      }
    });
    this.enabled = false;
  }

  // ==========================================================================
  // Private helpers
  // 私有辅助函数
  // ==========================================================================

  private createDome(name: string, mesh: DomeMesh): Mesh<BufferGeometry, MeshBasicMaterial> {
    const material = new MeshBasicMaterial({ depthWrite: false, fog: false });
    const dome = new Mesh(mesh.toBufferGeometry(), material);
    dome.name = name;
    dome.frustumCulled = false;
    this.subtree.add(dome);
    return dome;
  }

  // World scale is (near + far) / 2, whatever scale the host carries.
  // 世界缩放为 (near + far) / 2，与宿主的缩放无关
  private fitToCamera(): void {
    const camera = this.camera;
    if (!camera) return;

    const size = (camera.near + camera.far) / 2;
    const parent = this.subtree.parent;
    if (parent) {
      const parentScale = parent.getWorldScale(new Vector3());
      this.subtree.scale.set(size / parentScale.x, size / parentScale.y, size / parentScale.z);
    } else {
      this.subtree.scale.setScalar(size);
    }
  }

  // Center the domes on the camera's world position.
  // 将穹顶中心放在相机的世界位置
  private followCamera(): void {
    const camera = this.camera;
    if (!camera) return;

    const position = camera.getWorldPosition(new Vector3());
    const parent = this.subtree.parent;
    if (parent) {
      parent.updateWorldMatrix(true, false);
      parent.worldToLocal(position);
    }
    this.subtree.position.copy(position);
    this.fitToCamera();
  }

  private updateClouds(elapsed: number): void {
    this.cloudsAnimationTime += elapsed * this.cloudsRate;
    for (const layer of this.cloudLayers) {
      layer.updateOffset(this.cloudsAnimationTime);
    }
  }

  private updateSun(): Vector3 {
    const direction = this.timeAndPlace.sunDirection();
    const uv = this.topMesh.directionUV(direction);
    const index = skyStaticConfig.sunObjectIndex;
    if (uv) {
      this.topMaterial.setObjectTransform(index, uv, this.sunScale, null);
    } else {
      this.topMaterial.hideObject(index);
    }
    return direction;
  }

  private moonGeometry(): { latitude: number; longitude: number; slot: LunarPhasePreset } | null {
    const solarLongitude = this.timeAndPlace.getSolarLongitude();
    switch (this.phase.kind) {
      case "none":
        return null;
      case "preset":
        return {
          latitude: 0,
          longitude: wrapLongitude(solarLongitude + lunarLongitudeDifference(this.phase.phase)),
          slot: this.phase.phase,
        };
      case "custom":
        return {
          latitude: this.phase.lunarLatitude,
          longitude: wrapLongitude(solarLongitude + this.phase.longitudeDifference),
          slot: nearestLunarPhasePreset(this.phase.longitudeDifference),
        };
    }
  }

  private updateMoon(): Vector3 | null {
    const geometry = this.moonGeometry();
    const activeIndex = geometry ? lunarPhaseObjectIndex(geometry.slot) : -1;

    for (const preset of lunarPhasePresets) {
      const index = lunarPhaseObjectIndex(preset);
      if (index !== activeIndex) {
        this.topMaterial.hideObject(index);
      }
    }
    if (!geometry) return null;

    const direction = this.timeAndPlace.convertToWorld(geometry.latitude, geometry.longitude);
    const center = this.topMesh.directionUV(direction);
    if (center) {
      const rotation = this.lunarRotation(geometry.latitude, geometry.longitude, center);
      this.topMaterial.setObjectTransform(activeIndex, center, this.moonScale, rotation);
    } else {
      this.topMaterial.hideObject(activeIndex);
    }
    return direction;
  }

  // Texture "up" of the moon: toward a point slightly north of its center (or away from one slightly south).
  // 月亮纹理的“上”方向：指向其中心略北的点（或背离略南的点）
  private lunarRotation(latitude: number, longitude: number, center: Vector2): Vector2 | null {
    const probe = skyStaticConfig.lunarRotationProbe;

    const northLatitude = latitude + probe;
    if (northLatitude <= Math.PI / 2) {
      const uvNorth = this.topMesh.directionUV(this.timeAndPlace.convertToWorld(northLatitude, longitude));
      if (uvNorth) {
        const offset = uvNorth.sub(center);
        if (offset.lengthSq() > 0) return offset.normalize();
      }
    }

    const southLatitude = latitude - probe;
    if (southLatitude >= -Math.PI / 2) {
      const uvSouth = this.topMesh.directionUV(this.timeAndPlace.convertToWorld(southLatitude, longitude));
      if (uvSouth) {
        const offset = center.clone().sub(uvSouth);
        if (offset.lengthSq() > 0) return offset.normalize();
      }
    }
    return null;
  }

  private updateLighting(sunDirection: Vector3, moonDirection: Vector3 | null): LightingSnapshot {
    const sineSolarAltitude = sunDirection.y;
    const sineLunarAltitude = moonDirection ? moonDirection.y : -1;
    this.updateObjectColors(sineSolarAltitude, sineLunarAltitude);

    const sunUp = sineSolarAltitude >= 0;
    const moonUp = sineLunarAltitude >= 0;
    const moonWeight = this.getMoonIllumination();
    const source = chooseMainLightSource(sunUp, moonUp, moonWeight);

    let mainDirection: Vector3;
    if (source === "sun") {
      mainDirection = sunDirection.clone();
    } else if (source === "moon" && moonDirection) {
      mainDirection = moonDirection.clone();
    } else {
      mainDirection = starlightDirection();
    }

    const baseColor = calculateBaseColor(sineSolarAltitude, moonUp, moonWeight);
    this.topMaterial.setHazeColor(baseColor);
    this.bottomDome?.material.color.copy(baseColor);

    const cloudsColor = calculateCloudsColor(baseColor, sunUp, moonUp);
    for (const layer of this.cloudLayers) {
      layer.setColor(cloudsColor);
    }

    const transmission =
      this.cloudModulation && source !== "stars" ? this.transmissionAlong(mainDirection) : 1;
    const mainColor = calculateMainLightColor(source, baseColor, sineSolarAltitude, transmission, moonWeight);
    const ambientColor = calculateAmbientColor(cloudsColor, mainColor);

    return {
      ambientColor,
      backgroundColor: baseColor,
      mainColor,
      mainDirection,
      shadowIntensity: calculateShadowIntensity(mainColor, ambientColor),
      bloomIntensity: calculateBloomIntensity(sineSolarAltitude),
    };
  }

  private transmissionAlong(direction: Vector3): number {
    const dome = this.cloudsDome;
    const semiMinorAxis = dome ? 1 - this.cloudFlattening : 1;
    const deltaY = dome ? -this.cloudsYOffset * semiMinorAxis : 0;

    const intersection = intersectCloudDome(direction, deltaY, semiMinorAxis);
    const uv = this.getCloudsMesh().directionUV(intersection);
    return uv ? this.cloudsMaterial.getTransmission(uv) : 1;
  }

  private updateObjectColors(sineSolarAltitude: number, sineLunarAltitude: number): void {
    const sunIndex = skyStaticConfig.sunObjectIndex;
    const sunColor = calculateSunColor(sineSolarAltitude);
    this.topMaterial.setObjectColor(sunIndex, sunColor);
    this.topMaterial.setObjectGlow(sunIndex, sunColor);

    const geometry = this.moonGeometry();
    if (geometry) {
      this.topMaterial.setObjectColor(lunarPhaseObjectIndex(geometry.slot), calculateMoonColor(sineLunarAltitude));
    }
  }
}

function wrapLongitude(longitude: number): number {
  return modulo(longitude, 2 * Math.PI);
}

function replaceGeometry(dome: Mesh<BufferGeometry, MeshBasicMaterial>, mesh: DomeMesh): void {
  const old = dome.geometry;
  dome.geometry = mesh.toBufferGeometry();
  old.dispose();
}

function setDomeMap(dome: Mesh<BufferGeometry, MeshBasicMaterial>, map: MeshBasicMaterial["map"]): void {
  dome.material.map = map;
  dome.material.visible = map !== null;
  dome.material.needsUpdate = true;
}
