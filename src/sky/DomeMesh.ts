// DomeMesh: hemispherical dome buffers with an azimuthal-equidistant UV projection.
// DomeMesh：半球穹顶缓冲区，使用方位等距 UV 投影

import { BufferAttribute, BufferGeometry, Vector2, Vector3 } from "three";
import { domeStaticConfig } from "@config/dome";
import { InvalidArgumentError } from "@core/errors";
import { silentLogger, type SkyLogger } from "@core/logging";
import {
  requireFraction,
  requireInOpenRange,
  requireIntegerAtLeast,
} from "@core/validate";

const COMPONENT = "DomeMesh";
const VERTICES_PER_TRIANGLE = 3;

export type DomeMeshOptions = {
  /** Samples around the rim (>= 3). / 边缘采样数（>= 3） */
  rimSamples: number;
  /** Samples from rim to top, inclusive (>= 2). / 从边缘到顶部的采样数（含两端，>= 2） */
  quadrantSamples: number;
  topU?: number;
  topV?: number;
  /** UV distance from top to a horizontal direction, in (0, 0.5). / 顶部到水平方向的 UV 距离 */
  uvScale?: number;
  /** Faces point toward the center (viewed from inside). / 面朝向中心（从内部观看） */
  inwardFacing?: boolean;
  /** Angle from the top to the rim in radians, in (0, π). / 从顶部到边缘的角度（弧度） */
  verticalAngle?: number;
};

/**
 * Dome mesh: unit-sphere cap around +Y with texture coordinates from an
 * azimuthal-equidistant projection centered on (topU, topV).
 * 穹顶网格：绕 +Y 的单位球冠，纹理坐标来自以 (topU, topV) 为中心的方位等距投影
 *
 * Buffers are built once; a different vertical angle means a new mesh.
 * 缓冲区只构建一次；不同的垂直角意味着新的网格
 */
export class DomeMesh {
  readonly rimSamples: number;
  readonly quadrantSamples: number;
  readonly topU: number;
  readonly topV: number;
  readonly uvScale: number;
  readonly inwardFacing: boolean;
  readonly verticalAngle: number;

  readonly vertexCount: number;
  readonly triangleCount: number;

  readonly positions: Float32Array;
  readonly normals: Float32Array;
  readonly uvs: Float32Array;
  readonly indices: Uint16Array | Uint32Array;

  private readonly logger: SkyLogger;

  constructor(options: DomeMeshOptions, logger: SkyLogger = silentLogger) {
    const {
      rimSamples,
      quadrantSamples,
      topU = domeStaticConfig.topU,
      topV = domeStaticConfig.topV,
      uvScale = domeStaticConfig.uvScale,
      inwardFacing = true,
      verticalAngle = domeStaticConfig.defaultVerticalAngle,
    } = options;

    requireIntegerAtLeast(COMPONENT, "rimSamples", rimSamples, 3);
    requireIntegerAtLeast(COMPONENT, "quadrantSamples", quadrantSamples, 2);
    requireFraction(COMPONENT, "topU", topU);
    requireFraction(COMPONENT, "topV", topV);
    requireInOpenRange(COMPONENT, "uvScale", uvScale, 0, 0.5);
    requireInOpenRange(COMPONENT, "verticalAngle", verticalAngle, 0, Math.PI);

    this.rimSamples = rimSamples;
    this.quadrantSamples = quadrantSamples;
    this.topU = topU;
    this.topV = topV;
    this.uvScale = uvScale;
    this.inwardFacing = inwardFacing;
    this.verticalAngle = verticalAngle;
    this.logger = logger;

    this.vertexCount = (quadrantSamples - 1) * rimSamples + 1;
    this.triangleCount = (2 * (quadrantSamples - 2) + 1) * rimSamples;

    this.positions = new Float32Array(3 * this.vertexCount);
    this.normals = new Float32Array(3 * this.vertexCount);
    this.uvs = new Float32Array(2 * this.vertexCount);
    this.indices =
      this.vertexCount > 0xffff
        ? new Uint32Array(VERTICES_PER_TRIANGLE * this.triangleCount)
        : new Uint16Array(VERTICES_PER_TRIANGLE * this.triangleCount);

    this.buildVertices();
    this.buildIndices();

    this.logger.info(
      `[${COMPONENT}] Built dome: ${this.vertexCount} vertices, ${this.triangleCount} triangles`
    );
  }

  /**
   * Same parameters with a different vertical angle.
   * 参数相同但垂直角不同的新网格
   */
  withVerticalAngle(verticalAngle: number): DomeMesh {
    return new DomeMesh(
      {
        rimSamples: this.rimSamples,
        quadrantSamples: this.quadrantSamples,
        topU: this.topU,
        topV: this.topV,
        uvScale: this.uvScale,
        inwardFacing: this.inwardFacing,
        verticalAngle,
      },
      this.logger
    );
  }

  /**
   * Texture coordinates of a direction, or null when it falls outside the texture.
   * 方向对应的纹理坐标；落在纹理之外时返回 null
   *
   * @param direction - Any non-zero vector; only its direction matters.
   */
  directionUV(direction: Vector3): Vector2 | null {
    if (direction.lengthSq() === 0) {
      throw new InvalidArgumentError(COMPONENT, "direction must be non-zero");
    }
    const unit = direction.clone().normalize();
    const uv = this.projectUnit(unit);
    if (uv === null) {
      return null;
    }
    if (uv.x < 0 || uv.x > 1 || uv.y < 0 || uv.y > 1) {
      return null;
    }
    return uv;
  }

  /**
   * Elevation angle (radians above the horizontal) of a texture coordinate.
   * 纹理坐标对应的仰角（水平面以上的弧度）
   */
  elevationAngle(u: number, v: number): number {
    requireFraction(COMPONENT, "u", u);
    requireFraction(COMPONENT, "v", v);

    const uvDistance = Math.hypot(u - this.topU, v - this.topV);
    return Math.PI / 2 - (uvDistance / this.uvScale) * (Math.PI / 2);
  }

  /**
   * Copy the buffers into a three.js geometry.
   * 将缓冲区复制到 three.js 几何体
   */
  toBufferGeometry(): BufferGeometry {
    const geometry = new BufferGeometry();
    geometry.setAttribute("position", new BufferAttribute(this.positions.slice(), 3));
    geometry.setAttribute("normal", new BufferAttribute(this.normals.slice(), 3));
    geometry.setAttribute("uv", new BufferAttribute(this.uvs.slice(), 2));
    geometry.setIndex(new BufferAttribute(this.indices.slice(), 1));
    geometry.computeBoundingSphere();
    return geometry;
  }

  // Projection without the [0, 1] bounds check; null only for the nadir.
  // 不做 [0, 1] 范围检查的投影；仅天底返回 null
  private projectUnit(unit: Vector3): Vector2 | null {
    const angleFromTop = Math.acos(Math.min(1, Math.max(-1, unit.y)));
    const uvDistance = (this.uvScale * angleFromTop) / (Math.PI / 2);
    const xzDistance = Math.hypot(unit.x, unit.z);

    if (xzDistance === 0) {
      return unit.y < 0 ? null : new Vector2(this.topU, this.topV);
    }
    const u = this.topU + (uvDistance * unit.x) / xzDistance;
    const v = this.topV - (uvDistance * unit.z) / xzDistance;
    return new Vector2(u, v);
  }

  private buildVertices(): void {
    const { rimSamples, quadrantSamples, verticalAngle } = this;
    const quadHeight = verticalAngle / (quadrantSamples - 1);
    const quadWidth = (2 * Math.PI) / rimSamples;
    const normalSign = this.inwardFacing ? -1 : 1;
    const location = new Vector3();

    // Rings from the rim upward, then one vertex at the top.
    // 从边缘向上的环，最后是顶部的一个顶点
    for (let parallel = 0; parallel < quadrantSamples - 1; parallel++) {
      const latitude = Math.PI / 2 - verticalAngle + quadHeight * parallel;
      const y = Math.sin(latitude);
      const xzDistance = Math.cos(latitude);

      for (let meridian = 0; meridian < rimSamples; meridian++) {
        const longitude = quadWidth * meridian;
        location.set(xzDistance * Math.cos(longitude), y, xzDistance * Math.sin(longitude));
        this.writeVertex(parallel * rimSamples + meridian, location, normalSign);
      }
    }

    location.set(0, 1, 0);
    this.writeVertex(this.vertexCount - 1, location, normalSign);
  }

  private writeVertex(index: number, location: Vector3, normalSign: number): void {
    this.positions[3 * index] = location.x;
    this.positions[3 * index + 1] = location.y;
    this.positions[3 * index + 2] = location.z;
    this.normals[3 * index] = normalSign * location.x;
    this.normals[3 * index + 1] = normalSign * location.y;
    this.normals[3 * index + 2] = normalSign * location.z;

    const uv = this.projectUnit(location) ?? new Vector2(this.topU, this.topV);
    this.uvs[2 * index] = uv.x;
    this.uvs[2 * index + 1] = uv.y;
  }

  private buildIndices(): void {
    const { rimSamples, quadrantSamples, inwardFacing, indices } = this;
    const quadsPerGore = quadrantSamples - 2;

    const writeTriangle = (triIndex: number, a: number, b: number, c: number): void => {
      const base = VERTICES_PER_TRIANGLE * triIndex;
      indices[base] = a;
      indices[base + 1] = b;
      indices[base + 2] = c;
    };

    // Two triangles per quad, starting at the rim.
    // 每个四边形两个三角形，从边缘开始
    for (let parallel = 0; parallel < quadsPerGore; parallel++) {
      const nextParallel = parallel + 1;
      for (let meridian = 0; meridian < rimSamples; meridian++) {
        const nextMeridian = (meridian + 1) % rimSamples;
        const v0 = parallel * rimSamples + meridian;
        const v1 = parallel * rimSamples + nextMeridian;
        const v2 = nextParallel * rimSamples + meridian;
        const v3 = nextParallel * rimSamples + nextMeridian;

        const triIndex = 2 * v0;
        if (inwardFacing) {
          writeTriangle(triIndex, v0, v1, v3);
          writeTriangle(triIndex + 1, v0, v3, v2);
        } else {
          writeTriangle(triIndex, v0, v3, v1);
          writeTriangle(triIndex + 1, v0, v2, v3);
        }
      }
    }

    // Fan around the top vertex.
    // 围绕顶部顶点的扇形
    const topIndex = this.vertexCount - 1;
    for (let meridian = 0; meridian < rimSamples; meridian++) {
      const nextMeridian = (meridian + 1) % rimSamples;
      const v0 = quadsPerGore * rimSamples + meridian;
      const v1 = quadsPerGore * rimSamples + nextMeridian;

      const triIndex = 2 * quadsPerGore * rimSamples + meridian;
      if (inwardFacing) {
        writeTriangle(triIndex, v0, v1, topIndex);
      } else {
        writeTriangle(triIndex, v0, topIndex, v1);
      }
    }
  }
}
