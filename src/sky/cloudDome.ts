// Intersection of a light direction with the (possibly flattened, lowered) cloud dome.
// 光线方向与（可能被压扁、下移的）云穹顶的交点

import { Vector3 } from "three";
import { requireInRange, requirePositive, requireUnitVector } from "@core/validate";

const COMPONENT = "cloudDome";

/**
 * Point on the cloud dome seen along a direction, as a unit vector in the
 * dome's unflattened frame.
 * 沿某方向看到的云穹顶上的点，表示为穹顶未压扁坐标系中的单位向量
 *
 * Solves a quadratic in the horizontal distance w from the vertical axis and
 * takes the most positive root.
 * 求解关于到竖直轴水平距离 w 的二次方程并取最大正根
 *
 * @param direction - Unit vector with y >= 0.
 * @param deltaY - Vertical offset of the dome's center (<= 0).
 * @param semiMinorAxis - Vertical scale of the dome (> 0).
 */
export function intersectCloudDome(direction: Vector3, deltaY = 0, semiMinorAxis = 1): Vector3 {
  requireUnitVector(COMPONENT, "direction", direction);
  requireInRange(COMPONENT, "direction.y", direction.y, 0, 1);
  requireInRange(COMPONENT, "deltaY", deltaY, Number.NEGATIVE_INFINITY, 0);
  requirePositive(COMPONENT, "semiMinorAxis", semiMinorAxis);

  const cosSquared = direction.x * direction.x + direction.z * direction.z;
  if (cosSquared === 0) {
    return new Vector3(0, 1, 0);
  }

  const cosAltitude = Math.sqrt(cosSquared);
  const tanAltitude = direction.y / cosAltitude;
  const smaSquared = semiMinorAxis * semiMinorAxis;
  const a = tanAltitude * tanAltitude + smaSquared;
  const b = -2 * deltaY * tanAltitude;
  const c = deltaY * deltaY - smaSquared;
  const discriminant = Math.max(0, b * b - 4 * a * c);

  // Clamp rounding so the result stays on the unit sphere.
  // 限制舍入误差，使结果保持在单位球上
  const w = Math.min((-b + Math.sqrt(discriminant)) / (2 * a), 1);
  const distance = w / cosAltitude;

  return new Vector3(direction.x * distance, Math.sqrt(Math.max(0, 1 - w * w)), direction.z * distance);
}
