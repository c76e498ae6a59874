// TimeAndPlace: observer time/location and celestial coordinate conversions.
// TimeAndPlace：观察者时间/位置与天球坐标转换
//
// World axes are (+x north, +y up, +z east). Equatorial axes have +z toward the
// celestial north pole and +x toward the vernal equinox.
// 世界坐标轴为（+x 北，+y 上，+z 东）。赤道坐标 +z 指向北天极，+x 指向春分点。

import { MathUtils, Quaternion, Vector3, type Object3D } from "three";
import { skyRuntimeConfig, skyStaticConfig } from "@config/sky";
import { modulo } from "@core/math";
import { requireInRange } from "@core/validate";

const COMPONENT = "TimeAndPlace";

const HOURS_PER_DAY = 24;
const RADIANS_PER_HOUR = (2 * Math.PI) / HOURS_PER_DAY;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const X_AXIS = new Vector3(1, 0, 0);
const Y_AXIS = new Vector3(0, 1, 0);
const Z_AXIS = new Vector3(0, 0, 1);

const obliquity = MathUtils.degToRad(skyStaticConfig.obliquityDegrees);
const eclipticToEquatorial = new Quaternion().setFromAxisAngle(X_AXIS, obliquity);

function requireLatitude(name: string, latitude: number): void {
  requireInRange(COMPONENT, name, latitude, -Math.PI / 2, Math.PI / 2);
}

function requireLongitude(name: string, longitude: number): void {
  requireInRange(COMPONENT, name, longitude, 0, 2 * Math.PI);
}

/**
 * Day of year (1-366) of a calendar date in the leap year 2000.
 * 2000 闰年中某日期的年积日（1-366）
 *
 * Out-of-range days roll over into the next month, so February 31 is March 2.
 */
export function dayOfYear(month: number, day: number): number {
  const year = skyStaticConfig.referenceYear;
  const elapsed = Date.UTC(year, month, day) - Date.UTC(year, 0, 1);
  return Math.round(elapsed / MS_PER_DAY) + 1;
}

/**
 * Convert ecliptic coordinates to an equatorial unit vector.
 * 将黄道坐标转换为赤道单位向量
 *
 * @param latitude - Radians north of the ecliptic, in [-π/2, π/2].
 * @param longitude - Radians east of the vernal equinox, in [0, 2π].
 */
export function convertToEquatorial(latitude: number, longitude: number): Vector3;
/**
 * Rotate an ecliptic vector into equatorial coordinates.
 * 将黄道向量旋转到赤道坐标
 */
export function convertToEquatorial(ecliptic: Vector3): Vector3;
export function convertToEquatorial(latitudeOrVector: number | Vector3, longitude?: number): Vector3 {
  if (typeof latitudeOrVector !== "number") {
    return latitudeOrVector.clone().applyQuaternion(eclipticToEquatorial);
  }
  const latitude = latitudeOrVector;
  const lon = longitude ?? 0;
  requireLatitude("latitude", latitude);
  requireLongitude("longitude", lon);

  const cosLat = Math.cos(latitude);
  const ecliptic = new Vector3(cosLat * Math.cos(lon), cosLat * Math.sin(lon), Math.sin(latitude));
  return ecliptic.applyQuaternion(eclipticToEquatorial);
}

/**
 * Observer time and location: solar hour, latitude and the sun's celestial longitude.
 * 观察者时间与位置：太阳时、纬度与太阳黄经
 */
export class TimeAndPlace {
  private hour = 0;
  private observerLatitude = MathUtils.degToRad(skyRuntimeConfig.latitudeDegrees);
  private solarLongitude = 0;
  // Solar right ascension in hours, recomputed whenever the longitude changes.
  // 太阳赤经（小时），黄经改变时重新计算
  private solarRaHours = 0;

  getHour(): number {
    return this.hour;
  }

  /**
   * Set hours since midnight, solar time (0-24).
   * 设置午夜以来的小时数（太阳时，0-24）
   */
  setHour(hour: number): void {
    requireInRange(COMPONENT, "hour", hour, 0, HOURS_PER_DAY);
    this.hour = hour;
  }

  getObserverLatitude(): number {
    return this.observerLatitude;
  }

  /**
   * Set the observer's latitude (radians north of the equator).
   * 设置观察者纬度（赤道以北的弧度）
   */
  setObserverLatitude(latitude: number): void {
    requireLatitude("latitude", latitude);
    this.observerLatitude = latitude;
  }

  getSolarLongitude(): number {
    return this.solarLongitude;
  }

  /**
   * Set the sun's celestial longitude (radians east of the vernal equinox).
   * 设置太阳黄经（春分点以东的弧度）
   */
  setSolarLongitude(longitude: number): void {
    requireLongitude("longitude", longitude);
    const equatorial = convertToEquatorial(0, longitude);
    const rightAscension = -Math.atan2(equatorial.y, equatorial.x);

    this.solarLongitude = longitude;
    this.solarRaHours = modulo(rightAscension / RADIANS_PER_HOUR, HOURS_PER_DAY);
  }

  /**
   * Set the solar longitude from a calendar date.
   * 根据日历日期设置太阳黄经
   *
   * @param month - 0 = January ... 11 = December.
   * @param day - Day of the month (1-31).
   */
  setSolarLongitudeFromDate(month: number, day: number): void {
    requireInRange(COMPONENT, "month", month, 0, 11);
    requireInRange(COMPONENT, "day", day, 1, 31);

    const daysSinceEquinox = dayOfYear(month, day) - skyStaticConfig.vernalEquinoxDayOfYear;
    const longitude = (2 * Math.PI * daysSinceEquinox) / skyStaticConfig.daysPerYear;
    this.setSolarLongitude(modulo(longitude, 2 * Math.PI));
  }

  /**
   * Sidereal time in hours, [0, 24).
   * 恒星时（小时，[0, 24)）
   */
  getSiderealHour(): number {
    return modulo(this.hour - 12 - this.solarRaHours, HOURS_PER_DAY);
  }

  /**
   * Sidereal angle in radians, [0, 2π).
   * 恒星角（弧度，[0, 2π)）
   */
  getSiderealAngle(): number {
    return modulo(this.getSiderealHour() * RADIANS_PER_HOUR, 2 * Math.PI);
  }

  /**
   * Convert ecliptic coordinates to a world direction.
   * 将黄道坐标转换为世界方向
   */
  convertToWorld(latitude: number, longitude: number): Vector3;
  /**
   * Convert an equatorial vector to world coordinates.
   * 将赤道向量转换为世界坐标
   */
  convertToWorld(equatorial: Vector3): Vector3;
  convertToWorld(latitudeOrVector: number | Vector3, longitude?: number): Vector3 {
    const equatorial =
      typeof latitudeOrVector === "number"
        ? convertToEquatorial(latitudeOrVector, longitude ?? 0)
        : latitudeOrVector.clone();

    const coLatitude = Math.PI / 2 - this.observerLatitude;
    const zRotation = new Quaternion().setFromAxisAngle(Z_AXIS, -this.getSiderealAngle());
    const yRotation = new Quaternion().setFromAxisAngle(Y_AXIS, -coLatitude);
    const rotated = equatorial.applyQuaternion(zRotation).applyQuaternion(yRotation);

    return new Vector3(-rotated.x, rotated.z, rotated.y);
  }

  /**
   * World direction to the sun (unit vector).
   * 指向太阳的世界方向（单位向量）
   */
  sunDirection(): Vector3 {
    return this.convertToWorld(0, this.solarLongitude);
  }

  /**
   * Orient the northern and southern star domes for the current sky.
   * 按当前天空调整南北星空穹顶的朝向
   *
   * Orientations are local, so the domes' parent should carry no rotation.
   */
  orientStarDomes(north: Object3D | null, south: Object3D | null): void {
    const siderealAngle = this.getSiderealAngle();

    if (north) {
      const coLatitude = Math.PI / 2 - this.observerLatitude;
      const zRotation = new Quaternion().setFromAxisAngle(Z_AXIS, -coLatitude);
      const yRotation = new Quaternion().setFromAxisAngle(Y_AXIS, -siderealAngle);
      north.quaternion.multiplyQuaternions(zRotation, yRotation);
    }

    if (south) {
      const zRotation = new Quaternion().setFromAxisAngle(Z_AXIS, Math.PI / 2 + this.observerLatitude);
      const yRotation = new Quaternion().setFromAxisAngle(Y_AXIS, siderealAngle);
      south.quaternion.multiplyQuaternions(zRotation, yRotation);
    }
  }

  describe(): string {
    const latitude = MathUtils.radToDeg(this.observerLatitude).toFixed(1);
    const longitude = MathUtils.radToDeg(this.solarLongitude).toFixed(1);
    return `hour=${this.hour.toFixed(2)} latitude=${latitude}° solarLongitude=${longitude}°`;
  }
}
