// Argument validation that throws InvalidArgumentError before any state changes.
// 参数校验：在任何状态改变之前抛出 InvalidArgumentError

import type { Vector3 } from "three";
import { InvalidArgumentError } from "./errors";

const UNIT_TOLERANCE = 1e-4;

function describe(value: number): string {
  return Number.isNaN(value) ? "NaN" : String(value);
}

/**
 * Require `min <= value <= max`.
 * 要求 `min <= value <= max`
 */
export function requireInRange(component: string, name: string, value: number, min: number, max: number): void {
  if (!(value >= min && value <= max)) {
    throw new InvalidArgumentError(component, `${name} must be in [${min}, ${max}], got ${describe(value)}`);
  }
}

/** Require `min < value < max`. / 要求 `min < value < max` */
export function requireInOpenRange(component: string, name: string, value: number, min: number, max: number): void {
  if (!(value > min && value < max)) {
    throw new InvalidArgumentError(component, `${name} must be in (${min}, ${max}), got ${describe(value)}`);
  }
}

/** Require `value` in [0, 1]. / 要求 `value` 在 [0, 1] 内 */
export function requireFraction(component: string, name: string, value: number): void {
  requireInRange(component, name, value, 0, 1);
}

export function requirePositive(component: string, name: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new InvalidArgumentError(component, `${name} must be positive, got ${describe(value)}`);
  }
}

export function requireFinite(component: string, name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(component, `${name} must be finite, got ${describe(value)}`);
  }
}

/**
 * Require an integer index in [0, count).
 * 要求整数索引在 [0, count) 内
 */
export function requireIndex(component: string, name: string, index: number, count: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new InvalidArgumentError(component, `${name} must be an integer in [0, ${count - 1}], got ${describe(index)}`);
  }
}

/** Require an integer of at least `min`. / 要求整数且不小于 `min` */
export function requireIntegerAtLeast(component: string, name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(component, `${name} must be an integer >= ${min}, got ${describe(value)}`);
  }
}

export function requireUnitVector(component: string, name: string, vector: Vector3): void {
  const length = vector.length();
  if (!(Math.abs(length - 1) <= UNIT_TOLERANCE)) {
    throw new InvalidArgumentError(component, `${name} must be a unit vector, got length ${describe(length)}`);
  }
}

/** Require `min <= value < max`. / 要求 `min <= value < max` */
export function requireInHalfOpenRange(component: string, name: string, value: number, min: number, max: number): void {
  if (!(value >= min && value < max)) {
    throw new InvalidArgumentError(component, `${name} must be in [${min}, ${max}), got ${describe(value)}`);
  }
}
