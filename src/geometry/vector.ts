/**
 * Vector math
 * Pure helpers over immutable Vec3 values
 */

import type { Vec3 } from './types.js';
import { DegenerateGeometryError } from './errors.js';

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function scale(v: Vec3, factor: number): Vec3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor };
}

export function dot(a: Vec3, b: Vec3): number {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x
  };
}

export function length(v: Vec3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/**
 * Scale a vector to unit length
 * 
 * @returns The unit vector, or null when the length is zero or not finite
 */
export function tryNormalize(v: Vec3): Vec3 | null {
  const len = length(v);
  if (!(len > 0) || !Number.isFinite(len)) {
    return null;
  }
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}

/**
 * Scale a vector to unit length, throwing DegenerateGeometryError for a zero vector
 */
export function normalize(v: Vec3): Vec3 {
  const unit = tryNormalize(v);
  if (!unit) {
    throw new DegenerateGeometryError('cannot normalize a zero-length vector');
  }
  return unit;
}
