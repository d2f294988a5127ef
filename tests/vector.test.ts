/**
 * Unit tests for vector math
 */

import { describe, it, expect } from '@jest/globals';
import { add, cross, dot, length, normalize, scale, subtract, tryNormalize, vec3 } from '../src/geometry/vector.js';
import { DegenerateGeometryError } from '../src/geometry/errors.js';

describe('vector math', () => {
  it('should add, subtract and scale component-wise', () => {
    const a = vec3(1, 2, 3);
    const b = vec3(4, -1, 0.5);

    expect(add(a, b)).toEqual({ x: 5, y: 1, z: 3.5 });
    expect(subtract(a, b)).toEqual({ x: -3, y: 3, z: 2.5 });
    expect(scale(a, 2)).toEqual({ x: 2, y: 4, z: 6 });
  });

  it('should not mutate its inputs', () => {
    const a = vec3(1, 2, 3);
    add(a, vec3(1, 1, 1));
    scale(a, 10);
    expect(a).toEqual({ x: 1, y: 2, z: 3 });
  });

  it('should follow the right-hand rule for cross products', () => {
    expect(cross(vec3(1, 0, 0), vec3(0, 1, 0))).toEqual({ x: 0, y: 0, z: 1 });
    expect(cross(vec3(0, 1, 0), vec3(0, 0, 1))).toEqual({ x: 1, y: 0, z: 0 });
    expect(cross(vec3(2, 3, 4), vec3(5, 6, 7))).toEqual({ x: -3, y: 6, z: -3 });
  });

  it('should compute dot product and length', () => {
    expect(dot(vec3(1, 2, 3), vec3(4, 5, 6))).toBe(32);
    expect(length(vec3(3, 0, 4))).toBe(5);
  });

  it('should normalize to unit length', () => {
    const unit = normalize(vec3(3, 0, 4));
    expect(unit.x).toBeCloseTo(0.6, 10);
    expect(unit.y).toBeCloseTo(0, 10);
    expect(unit.z).toBeCloseTo(0.8, 10);
    expect(length(unit)).toBeCloseTo(1, 10);
  });

  it('should reject zero-length vectors', () => {
    expect(tryNormalize(vec3(0, 0, 0))).toBeNull();
    expect(() => normalize(vec3(0, 0, 0))).toThrow(DegenerateGeometryError);
  });

  it('should reject vectors with non-finite length', () => {
    expect(tryNormalize(vec3(Number.NaN, 0, 1))).toBeNull();
    expect(tryNormalize(vec3(Infinity, 0, 0))).toBeNull();
  });
});
