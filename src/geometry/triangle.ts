/**
 * Triangle builder
 * 
 * Single point of geometric validation: every triangle of every mesh is built here.
 */

import type { Triangle, Vec3 } from './types.js';
import { cross, subtract, tryNormalize } from './vector.js';
import { DegenerateGeometryError } from './errors.js';

/**
 * Build a triangle from three points in counter-clockwise order
 * 
 * The face normal is normalize(cross(p1 - p0, p2 - p0)).
 * 
 * @throws DegenerateGeometryError if the points are collinear or coincident
 */
export function buildTriangle(p0: Vec3, p1: Vec3, p2: Vec3): Triangle {
  const normal = tryNormalize(cross(subtract(p1, p0), subtract(p2, p0)));
  if (!normal) {
    throw new DegenerateGeometryError();
  }
  return {
    normal,
    vertices: [p0, p1, p2]
  };
}
