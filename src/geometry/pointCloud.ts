/**
 * Point cloud generation
 * 
 * Evaluates the bordered surface grid, estimates a normal for each interior
 * vertex, then drops the border.
 */

import type { CoordinateFunctions, Vec3 } from './types.js';
import { Grid2D, evaluateGrid } from './grid.js';
import { estimateNormals } from './normals.js';

/**
 * Interior surface vertices with one normal each
 * `vertices` and `normals` share dimensions and indexing.
 */
export interface PointCloud {
  readonly width: number;
  readonly height: number;
  readonly vertices: Grid2D<Vec3>;
  readonly normals: Grid2D<Vec3>;
}

/**
 * @param step - Sampling step; 1 samples every pixel
 * @throws DegenerateGeometryError if a vertex normal cannot be estimated
 */
export function generatePointCloud(
  functions: CoordinateFunctions,
  width: number,
  height: number,
  step: number = 1
): PointCloud {
  const { vertices: bordered } = evaluateGrid(functions, width, height, step);
  const normals = estimateNormals(bordered);
  const vertices = bordered.interior();

  return {
    width: vertices.width,
    height: vertices.height,
    vertices,
    normals
  };
}
