/**
 * Preview mesh
 * 
 * Un-extruded triangulation of the backing surface on a stepped grid.
 * No normals, no depth, no walls. The image edges are always sampled exactly.
 */

import type { CoordinateFunctions, Mesh, Triangle } from './types.js';
import { evaluateGrid, stepIndices } from './grid.js';
import { buildTriangle } from './triangle.js';

/**
 * Number of surface vertices per axis a preview samples, border excluded
 */
export function previewAxisCount(length: number, step: number): number {
  return stepIndices(length, step).length - 2;
}

export function previewTriangleCount(width: number, height: number, step: number): number {
  if (width < 2 || height < 2) {
    return 0;
  }
  return 2 * (previewAxisCount(width, step) - 1) * (previewAxisCount(height, step) - 1);
}

/**
 * @param step - Larger steps give fewer, larger triangles
 * @throws DegenerateGeometryError if any triangle would be degenerate
 */
export function generatePreviewMesh(
  functions: CoordinateFunctions,
  width: number,
  height: number,
  step: number
): Mesh {
  if (width < 2 || height < 2) {
    return [];
  }

  const surface = evaluateGrid(functions, width, height, step).vertices.interior();
  const triangles: Mesh = new Array<Triangle>(previewTriangleCount(width, height, step));
  let next = 0;

  for (let row = 0; row < surface.height - 1; row++) {
    for (let col = 0; col < surface.width - 1; col++) {
      triangles[next++] = buildTriangle(surface.get(col, row), surface.get(col, row + 1), surface.get(col + 1, row + 1));
      triangles[next++] = buildTriangle(surface.get(col, row), surface.get(col + 1, row + 1), surface.get(col + 1, row));
    }
  }

  return triangles;
}
