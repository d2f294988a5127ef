/**
 * Vertex normal estimation
 * 
 * Finite-difference normals over a bordered grid. Two cross products are taken
 * per vertex (below x right, above x left), each normalized, then their sum is
 * normalized. This evens out anisotropic spacing such as the irregular last
 * step of a preview grid.
 */

import type { Vec3 } from './types.js';
import { Grid2D } from './grid.js';
import { add, cross, subtract, tryNormalize } from './vector.js';
import { DegenerateGeometryError } from './errors.js';

function degenerateNormal(col: number, row: number): DegenerateGeometryError {
  return new DegenerateGeometryError(
    `cannot estimate a surface normal at column ${col}, row ${row}: neighbouring points do not span a plane`,
    { col, row }
  );
}

/**
 * Normal of the interior vertex at (col, row)
 * 
 * @param grid - Bordered grid; interior (col, row) is grid cell (col + 1, row + 1)
 * @throws DegenerateGeometryError if either cross product or their sum has zero length
 */
export function normalAt(grid: Grid2D<Vec3>, col: number, row: number): Vec3 {
  const v = grid.get(col + 1, row + 1);

  const below = subtract(grid.get(col + 1, row + 2), v);
  const right = subtract(grid.get(col + 2, row + 1), v);
  const above = subtract(grid.get(col + 1, row), v);
  const left = subtract(grid.get(col, row + 1), v);

  const lowerRight = tryNormalize(cross(below, right));
  const upperLeft = tryNormalize(cross(above, left));
  if (!lowerRight || !upperLeft) {
    throw degenerateNormal(col, row);
  }

  const normal = tryNormalize(add(lowerRight, upperLeft));
  if (!normal) {
    throw degenerateNormal(col, row);
  }
  return normal;
}

/**
 * One normal per interior vertex, (width - 2) x (height - 2)
 */
export function estimateNormals(grid: Grid2D<Vec3>): Grid2D<Vec3> {
  return Grid2D.fromFunction(grid.width - 2, grid.height - 2, (col, row) => normalAt(grid, col, row));
}
