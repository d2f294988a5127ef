/**
 * Lithophane mesh assembly
 * 
 * Builds a closed solid from a point cloud and a grayscale image:
 * the backing surface, the front surface pushed out along each vertex normal
 * by a brightness-derived depth, and four side walls stitching the two.
 * 
 * Image origin is top left, so (col 0, row 0) is the top-left pixel.
 */

import type { DepthRange, GrayscaleImage, Mesh, Triangle, Vec3 } from './types.js';
import type { PointCloud } from './pointCloud.js';
import { Grid2D } from './grid.js';
import { add, scale } from './vector.js';
import { buildTriangle } from './triangle.js';
import { DimensionMismatchError } from './errors.js';
import { pixelAt } from '../image/grayscaleImage.js';

/**
 * Extrusion depth for an 8-bit intensity
 * 255 maps to whiteDepth, 0 maps to blackDepth, linear in between.
 */
export function pixelDepth(intensity: number, depth: DepthRange): number {
  return depth.whiteDepth + ((255 - intensity) / 255) * (depth.blackDepth - depth.whiteDepth);
}

/**
 * Number of triangles generateLithophaneMesh emits for a width x height point cloud
 */
export function lithophaneTriangleCount(width: number, height: number): number {
  if (width < 2 || height < 2) {
    return 0;
  }
  return 4 * (width - 1) * (height - 1) + 4 * (width - 1) + 4 * (height - 1);
}

/**
 * Front-surface vertices: each backing vertex moved along its normal by its pixel depth
 */
export function extrudePixels(pointCloud: PointCloud, image: GrayscaleImage, depth: DepthRange): Grid2D<Vec3> {
  assertSameSize(pointCloud, image);
  return pointCloud.vertices.map((vertex, col, row) =>
    add(vertex, scale(pointCloud.normals.get(col, row), pixelDepth(pixelAt(image, col, row), depth)))
  );
}

function assertSameSize(pointCloud: PointCloud, image: GrayscaleImage): void {
  if (image.width !== pointCloud.width || image.height !== pointCloud.height) {
    throw new DimensionMismatchError(
      { width: pointCloud.width, height: pointCloud.height },
      { width: image.width, height: image.height }
    );
  }
}

/**
 * Assemble the full lithophane mesh
 * 
 * @throws DimensionMismatchError if the image and point cloud differ in size
 * @throws DegenerateGeometryError if any triangle would be degenerate
 */
export function generateLithophaneMesh(pointCloud: PointCloud, image: GrayscaleImage, depth: DepthRange): Mesh {
  assertSameSize(pointCloud, image);

  const { width, height } = pointCloud;
  if (width < 2 || height < 2) {
    return [];
  }

  const back = pointCloud.vertices;
  const front = extrudePixels(pointCloud, image, depth);
  const triangles: Mesh = new Array<Triangle>(lithophaneTriangleCount(width, height));
  let next = 0;

  // Backing surface
  for (let row = 0; row < height - 1; row++) {
    for (let col = 0; col < width - 1; col++) {
      triangles[next++] = buildTriangle(back.get(col, row), back.get(col + 1, row + 1), back.get(col, row + 1));
      triangles[next++] = buildTriangle(back.get(col, row), back.get(col + 1, row), back.get(col + 1, row + 1));
    }
  }

  // Front surface, opposite winding
  for (let row = 0; row < height - 1; row++) {
    for (let col = 0; col < width - 1; col++) {
      triangles[next++] = buildTriangle(front.get(col, row), front.get(col, row + 1), front.get(col + 1, row + 1));
      triangles[next++] = buildTriangle(front.get(col, row), front.get(col + 1, row + 1), front.get(col + 1, row));
    }
  }

  // Top wall
  for (let col = 0; col < width - 1; col++) {
    triangles[next++] = buildTriangle(back.get(col, 0), front.get(col, 0), front.get(col + 1, 0));
    triangles[next++] = buildTriangle(back.get(col, 0), front.get(col + 1, 0), back.get(col + 1, 0));
  }

  // Bottom wall
  const last = height - 1;
  for (let col = 0; col < width - 1; col++) {
    triangles[next++] = buildTriangle(back.get(col, last), front.get(col + 1, last), front.get(col, last));
    triangles[next++] = buildTriangle(back.get(col, last), back.get(col + 1, last), front.get(col + 1, last));
  }

  // Left wall
  for (let row = 0; row < height - 1; row++) {
    triangles[next++] = buildTriangle(back.get(0, row), back.get(0, row + 1), front.get(0, row + 1));
    triangles[next++] = buildTriangle(back.get(0, row), front.get(0, row + 1), front.get(0, row));
  }

  // Right wall
  const right = width - 1;
  for (let row = 0; row < height - 1; row++) {
    triangles[next++] = buildTriangle(back.get(right, row), front.get(right, row + 1), back.get(right, row + 1));
    triangles[next++] = buildTriangle(back.get(right, row), front.get(right, row), front.get(right, row + 1));
  }

  return triangles;
}
