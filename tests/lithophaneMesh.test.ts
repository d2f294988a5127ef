/**
 * Unit tests for full lithophane mesh assembly
 */

import { describe, it, expect } from '@jest/globals';
import {
  extrudePixels,
  generateLithophaneMesh,
  lithophaneTriangleCount,
  pixelDepth
} from '../src/geometry/lithophaneMesh.js';
import { generatePointCloud } from '../src/geometry/pointCloud.js';
import { findOpenEdges, isWatertight, meshBounds } from '../src/geometry/meshDiagnostics.js';
import { cross, dot, length, subtract } from '../src/geometry/vector.js';
import { DegenerateGeometryError, DimensionMismatchError } from '../src/geometry/errors.js';
import { createGrayscaleImage, uniformImage } from '../src/image/grayscaleImage.js';
import type { DepthRange } from '../src/geometry/types.js';
import { cylinderSurface, flatSurface } from './helpers.js';

const depth: DepthRange = { whiteDepth: 0.5, blackDepth: 3.0 };

describe('pixelDepth', () => {
  it('should map white to whiteDepth and black to blackDepth exactly', () => {
    expect(pixelDepth(255, depth)).toBe(0.5);
    expect(pixelDepth(0, depth)).toBe(3.0);
  });

  it('should interpolate linearly on inverted intensity', () => {
    expect(pixelDepth(51, { whiteDepth: 0, blackDepth: 5 })).toBeCloseTo(4, 10);
    expect(pixelDepth(204, { whiteDepth: 1, blackDepth: 2 })).toBeCloseTo(1.2, 10);
  });
});

describe('lithophaneTriangleCount', () => {
  it('should count surfaces and walls', () => {
    expect(lithophaneTriangleCount(2, 2)).toBe(12);
    expect(lithophaneTriangleCount(4, 3)).toBe(44);
    expect(lithophaneTriangleCount(1, 5)).toBe(0);
  });
});

describe('generateLithophaneMesh', () => {
  it('should close a 2x2 flat image into a watertight solid', () => {
    const cloud = generatePointCloud(flatSurface, 2, 2);
    const mesh = generateLithophaneMesh(cloud, uniformImage(2, 2, 128), depth);

    expect(mesh).toHaveLength(12);
    expect(findOpenEdges(mesh)).toEqual([]);
    expect(isWatertight(mesh)).toBe(true);
  });

  it('should stay watertight for varying intensities on a curved backing', () => {
    const data = Uint8Array.from({ length: 20 }, (_, i) => (i * 53) % 256);
    const cloud = generatePointCloud(cylinderSurface, 5, 4);
    const mesh = generateLithophaneMesh(cloud, createGrayscaleImage(5, 4, data), depth);

    expect(mesh).toHaveLength(lithophaneTriangleCount(5, 4));
    expect(mesh.filter(() => true)).toHaveLength(lithophaneTriangleCount(5, 4));
    expect(isWatertight(mesh)).toBe(true);
  });

  it('should emit the backing first, then the front, then the walls', () => {
    const width = 4;
    const height = 3;
    const intensity = 100;
    const expectedDepth = pixelDepth(intensity, depth);
    const cloud = generatePointCloud(flatSurface, width, height);
    const mesh = generateLithophaneMesh(cloud, uniformImage(width, height, intensity), depth);

    const surfaceCount = 2 * (width - 1) * (height - 1);
    const backing = mesh.slice(0, surfaceCount);
    const front = mesh.slice(surfaceCount, 2 * surfaceCount);

    for (const triangle of backing) {
      expect(triangle.normal.z).toBeCloseTo(1, 10);
      for (const v of triangle.vertices) {
        expect(v.z).toBe(0);
      }
    }
    for (const triangle of front) {
      expect(triangle.normal.z).toBeCloseTo(-1, 10);
      for (const v of triangle.vertices) {
        expect(v.z).toBeCloseTo(-expectedDepth, 10);
      }
    }
  });

  it('should give every triangle a unit normal consistent with its winding', () => {
    const cloud = generatePointCloud(cylinderSurface, 6, 4);
    const mesh = generateLithophaneMesh(cloud, uniformImage(6, 4, 30), depth);

    for (const { normal, vertices: [v0, v1, v2] } of mesh) {
      expect(length(normal)).toBeCloseTo(1, 10);
      expect(dot(normal, cross(subtract(v1, v0), subtract(v2, v0)))).toBeGreaterThan(0);
    }
  });

  it('should point side walls away from the solid', () => {
    const cloud = generatePointCloud(flatSurface, 3, 3);
    const mesh = generateLithophaneMesh(cloud, uniformImage(3, 3, 0), depth);
    const walls = mesh.slice(2 * 2 * 2 * 2);

    // top, bottom, left, right: 4 triangles each
    const outward = [
      { x: 0, y: -1 },
      { x: 0, y: 1 },
      { x: -1, y: 0 },
      { x: 1, y: 0 }
    ];
    outward.forEach((direction, side) => {
      for (const { normal } of walls.slice(side * 4, side * 4 + 4)) {
        expect(normal.x).toBeCloseTo(direction.x, 10);
        expect(normal.y).toBeCloseTo(direction.y, 10);
        expect(normal.z).toBeCloseTo(0, 10);
      }
    });
  });

  it('should extrude each pixel along its normal by its own depth', () => {
    const cloud = generatePointCloud(flatSurface, 2, 2);
    const image = createGrayscaleImage(2, 2, Uint8Array.from([255, 0, 0, 255]));
    const front = extrudePixels(cloud, image, depth);

    expect(front.get(0, 0).z).toBeCloseTo(-0.5, 10);
    expect(front.get(1, 0).z).toBeCloseTo(-3, 10);
    expect(front.get(0, 1).z).toBeCloseTo(-3, 10);
    expect(front.get(1, 1).z).toBeCloseTo(-0.5, 10);
    expect(front.get(1, 1).x).toBeCloseTo(1, 10);
  });

  it('should span the image and the deepest pixel', () => {
    const cloud = generatePointCloud(flatSurface, 3, 2);
    const mesh = generateLithophaneMesh(cloud, createGrayscaleImage(3, 2, Uint8Array.from([255, 255, 0, 255, 255, 255])), depth);
    const bounds = meshBounds(mesh);

    expect(bounds).not.toBeNull();
    expect(bounds?.min.x).toBeCloseTo(0, 10);
    expect(bounds?.max.x).toBeCloseTo(2, 10);
    expect(bounds?.max.y).toBeCloseTo(1, 10);
    expect(bounds?.max.z).toBeCloseTo(0, 10);
    expect(bounds?.min.z).toBeCloseTo(-3, 10);
  });

  it('should return no triangles for images narrower or shorter than 2 pixels', () => {
    const cloud = generatePointCloud(flatSurface, 1, 4);
    expect(generateLithophaneMesh(cloud, uniformImage(1, 4, 0), depth)).toEqual([]);
  });

  it('should reject an image that does not match the point cloud', () => {
    const cloud = generatePointCloud(flatSurface, 3, 3);
    expect(() => generateLithophaneMesh(cloud, uniformImage(2, 3, 0), depth)).toThrow(DimensionMismatchError);
  });

  it('should fail when zero depth collapses the walls', () => {
    const cloud = generatePointCloud(flatSurface, 2, 2);
    expect(() => generateLithophaneMesh(cloud, uniformImage(2, 2, 0), { whiteDepth: 0, blackDepth: 0 })).toThrow(
      DegenerateGeometryError
    );
  });
});

describe('mesh diagnostics', () => {
  it('should report the open edges of a lone triangle', () => {
    const cloud = generatePointCloud(flatSurface, 2, 2);
    const mesh = generateLithophaneMesh(cloud, uniformImage(2, 2, 0), depth).slice(0, 1);

    expect(findOpenEdges(mesh)).toHaveLength(3);
    expect(isWatertight(mesh)).toBe(false);
    expect(isWatertight([])).toBe(false);
    expect(meshBounds([])).toBeNull();
  });
});
