/**
 * Canonical Geometry Types
 * 
 * Pure geometry model with no I/O, image decoding or expression parsing.
 * These types define the data that flows through lithophane generation.
 */

/**
 * 3D vector (x, y, z)
 * Used for positions, displacements and normals. Never mutated in place.
 */
export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Oriented triangle
 * Vertices are counter-clockwise around `normal` (right-hand rule).
 */
export interface Triangle {
  /** Unit face normal */
  readonly normal: Vec3;
  readonly vertices: readonly [Vec3, Vec3, Vec3];
}

/**
 * Triangle soup in insertion order
 */
export type Mesh = Triangle[];

/** World axis a coordinate function produces */
export type Axis = 'x' | 'y' | 'z';

/**
 * Maps an image column/row to one world coordinate.
 * `w` and `h` are always the full image width and height.
 */
export type CoordinateFunction = (x: number, y: number, w: number, h: number) => number;

export type CoordinateFunctions = Record<Axis, CoordinateFunction>;

/**
 * 8-bit grayscale raster, row-major, origin top-left
 */
export interface GrayscaleImage {
  readonly width: number;
  readonly height: number;
  /** One intensity per pixel, `width * height` bytes */
  readonly data: Uint8Array;
}

/**
 * Extrusion depth of the brightest (255) and darkest (0) pixels
 */
export interface DepthRange {
  whiteDepth: number;
  blackDepth: number;
}

/**
 * Column/row inside a grid
 */
export interface GridPosition {
  col: number;
  row: number;
}
