/**
 * Surface grid evaluation
 * 
 * Samples the three coordinate functions over the image index domain with a
 * one-step border on every side. The border only exists so that normals can
 * be estimated at the image edge; it is stripped before meshing.
 */

import type { Axis, CoordinateFunctions, Vec3 } from './types.js';
import { InvalidArgumentError, NonFiniteCoordinateError } from './errors.js';

/**
 * Fixed-size 2D container over a flat row-major array
 * Accessors are bounds-checked.
 */
export class Grid2D<T> {
  readonly width: number;
  readonly height: number;
  private readonly cells: T[];

  constructor(width: number, height: number, cells: T[]) {
    if (cells.length !== width * height) {
      throw new RangeError(`Grid of ${width}x${height} needs ${width * height} cells, got ${cells.length}`);
    }
    this.width = width;
    this.height = height;
    this.cells = cells;
  }

  static fromFunction<T>(width: number, height: number, fill: (col: number, row: number) => T): Grid2D<T> {
    const cells = new Array<T>(width * height);
    for (let row = 0; row < height; row++) {
      for (let col = 0; col < width; col++) {
        cells[row * width + col] = fill(col, row);
      }
    }
    return new Grid2D(width, height, cells);
  }

  get size(): number {
    return this.cells.length;
  }

  get(col: number, row: number): T {
    if (!Number.isInteger(col) || !Number.isInteger(row) || col < 0 || row < 0 || col >= this.width || row >= this.height) {
      throw new RangeError(`Grid position (${col}, ${row}) is outside ${this.width}x${this.height}`);
    }
    return this.cells[row * this.width + col];
  }

  /**
   * Copy of the grid without its outermost ring of cells
   */
  interior(): Grid2D<T> {
    if (this.width < 2 || this.height < 2) {
      throw new RangeError(`Grid of ${this.width}x${this.height} has no interior`);
    }
    return Grid2D.fromFunction(this.width - 2, this.height - 2, (col, row) => this.get(col + 1, row + 1));
  }

  map<U>(fn: (value: T, col: number, row: number) => U): Grid2D<U> {
    return Grid2D.fromFunction(this.width, this.height, (col, row) => fn(this.get(col, row), col, row));
  }

  /** Row-major copy of the cells */
  toArray(): T[] {
    return [...this.cells];
  }
}

/**
 * Index sequence for one axis of a (possibly stepped) bordered grid
 * 
 * Starts at -step and advances by step while below length. If that misses the
 * last index, length - 1 is appended so the true image edge is always sampled.
 * One more index mirrors the second-to-last around length - 1, which keeps the
 * border spacing symmetric for normal estimation.
 * 
 * @example stepIndices(15, 4) // [-4, 0, 4, 8, 12, 14, 16]
 */
export function stepIndices(length: number, step: number): number[] {
  if (!Number.isInteger(length) || length < 1) {
    throw new InvalidArgumentError(`length must be a positive integer, got ${length}`);
  }
  if (!Number.isInteger(step) || step < 1) {
    throw new InvalidArgumentError(`step must be a positive integer, got ${step}`);
  }

  const indices: number[] = [];
  for (let i = -step; i < length; i += step) {
    indices.push(i);
  }
  if ((length - 1) % step !== 0) {
    indices.push(length - 1);
  }
  indices.push(2 * (length - 1) - indices[indices.length - 2]);

  return indices;
}

/**
 * Sampled surface including its one-step border
 */
export interface BorderedGrid {
  vertices: Grid2D<Vec3>;
  /** Image column sampled by each grid column */
  columns: number[];
  /** Image row sampled by each grid row */
  rows: number[];
}

/**
 * Evaluate the coordinate functions over a bordered grid
 * 
 * With step 1 this samples every index in [-1, width] x [-1, height].
 * Functions always receive the full image width and height as w and h.
 * 
 * @throws NonFiniteCoordinateError if any function returns NaN or an infinity
 */
export function evaluateGrid(
  functions: CoordinateFunctions,
  width: number,
  height: number,
  step: number = 1
): BorderedGrid {
  const columns = stepIndices(width, step);
  const rows = stepIndices(height, step);

  const vertices = Grid2D.fromFunction(columns.length, rows.length, (col, row) => {
    const xi = columns[col];
    const yi = rows[row];
    const sample = (axis: Axis): number => {
      const value = functions[axis](xi, yi, width, height);
      if (!Number.isFinite(value)) {
        throw new NonFiniteCoordinateError(axis, { x: xi, y: yi }, value);
      }
      return value;
    };
    return { x: sample('x'), y: sample('y'), z: sample('z') };
  });

  return { vertices, columns, rows };
}
