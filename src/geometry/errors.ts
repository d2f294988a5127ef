/**
 * Lithophane error types
 *
 * Generation is all-or-nothing: every failure below is thrown and no partial
 * mesh is ever returned.
 */

import type { Axis, GridPosition } from './types.js';

export class LithophaneError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LithophaneError';
  }
}

/**
 * A cross product collapsed to zero length: collinear or coincident points
 * for a triangle, or a flat neighbourhood when estimating a vertex normal.
 */
export class DegenerateGeometryError extends LithophaneError {
  constructor(
    message = 'all three points for this triangle are in the same line',
    public readonly position?: GridPosition
  ) {
    super(message);
    this.name = 'DegenerateGeometryError';
  }
}

/**
 * A coordinate function returned NaN or an infinity, usually an expression
 * evaluated outside its domain (the border samples index -1 and width/height).
 */
export class NonFiniteCoordinateError extends LithophaneError {
  constructor(
    public readonly axis: Axis,
    public readonly index: { x: number; y: number },
    value: number
  ) {
    super(`${axis} coordinate is ${value} at x = ${index.x}, y = ${index.y}`);
    this.name = 'NonFiniteCoordinateError';
  }
}

export class ExpressionError extends LithophaneError {
  constructor(
    public readonly axis: Axis,
    reason: string
  ) {
    super(`invalid ${axis} expression: ${reason}`);
    this.name = 'ExpressionError';
  }
}

export class ImageDecodeError extends LithophaneError {
  constructor(reason: string) {
    super(`error with image: ${reason}`);
    this.name = 'ImageDecodeError';
  }
}

export class DimensionMismatchError extends LithophaneError {
  constructor(expected: { width: number; height: number }, actual: { width: number; height: number }) {
    super(
      `image is ${actual.width}x${actual.height} but the surface grid is ${expected.width}x${expected.height}`
    );
    this.name = 'DimensionMismatchError';
  }
}

export class InvalidArgumentError extends LithophaneError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class StlFormatError extends LithophaneError {
  constructor(message: string) {
    super(message);
    this.name = 'StlFormatError';
  }
}
