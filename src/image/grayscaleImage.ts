/**
 * In-memory grayscale rasters
 */

import type { GrayscaleImage } from '../geometry/types.js';
import { InvalidArgumentError } from '../geometry/errors.js';

export function createGrayscaleImage(width: number, height: number, data: Uint8Array): GrayscaleImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new InvalidArgumentError(`image dimensions must be non-negative integers, got ${width}x${height}`);
  }
  if (data.length !== width * height) {
    throw new InvalidArgumentError(`a ${width}x${height} image needs ${width * height} bytes, got ${data.length}`);
  }
  return { width, height, data };
}

/**
 * Image where every pixel has the same intensity
 */
export function uniformImage(width: number, height: number, intensity: number): GrayscaleImage {
  return createGrayscaleImage(width, height, new Uint8Array(width * height).fill(intensity));
}

export function pixelAt(image: GrayscaleImage, col: number, row: number): number {
  if (col < 0 || row < 0 || col >= image.width || row >= image.height) {
    throw new RangeError(`Pixel (${col}, ${row}) is outside ${image.width}x${image.height}`);
  }
  return image.data[row * image.width + col];
}
