/**
 * Lithophane service
 * 
 * Host-facing entry points: coordinate expressions as text, images as encoded
 * bytes, binary STL out. Everything runs synchronously once the image is
 * decoded; there is no cancellation, so callers that need a deadline must
 * impose one around the whole call.
 */

import type { CoordinateFunctions, DepthRange, GrayscaleImage, Mesh } from '../geometry/types.js';
import { InvalidArgumentError } from '../geometry/errors.js';
import { generatePointCloud } from '../geometry/pointCloud.js';
import { generateLithophaneMesh } from '../geometry/lithophaneMesh.js';
import { generatePreviewMesh, previewAxisCount } from '../geometry/previewMesh.js';
import { compileCoordinateExpressions, type CoordinateExpressions } from '../expressions/coordinateExpression.js';
import { decodeGrayscaleImage, readImageDimensions, type ImageDimensions } from '../image/decodeImage.js';
import { encodeBinaryStl } from '../stl/binaryStl.js';
import { Timer, time } from '../utils/timing.js';
import { debug } from '../utils/debug.js';

export interface LithophaneRequest extends CoordinateExpressions, DepthRange {
  /** Encoded image (PNG, JPEG, ...) */
  image: Buffer;
}

export interface PreviewRequest extends CoordinateExpressions {
  width: number;
  height: number;
  step: number;
}

export interface LithophaneOptions {
  /** Reject images with more pixels than this, checked before decoding */
  maxPixels?: number;
}

export interface PreviewOptions {
  /** Reject previews whose bordered grid would exceed this many vertices */
  maxVertices?: number;
}

function assertFiniteDepth(depth: DepthRange): void {
  if (!Number.isFinite(depth.whiteDepth) || !Number.isFinite(depth.blackDepth)) {
    throw new InvalidArgumentError(
      `depths must be finite numbers, got white ${depth.whiteDepth} and black ${depth.blackDepth}`
    );
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Full-resolution lithophane mesh for an already decoded image
 */
export function generateLithophane(
  functions: CoordinateFunctions,
  image: GrayscaleImage,
  depth: DepthRange
): Mesh {
  assertFiniteDepth(depth);
  if (image.width < 2 || image.height < 2) {
    return [];
  }

  const timer = new Timer(`lithophane ${image.width}x${image.height}`);
  const pointCloud = time(() => generatePointCloud(functions, image.width, image.height), 'point cloud');
  const mesh = time(() => generateLithophaneMesh(pointCloud, image, depth), 'mesh assembly');
  timer.end();

  debug('lithophane generated', { triangles: mesh.length });
  return mesh;
}

/**
 * Backing-surface preview sampled every `step` pixels
 */
export function generatePreview(
  functions: CoordinateFunctions,
  width: number,
  height: number,
  step: number
): Mesh {
  assertPositiveInteger('width', width);
  assertPositiveInteger('height', height);
  assertPositiveInteger('step', step);

  return time(() => generatePreviewMesh(functions, width, height, step), `preview ${width}x${height} step ${step}`);
}

export async function generateLithophaneStl(
  request: LithophaneRequest,
  options: LithophaneOptions = {}
): Promise<Buffer> {
  const functions = compileCoordinateExpressions(request);

  if (options.maxPixels !== undefined) {
    const { width, height } = await readImageDimensions(request.image);
    if (width * height > options.maxPixels) {
      throw new InvalidArgumentError(
        `image is ${width}x${height} (${width * height} pixels), more than the limit of ${options.maxPixels}`
      );
    }
  }

  const image = await decodeGrayscaleImage(request.image);
  const mesh = generateLithophane(functions, image, {
    whiteDepth: request.whiteDepth,
    blackDepth: request.blackDepth
  });
  return encodeBinaryStl(mesh);
}

export async function generatePreviewStl(request: PreviewRequest, options: PreviewOptions = {}): Promise<Buffer> {
  const { width, height, step } = request;
  assertPositiveInteger('width', width);
  assertPositiveInteger('height', height);
  assertPositiveInteger('step', step);

  if (options.maxVertices !== undefined) {
    const vertices = (previewAxisCount(width, step) + 2) * (previewAxisCount(height, step) + 2);
    if (vertices > options.maxVertices) {
      throw new InvalidArgumentError(
        `preview of ${width}x${height} at step ${step} samples ${vertices} vertices, more than the limit of ${options.maxVertices}`
      );
    }
  }

  const functions = compileCoordinateExpressions(request);
  return encodeBinaryStl(generatePreview(functions, width, height, step));
}

export async function getImageDimensions(image: Buffer): Promise<ImageDimensions> {
  return readImageDimensions(image);
}
