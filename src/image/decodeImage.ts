/**
 * Image decoding
 * Format detection and luma conversion via sharp
 */

import sharp from 'sharp';
import type { GrayscaleImage } from '../geometry/types.js';
import { ImageDecodeError } from '../geometry/errors.js';
import { createGrayscaleImage } from './grayscaleImage.js';

export interface ImageDimensions {
  width: number;
  height: number;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Decode any format sharp understands into an 8-bit grayscale raster
 * Alpha is discarded, not composited.
 */
export async function decodeGrayscaleImage(imageBuffer: Buffer): Promise<GrayscaleImage> {
  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(imageBuffer)
      .removeAlpha()
      .grayscale()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new ImageDecodeError(describe(error));
  }

  const { data, info } = decoded;
  const pixels = new Uint8Array(info.width * info.height);
  // libvips may keep extra bands; the first one is luma
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = data[i * info.channels];
  }

  return createGrayscaleImage(info.width, info.height, pixels);
}

/**
 * Read image dimensions from the header without decoding pixels
 */
export async function readImageDimensions(imageBuffer: Buffer): Promise<ImageDimensions> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(imageBuffer).metadata();
  } catch (error) {
    throw new ImageDecodeError(describe(error));
  }

  if (!metadata.width || !metadata.height) {
    throw new ImageDecodeError('could not read image dimensions');
  }
  return { width: metadata.width, height: metadata.height };
}
