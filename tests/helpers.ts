/**
 * Shared test fixtures
 */

import sharp from 'sharp';
import type { CoordinateFunctions } from '../src/geometry/types.js';

/** X = column, Y = row, Z = 0 */
export const flatSurface: CoordinateFunctions = {
  x: (x) => x,
  y: (_x, y) => y,
  z: () => 0
};

/** Half cylinder of radius 20 around the Y axis */
export const cylinderSurface: CoordinateFunctions = {
  x: (x, _y, w) => 20 * Math.cos((x / w) * Math.PI),
  y: (_x, y) => y,
  z: (x, _y, w) => 20 * Math.sin((x / w) * Math.PI)
};

export async function encodePng(
  width: number,
  height: number,
  data: Uint8Array,
  channels: 1 | 3 | 4 = 1
): Promise<Buffer> {
  return sharp(Buffer.from(data), { raw: { width, height, channels } }).png().toBuffer();
}
