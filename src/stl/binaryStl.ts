/**
 * Binary STL
 *
 * Format: 80-byte header + uint32 count + 50 bytes per triangle.
 * Each record is the face normal, three vertices in winding order (all
 * float32 little-endian) and a uint16 attribute that is always 0.
 */

import type { Mesh, Triangle, Vec3 } from '../geometry/types.js';
import { StlFormatError } from '../geometry/errors.js';

export const STL_HEADER_BYTES = 80;
export const STL_RECORD_BYTES = 50;

export function binaryStlSize(triangleCount: number): number {
  return STL_HEADER_BYTES + 4 + triangleCount * STL_RECORD_BYTES;
}

function writeVec3(view: DataView, offset: number, v: Vec3): number {
  view.setFloat32(offset, v.x, true);
  view.setFloat32(offset + 4, v.y, true);
  view.setFloat32(offset + 8, v.z, true);
  return offset + 12;
}

function readVec3(view: DataView, offset: number): Vec3 {
  return {
    x: view.getFloat32(offset, true),
    y: view.getFloat32(offset + 4, true),
    z: view.getFloat32(offset + 8, true)
  };
}

/**
 * Serialize a mesh to binary STL
 * 
 * @param header - ASCII text, zero padded and cut to 80 bytes
 */
export function encodeBinaryStl(mesh: Mesh, header: string = ''): Buffer {
  const buffer = Buffer.alloc(binaryStlSize(mesh.length));
  buffer.write(header, 0, STL_HEADER_BYTES, 'ascii');

  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  view.setUint32(STL_HEADER_BYTES, mesh.length, true);

  let offset = STL_HEADER_BYTES + 4;
  for (const { normal, vertices } of mesh) {
    offset = writeVec3(view, offset, normal);
    offset = writeVec3(view, offset, vertices[0]);
    offset = writeVec3(view, offset, vertices[1]);
    offset = writeVec3(view, offset, vertices[2]);
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return buffer;
}

export interface DecodedStl {
  /** Header text with trailing NUL padding removed */
  header: string;
  triangles: Triangle[];
}

/**
 * Parse binary STL bytes
 * Normals are read as stored, not recomputed.
 */
export function decodeBinaryStl(bytes: Uint8Array): DecodedStl {
  if (bytes.byteLength < STL_HEADER_BYTES + 4) {
    throw new StlFormatError(`STL data is ${bytes.byteLength} bytes, shorter than its 84-byte header`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const count = view.getUint32(STL_HEADER_BYTES, true);
  const expected = binaryStlSize(count);
  if (bytes.byteLength !== expected) {
    throw new StlFormatError(`STL declares ${count} triangles (${expected} bytes) but has ${bytes.byteLength} bytes`);
  }

  const header = Buffer.from(bytes.buffer, bytes.byteOffset, STL_HEADER_BYTES)
    .toString('ascii')
    .replace(/\0+$/, '');

  const triangles: Triangle[] = [];
  let offset = STL_HEADER_BYTES + 4;
  for (let i = 0; i < count; i++) {
    triangles.push({
      normal: readVec3(view, offset),
      vertices: [readVec3(view, offset + 12), readVec3(view, offset + 24), readVec3(view, offset + 36)]
    });
    offset += STL_RECORD_BYTES;
  }

  return { header, triangles };
}
