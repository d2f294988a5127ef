/**
 * Mesh topology diagnostics
 * 
 * Works on triangle soup: vertices are matched by exact coordinates.
 * A closed, consistently wound solid has every directed edge matched by
 * exactly one edge running the other way.
 */

import type { Mesh, Vec3 } from './types.js';

export interface Bounds {
  min: Vec3;
  max: Vec3;
}

export interface OpenEdge {
  from: Vec3;
  to: Vec3;
  /** Directed uses of this edge minus uses of its reverse */
  imbalance: number;
}

function pointKey(p: Vec3): string {
  return `${p.x},${p.y},${p.z}`;
}

/**
 * Directed edges that are not cancelled by exactly one opposite edge
 */
export function findOpenEdges(mesh: Mesh): OpenEdge[] {
  const counts = new Map<string, { from: Vec3; to: Vec3; count: number }>();

  for (const { vertices } of mesh) {
    for (let i = 0; i < 3; i++) {
      const from = vertices[i];
      const to = vertices[(i + 1) % 3];
      const key = `${pointKey(from)}>${pointKey(to)}`;
      const entry = counts.get(key);
      if (entry) {
        entry.count++;
      } else {
        counts.set(key, { from, to, count: 1 });
      }
    }
  }

  const open: OpenEdge[] = [];
  for (const { from, to, count } of counts.values()) {
    const reverse = counts.get(`${pointKey(to)}>${pointKey(from)}`);
    const reverseCount = reverse ? reverse.count : 0;
    if (count !== 1 || reverseCount !== 1) {
      open.push({ from, to, imbalance: count - reverseCount });
    }
  }
  return open;
}

export function isWatertight(mesh: Mesh): boolean {
  return mesh.length > 0 && findOpenEdges(mesh).length === 0;
}

/**
 * Axis-aligned bounds of all vertices, or null for an empty mesh
 */
export function meshBounds(mesh: Mesh): Bounds | null {
  if (mesh.length === 0) {
    return null;
  }

  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;
  for (const { vertices } of mesh) {
    for (const v of vertices) {
      minX = Math.min(minX, v.x);
      minY = Math.min(minY, v.y);
      minZ = Math.min(minZ, v.z);
      maxX = Math.max(maxX, v.x);
      maxY = Math.max(maxY, v.y);
      maxZ = Math.max(maxZ, v.z);
    }
  }

  return {
    min: { x: minX, y: minY, z: minZ },
    max: { x: maxX, y: maxY, z: maxZ }
  };
}
