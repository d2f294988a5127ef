/**
 * Geometry Module Index
 * 
 * Exports all geometry types and utilities
 */

export * from './types.js';
export * from './errors.js';
export * from './vector.js';
export * from './triangle.js';
export * from './grid.js';
export * from './normals.js';
export * from './pointCloud.js';
export * from './lithophaneMesh.js';
export * from './previewMesh.js';
export * from './meshDiagnostics.js';
