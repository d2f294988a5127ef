/**
 * Library entry point
 */

export * from './geometry/index.js';
export * from './stl/binaryStl.js';
export * from './expressions/coordinateExpression.js';
export * from './image/grayscaleImage.js';
export * from './image/decodeImage.js';
export * from './services/lithophaneService.js';
