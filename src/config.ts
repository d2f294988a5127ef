/**
 * Service configuration
 * 
 * Read from environment variables (a .env file is loaded by the entry points)
 * with defaults for local use.
 */

import { isLogLevel, type LogLevel } from './utils/debug.js';

export interface LithophaneConfig {
  port: number;
  logLevel: LogLevel;
  /** Largest accepted image upload */
  maxUploadBytes: number;
  /** Largest image, in pixels, a lithophane request may decode */
  maxImagePixels: number;
  defaultWhiteDepth: number;
  defaultBlackDepth: number;
  /** Largest bordered grid a preview request may sample */
  maxPreviewVertices: number;
}

export const DEFAULT_CONFIG: LithophaneConfig = {
  port: 3001,
  logLevel: 'info',
  maxUploadBytes: 10 * 1024 * 1024, // 10MB
  maxImagePixels: 1_000_000,
  defaultWhiteDepth: 0.5,
  defaultBlackDepth: 3.0,
  maxPreviewVertices: 4_000_000
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LithophaneConfig {
  const logLevel = env.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, silent; got "${logLevel}"`);
  }

  return {
    port: readNumber(env, 'PORT', DEFAULT_CONFIG.port),
    logLevel,
    maxUploadBytes: readNumber(env, 'MAX_UPLOAD_BYTES', DEFAULT_CONFIG.maxUploadBytes),
    maxImagePixels: readNumber(env, 'MAX_IMAGE_PIXELS', DEFAULT_CONFIG.maxImagePixels),
    defaultWhiteDepth: readNumber(env, 'DEFAULT_WHITE_DEPTH', DEFAULT_CONFIG.defaultWhiteDepth),
    defaultBlackDepth: readNumber(env, 'DEFAULT_BLACK_DEPTH', DEFAULT_CONFIG.defaultBlackDepth),
    maxPreviewVertices: readNumber(env, 'MAX_PREVIEW_VERTICES', DEFAULT_CONFIG.maxPreviewVertices)
  };
}
