/**
 * Timing utilities
 * Stage durations, reported at debug level
 */

import { debug } from './debug.js';

export function time<T>(fn: () => T, label: string): T {
  const start = performance.now();
  const result = fn();
  debug(`${label}: ${(performance.now() - start).toFixed(2)}ms`);
  return result;
}

export class Timer {
  private label: string;
  private start: number;

  constructor(label: string) {
    this.label = label;
    this.start = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.start;
    debug(`${this.label}: ${duration.toFixed(2)}ms`);
    return duration;
  }
}
