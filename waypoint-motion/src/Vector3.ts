/**
 * Vector3 - plain tuple helpers for scene positions
 *
 * @example
 * ```typescript
 * import { Vector3 } from 'waypoint-motion';
 *
 * const start = Vector3.zero();
 * const halfway = Vector3.lerp(start, [0, 5, 0], 0.5); // [0, 2.5, 0]
 * ```
 */

import type { Vec3 } from './types.js';

/**
 * Clamp a value to [0, 1]
 */
export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export const Vector3 = {
  /** Origin */
  zero: (): Vec3 => [0, 0, 0],

  /** Copy so callers never share a mutable tuple */
  clone: (v: Vec3): Vec3 => [v[0], v[1], v[2]],

  /** Narrow a number list to a position */
  isVec3: (values: readonly number[]): values is Vec3 => values.length === 3,

  /**
   * Linear interpolation, no easing.
   * `t` is clamped, so tick overshoot never passes the target.
   */
  lerp: (a: Vec3, b: Vec3, t: number): Vec3 => {
    const k = clamp01(t);
    return [
      a[0] + (b[0] - a[0]) * k,
      a[1] + (b[1] - a[1]) * k,
      a[2] + (b[2] - a[2]) * k,
    ];
  },

  /** Human-readable form for logs */
  format: (v: Vec3): string => `(${v[0]}, ${v[1]}, ${v[2]})`,
};
