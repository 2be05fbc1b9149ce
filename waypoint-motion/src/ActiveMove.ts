/**
 * ActiveMove - time-parameterized linear move
 *
 * The move is plain data. Progress is recomputed from the clock on every
 * sample, never accumulated across ticks.
 */

import type { ActiveMove, MoveRequest, Vec3 } from './types.js';
import { Vector3, clamp01 } from './Vector3.js';

/**
 * Position of a move at a given clock reading
 */
export interface MoveSample {
  position: Vec3;
  /** Fraction of the duration elapsed, clamped to [0, 1] */
  progress: number;
  done: boolean;
}

export function startMove(
  request: MoveRequest,
  from: Vec3,
  now: number
): ActiveMove {
  return {
    startPosition: Vector3.clone(from),
    targetPosition: Vector3.clone(request.target),
    startTime: now,
    durationMs: request.durationSeconds * 1000,
    requestId: request.requestId,
  };
}

export function sampleMove(move: ActiveMove, now: number): MoveSample {
  const progress =
    move.durationMs > 0 ? clamp01((now - move.startTime) / move.durationMs) : 1;

  if (progress >= 1) {
    // Snap: no floating-point residue at the target
    return {
      position: Vector3.clone(move.targetPosition),
      progress: 1,
      done: true,
    };
  }

  return {
    position: Vector3.lerp(move.startPosition, move.targetPosition, progress),
    progress,
    done: false,
  };
}
