import type { MoveCompletion, MoveRequest } from './types.js';

/**
 * How a scheduler advances moves
 * - tick: interpolated over time, advanced by tick(now)
 * - instant: target reached on submit (stand-in executor)
 */
export type MotionDriver = 'tick' | 'instant';

/**
 * Called once per move that runs to completion
 */
export type CompletionHandler = (completion: MoveCompletion) => void;

/**
 * Motion Scheduler
 * Per-entity Idle/Moving state machine. Submitting to a moving entity
 * supersedes its move: the old move never completes and emits nothing.
 */
export interface MotionScheduler {
  readonly driver: MotionDriver;

  /** Start (or supersede) the move of `request.objectName` */
  submit(request: MoveRequest): void;

  /** Advance every active move to the clock reading `now` */
  tick(now?: number): void;

  isMoving(objectName: string): boolean;

  activeCount(): number;

  /** Drop every active move without feedback */
  clear(): void;
}
