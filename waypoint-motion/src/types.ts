/**
 * Waypoint Motion Types
 * Wire contracts and engine-internal shapes shared by every package
 */

import type { PublishError } from './errors.js';

/**
 * A position in scene space: [x, y, z]
 */
export type Vec3 = [number, number, number];

/**
 * Outcome reported by a completion feedback
 */
export type MoveStatus = 'success' | 'failure';

/**
 * Move command as it travels on the command topic.
 * `target_position` is kept at whatever length the sender used so that
 * ingestion can reject it with a failure feedback instead of dropping it.
 */
export interface MoveCommand {
  object_name: string;
  target_position: number[];
  /** Seconds; values <= 0 mean "use the default duration" */
  duration: number;
  request_id: string;
}

/**
 * Completion feedback as it travels on the feedback topic
 */
export interface MoveCompletionFeedback {
  object_name: string;
  final_position: Vec3;
  status: MoveStatus;
  /** UTC, `YYYY-MM-DDTHH:mm:ssZ` */
  timestamp: string;
  request_id: string;
}

/**
 * A validated command, ready for a scheduler
 */
export interface MoveRequest {
  objectName: string;
  target: Vec3;
  durationSeconds: number;
  requestId: string;
}

/**
 * The single in-flight move of an entity
 */
export interface ActiveMove {
  startPosition: Vec3;
  targetPosition: Vec3;
  /** Clock reading (ms) when the move started */
  startTime: number;
  durationMs: number;
  requestId: string;
}

/**
 * Emitted by a scheduler when a move reaches its target
 */
export interface MoveCompletion {
  objectName: string;
  finalPosition: Vec3;
  status: MoveStatus;
  requestId: string;
}

export type ValidationErrorKind = 'MalformedPayload' | 'InvalidPosition';

export interface ValidationError {
  kind: ValidationErrorKind;
  message: string;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

export type PublishResult = { ok: true } | { ok: false; error: PublishError };

/**
 * Why a command produced no state change for an entity
 * - other-entity: addressed to a different entity on a shared topic
 * - unknown-entity: no controllable entity with that name
 */
export type IgnoreReason = 'other-entity' | 'unknown-entity';

/**
 * Outcome of ingesting one raw command payload
 */
export type IngestResult =
  | { status: 'accepted'; request: MoveRequest }
  | { status: 'ignored'; reason: IgnoreReason; objectName: string }
  | {
      status: 'rejected';
      error: ValidationError;
      /** Correlation id, when the payload was parseable */
      requestId: string | null;
      /** Delivery result of the failure feedback, when one was sent */
      feedback?: PublishResult;
    };

/**
 * Anything feedback can be published on
 * Implementations throw when the message cannot be handed to the transport.
 */
export interface FeedbackChannel {
  publish(topic: string, payload: string): void;
}

/**
 * Monotonic clock in milliseconds
 */
export type Clock = () => number;
