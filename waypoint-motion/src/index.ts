/**
 * Waypoint Motion
 *
 * Move-command contracts and the motion execution engine: entity registry,
 * schedulers, command ingestion and completion feedback.
 *
 * @packageDocumentation
 */

// Contracts
export {
  decodeMoveCommand,
  encodeMoveCommand,
  decodeMoveCompletionFeedback,
  encodeMoveCompletionFeedback,
  formatTimestamp,
  createFeedback,
} from './contracts.js';
export {
  COMMAND_TOPIC,
  FEEDBACK_TOPIC,
  DEFAULT_MOVE_DURATION_SECONDS,
} from './constants.js';
export { PublishError, toPublishError } from './errors.js';

// Engine
export { Vector3, clamp01 } from './Vector3.js';
export { EntityRegistry } from './EntityRegistry.js';
export type { EntityState } from './EntityRegistry.js';
export { startMove, sampleMove } from './ActiveMove.js';
export type { MoveSample } from './ActiveMove.js';
export type {
  MotionScheduler,
  MotionDriver,
  CompletionHandler,
} from './MotionScheduler.js';
export { TickMotionScheduler } from './TickMotionScheduler.js';
export type { TickMotionSchedulerOptions } from './TickMotionScheduler.js';
export { InstantMotionScheduler } from './InstantMotionScheduler.js';
export { FeedbackPublisher } from './FeedbackPublisher.js';
export type { FeedbackPublisherOptions } from './FeedbackPublisher.js';
export { CommandIngestion, normalizeDuration } from './CommandIngestion.js';
export type { CommandIngestionOptions } from './CommandIngestion.js';

// Types
export type {
  Vec3,
  MoveStatus,
  MoveCommand,
  MoveCompletionFeedback,
  MoveRequest,
  ActiveMove,
  MoveCompletion,
  ValidationErrorKind,
  ValidationError,
  DecodeResult,
  PublishResult,
  IgnoreReason,
  IngestResult,
  FeedbackChannel,
  Clock,
} from './types.js';
