import type {
  IngestResult,
  MoveCommand,
  MoveRequest,
  ValidationError,
} from './types.js';
import type { EntityRegistry } from './EntityRegistry.js';
import type { MotionScheduler } from './MotionScheduler.js';
import type { FeedbackPublisher } from './FeedbackPublisher.js';
import { decodeMoveCommand } from './contracts.js';
import { Vector3 } from './Vector3.js';
import { DEFAULT_MOVE_DURATION_SECONDS } from './constants.js';

/**
 * Collaborators of CommandIngestion
 */
export interface CommandIngestionOptions {
  registry: EntityRegistry;
  scheduler: MotionScheduler;
  publisher: FeedbackPublisher;
  /** @default 2.0 */
  defaultDurationSeconds?: number;
  /** Log accepted and ignored commands */
  debug?: boolean;
}

/**
 * Substitute the default for absent or non-positive durations
 */
export function normalizeDuration(
  duration: number,
  fallback: number = DEFAULT_MOVE_DURATION_SECONDS
): number {
  return duration > 0 ? duration : fallback;
}

/**
 * Command Ingestion
 *
 * Validates raw command payloads and hands accepted moves to the scheduler.
 * Validation problems come back as `rejected` results and are never thrown.
 */
export class CommandIngestion {
  private readonly registry: EntityRegistry;
  private readonly scheduler: MotionScheduler;
  private readonly publisher: FeedbackPublisher;
  private readonly defaultDurationSeconds: number;
  private readonly debug: boolean;

  constructor(options: CommandIngestionOptions) {
    this.registry = options.registry;
    this.scheduler = options.scheduler;
    this.publisher = options.publisher;
    this.defaultDurationSeconds =
      options.defaultDurationSeconds ?? DEFAULT_MOVE_DURATION_SECONDS;
    this.debug = options.debug ?? false;
  }

  /**
   * Ingest a payload on behalf of one subscribing entity.
   * Commands addressed to any other entity are ignored.
   */
  ingest(raw: string | Uint8Array, subscriberEntityName: string): IngestResult {
    const decoded = decodeMoveCommand(raw);
    if (!decoded.ok) {
      return this.dropMalformed(decoded.error);
    }
    return this.handle(decoded.value, subscriberEntityName);
  }

  /**
   * Ingest a payload on behalf of whichever registered entity it names
   */
  dispatch(raw: string | Uint8Array): IngestResult {
    const decoded = decodeMoveCommand(raw);
    if (!decoded.ok) {
      return this.dropMalformed(decoded.error);
    }
    return this.handle(decoded.value, decoded.value.object_name);
  }

  private handle(command: MoveCommand, subscriberEntityName: string): IngestResult {
    const objectName = command.object_name;

    if (objectName !== subscriberEntityName) {
      if (this.debug) {
        console.log(
          `[INGEST] Ignoring command for '${objectName}'; subscriber is '${subscriberEntityName}'`
        );
      }
      return { status: 'ignored', reason: 'other-entity', objectName };
    }

    const current = this.registry.getPosition(objectName);
    if (!current) {
      if (this.debug) {
        console.log(`[INGEST] No controllable entity named '${objectName}'`);
      }
      return { status: 'ignored', reason: 'unknown-entity', objectName };
    }

    const target = command.target_position;
    if (!Vector3.isVec3(target)) {
      const error: ValidationError = {
        kind: 'InvalidPosition',
        message: `target_position must have 3 components, got ${target.length}`,
      };
      console.warn(
        `[INGEST] Rejecting move for '${objectName}' (ID: ${command.request_id}): ${error.message}`
      );

      const feedback = this.publisher.publishCompletion({
        objectName,
        finalPosition: current,
        status: 'failure',
        requestId: command.request_id,
      });
      return { status: 'rejected', error, requestId: command.request_id, feedback };
    }

    const request: MoveRequest = {
      objectName,
      target: Vector3.clone(target),
      durationSeconds: normalizeDuration(
        command.duration,
        this.defaultDurationSeconds
      ),
      requestId: command.request_id,
    };

    this.scheduler.submit(request);

    if (this.debug) {
      console.log(
        `[INGEST] Accepted move for '${objectName}' to ${Vector3.format(request.target)} over ${request.durationSeconds}s (ID: ${request.requestId})`
      );
    }

    return { status: 'accepted', request };
  }

  private dropMalformed(error: ValidationError): IngestResult {
    console.warn(`[INGEST] Dropping malformed move command: ${error.message}`);
    return { status: 'rejected', error, requestId: null };
  }
}
