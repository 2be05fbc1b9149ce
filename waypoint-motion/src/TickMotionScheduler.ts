import type { Clock, MoveCompletion, MoveRequest } from './types.js';
import type { EntityRegistry, EntityState } from './EntityRegistry.js';
import type { CompletionHandler, MotionScheduler } from './MotionScheduler.js';
import { sampleMove, startMove } from './ActiveMove.js';
import { Vector3 } from './Vector3.js';

/**
 * Configuration for TickMotionScheduler
 */
export interface TickMotionSchedulerOptions {
  /**
   * Clock in milliseconds, used by submit() and by tick() without argument
   * @default performance.now
   */
  clock?: Clock;

  /**
   * Log every started and superseded move
   * @default false
   */
  debug?: boolean;
}

/**
 * TickMotionScheduler - interpolates moves over time
 *
 * Nothing moves between calls to tick(); a timer or frame loop owns the
 * cadence. Each tick re-evaluates every active move from its start time.
 *
 * @example
 * ```typescript
 * const scheduler = new TickMotionScheduler(registry, (done) => publish(done));
 * scheduler.submit({ objectName: 'Cube', target: [0, 5, 0], durationSeconds: 3, requestId: 'r1' });
 * setInterval(() => scheduler.tick(), 16);
 * ```
 */
export class TickMotionScheduler implements MotionScheduler {
  readonly driver = 'tick' as const;

  private readonly registry: EntityRegistry;
  private readonly onComplete: CompletionHandler;
  private readonly clock: Clock;
  private readonly debug: boolean;

  constructor(
    registry: EntityRegistry,
    onComplete: CompletionHandler,
    options: TickMotionSchedulerOptions = {}
  ) {
    this.registry = registry;
    this.onComplete = onComplete;
    this.clock = options.clock ?? (() => performance.now());
    this.debug = options.debug ?? false;
  }

  submit(request: MoveRequest): void {
    const entity = this.registry.get(request.objectName);
    if (!entity) {
      throw new Error(`Unknown entity: ${request.objectName}`);
    }

    const now = this.clock();
    let finished: MoveCompletion | null = null;

    if (entity.activeMove) {
      const sample = sampleMove(entity.activeMove, now);
      entity.position = sample.position;

      if (sample.done) {
        // Reached its end before this command arrived: it completed.
        finished = this.complete(entity, entity.activeMove.requestId);
      } else if (this.debug) {
        console.log(
          `[MOTION] ${entity.name}: move ${entity.activeMove.requestId} superseded by ${request.requestId} at ${Vector3.format(entity.position)}`
        );
      }
    }

    entity.activeMove = startMove(request, entity.position, now);

    if (this.debug) {
      console.log(
        `[MOTION] ${entity.name}: moving to ${Vector3.format(request.target)} over ${request.durationSeconds}s (ID: ${request.requestId})`
      );
    }

    if (finished) {
      this.notify(finished);
    }
  }

  tick(now: number = this.clock()): void {
    const completions: MoveCompletion[] = [];

    for (const entity of this.registry.states()) {
      const move = entity.activeMove;
      if (!move) continue;

      const sample = sampleMove(move, now);
      entity.position = sample.position;

      if (sample.done) {
        completions.push(this.complete(entity, move.requestId));
      }
    }

    // Handlers run after every entity has been advanced
    for (const completion of completions) {
      this.notify(completion);
    }
  }

  isMoving(objectName: string): boolean {
    return this.registry.isMoving(objectName);
  }

  activeCount(): number {
    let count = 0;
    for (const entity of this.registry.states()) {
      if (entity.activeMove) count++;
    }
    return count;
  }

  clear(): void {
    for (const entity of this.registry.states()) {
      entity.activeMove = null;
    }
  }

  private complete(entity: EntityState, requestId: string): MoveCompletion {
    entity.activeMove = null;
    return {
      objectName: entity.name,
      finalPosition: Vector3.clone(entity.position),
      status: 'success',
      requestId,
    };
  }

  private notify(completion: MoveCompletion): void {
    try {
      this.onComplete(completion);
    } catch (error) {
      console.error(
        `[MOTION] Error in completion handler for ${completion.objectName}:`,
        error
      );
    }
  }
}
