import type { MoveRequest } from './types.js';
import type { EntityRegistry } from './EntityRegistry.js';
import type { CompletionHandler, MotionScheduler } from './MotionScheduler.js';
import { Vector3 } from './Vector3.js';

/**
 * InstantMotionScheduler - stand-in driver
 *
 * Every submitted move reaches its target immediately and completes
 * synchronously. Used when no real executor is deployed behind the broker.
 */
export class InstantMotionScheduler implements MotionScheduler {
  readonly driver = 'instant' as const;

  private readonly registry: EntityRegistry;
  private readonly onComplete: CompletionHandler;

  constructor(registry: EntityRegistry, onComplete: CompletionHandler) {
    this.registry = registry;
    this.onComplete = onComplete;
  }

  submit(request: MoveRequest): void {
    const entity = this.registry.get(request.objectName);
    if (!entity) {
      throw new Error(`Unknown entity: ${request.objectName}`);
    }

    entity.activeMove = null;
    entity.position = Vector3.clone(request.target);

    try {
      this.onComplete({
        objectName: entity.name,
        finalPosition: Vector3.clone(entity.position),
        status: 'success',
        requestId: request.requestId,
      });
    } catch (error) {
      console.error(
        `[MOTION] Error in completion handler for ${entity.name}:`,
        error
      );
    }
  }

  tick(): void {
    // Nothing is ever in flight
  }

  isMoving(_objectName: string): boolean {
    return false;
  }

  activeCount(): number {
    return 0;
  }

  clear(): void {
    // Nothing is ever in flight
  }
}
