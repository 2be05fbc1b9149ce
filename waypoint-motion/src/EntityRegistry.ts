import type { ActiveMove, Vec3 } from './types.js';
import { Vector3 } from './Vector3.js';

/**
 * Controllable state of one entity.
 * `position` and `activeMove` are written only by the entity's scheduler.
 */
export interface EntityState {
  readonly name: string;
  position: Vec3;
  activeMove: ActiveMove | null;
}

/**
 * Entity Registry
 * Owned map of entity name to controllable state. Each executor (or broker
 * stand-in) holds its own instance.
 */
export class EntityRegistry {
  private readonly entities: Map<string, EntityState> = new Map();

  constructor(initial: Record<string, Vec3> = {}) {
    for (const [name, position] of Object.entries(initial)) {
      this.register(name, position);
    }
  }

  /**
   * Add an entity at a starting position
   */
  register(name: string, position: Vec3 = Vector3.zero()): EntityState {
    if (!name) {
      throw new Error('Entity name must be a non-empty string');
    }
    if (this.entities.has(name)) {
      throw new Error(`Entity already registered: ${name}`);
    }

    const state: EntityState = {
      name,
      position: Vector3.clone(position),
      activeMove: null,
    };
    this.entities.set(name, state);
    return state;
  }

  /**
   * Get an entity, registering it at `position` when it is not known yet
   */
  ensure(name: string, position: Vec3 = Vector3.zero()): EntityState {
    return this.entities.get(name) ?? this.register(name, position);
  }

  unregister(name: string): boolean {
    return this.entities.delete(name);
  }

  has(name: string): boolean {
    return this.entities.has(name);
  }

  get(name: string): EntityState | undefined {
    return this.entities.get(name);
  }

  /**
   * Snapshot of the current (possibly mid-move) position
   */
  getPosition(name: string): Vec3 | null {
    const state = this.entities.get(name);
    return state ? Vector3.clone(state.position) : null;
  }

  isMoving(name: string): boolean {
    return this.entities.get(name)?.activeMove != null;
  }

  names(): string[] {
    return Array.from(this.entities.keys());
  }

  states(): IterableIterator<EntityState> {
    return this.entities.values();
  }

  get size(): number {
    return this.entities.size;
  }
}
