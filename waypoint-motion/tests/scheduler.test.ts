import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  EntityRegistry,
  TickMotionScheduler,
  InstantMotionScheduler,
  sampleMove,
  startMove,
} from '../src/index.js';
import type { MoveCompletion, MoveRequest } from '../src/index.js';

function request(
  requestId: string,
  target: [number, number, number],
  durationSeconds: number,
  objectName = 'Cube'
): MoveRequest {
  return { objectName, target, durationSeconds, requestId };
}

/**
 * Tests for the tick-driven Idle/Moving state machine
 */
describe('TickMotionScheduler', () => {
  let now: number;
  let registry: EntityRegistry;
  let completions: MoveCompletion[];
  let scheduler: TickMotionScheduler;

  beforeEach(() => {
    now = 0;
    registry = new EntityRegistry({ Cube: [0, 0, 0], Sphere: [10, 0, 0] });
    completions = [];
    scheduler = new TickMotionScheduler(
      registry,
      (completion) => completions.push(completion),
      { clock: () => now }
    );
  });

  it('should start idle', () => {
    expect(scheduler.isMoving('Cube')).toBe(false);
    expect(scheduler.activeCount()).toBe(0);
  });

  it('should interpolate linearly from the elapsed time', () => {
    scheduler.submit(request('r1', [0, 5, 0], 3));
    expect(scheduler.isMoving('Cube')).toBe(true);

    scheduler.tick(1500);
    expect(registry.getPosition('Cube')).toEqual([0, 2.5, 0]);

    scheduler.tick(750);
    expect(registry.getPosition('Cube')).toEqual([0, 1.25, 0]);
    expect(completions).toEqual([]);
  });

  it('should report monotonic progress across frames', () => {
    scheduler.submit(request('r1', [0, 5, 0], 3));

    let previous = 0;
    for (let t = 16; t < 3000; t += 16) {
      scheduler.tick(t);
      const y = registry.getPosition('Cube')?.[1] ?? -1;
      expect(y).toBeGreaterThanOrEqual(previous);
      expect(y).toBeLessThan(5);
      previous = y;
    }
  });

  it('should snap exactly to the target and emit success once', () => {
    registry.unregister('Cube');
    registry.register('Cube', [0.1, 0.2, 0.3]);
    scheduler.submit(request('r1', [0.7, 5.3, 0.9], 3));

    for (let t = 16; t <= 3008; t += 16) {
      scheduler.tick(t);
    }
    scheduler.tick(4000);

    expect(registry.getPosition('Cube')).toEqual([0.7, 5.3, 0.9]);
    expect(scheduler.isMoving('Cube')).toBe(false);
    expect(completions).toEqual([
      {
        objectName: 'Cube',
        finalPosition: [0.7, 5.3, 0.9],
        status: 'success',
        requestId: 'r1',
      },
    ]);
  });

  it('should complete at exactly start time plus duration', () => {
    now = 500;
    scheduler.submit(request('r1', [2, 0, 0], 2));

    scheduler.tick(2499);
    expect(completions).toHaveLength(0);

    scheduler.tick(2500);
    expect(completions).toHaveLength(1);
    expect(registry.getPosition('Cube')).toEqual([2, 0, 0]);
  });

  it('should clamp ticks that arrive before the start time', () => {
    now = 1000;
    scheduler.submit(request('r1', [0, 5, 0], 1));

    scheduler.tick(900);
    expect(registry.getPosition('Cube')).toEqual([0, 0, 0]);
  });

  it('should supersede without feedback and continue from the current position', () => {
    scheduler.submit(request('r1', [0, 5, 0], 5));
    scheduler.tick(500);

    now = 1000;
    scheduler.submit(request('r2', [1, 1, 1], 2));
    expect(registry.getPosition('Cube')).toEqual([0, 1, 0]);

    scheduler.tick(2000);
    expect(registry.getPosition('Cube')).toEqual([0.5, 1, 0.5]);

    scheduler.tick(3000);
    scheduler.tick(6000);

    expect(completions).toEqual([
      {
        objectName: 'Cube',
        finalPosition: [1, 1, 1],
        status: 'success',
        requestId: 'r2',
      },
    ]);
    expect(registry.getPosition('Cube')).toEqual([1, 1, 1]);
  });

  it('should complete a move whose time ran out before the next command arrived', () => {
    scheduler.submit(request('r1', [0, 5, 0], 1));

    now = 1500;
    scheduler.submit(request('r2', [0, 5, 5], 1));

    expect(completions).toEqual([
      {
        objectName: 'Cube',
        finalPosition: [0, 5, 0],
        status: 'success',
        requestId: 'r1',
      },
    ]);
    expect(scheduler.isMoving('Cube')).toBe(true);

    scheduler.tick(2000);
    expect(registry.getPosition('Cube')).toEqual([0, 5, 2.5]);
  });

  it('should keep at most one active move per entity', () => {
    scheduler.submit(request('r1', [0, 5, 0], 5));
    scheduler.submit(request('r2', [0, 6, 0], 5));
    scheduler.submit(request('r3', [0, 7, 0], 5));

    expect(scheduler.activeCount()).toBe(1);
    expect(registry.get('Cube')?.activeMove?.requestId).toBe('r3');
  });

  it('should move entities independently', () => {
    scheduler.submit(request('r1', [0, 4, 0], 2, 'Cube'));
    scheduler.submit(request('r2', [10, 0, 4], 4, 'Sphere'));
    expect(scheduler.activeCount()).toBe(2);

    scheduler.tick(2000);
    expect(completions.map((c) => c.requestId)).toEqual(['r1']);
    expect(registry.getPosition('Sphere')).toEqual([10, 0, 2]);

    scheduler.tick(4000);
    expect(completions.map((c) => c.requestId)).toEqual(['r1', 'r2']);
  });

  it('should drop active moves on clear without feedback', () => {
    scheduler.submit(request('r1', [0, 5, 0], 2));
    scheduler.clear();
    scheduler.tick(5000);

    expect(scheduler.activeCount()).toBe(0);
    expect(completions).toEqual([]);
  });

  it('should throw for entities missing from the registry', () => {
    expect(() => scheduler.submit(request('r1', [0, 0, 0], 1, 'Ghost'))).toThrow(
      'Unknown entity: Ghost'
    );
  });

  it('should keep ticking when a completion handler throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing = new TickMotionScheduler(
      registry,
      () => {
        throw new Error('handler failed');
      },
      { clock: () => now }
    );

    failing.submit(request('r1', [1, 0, 0], 1, 'Cube'));
    failing.submit(request('r2', [11, 0, 0], 1, 'Sphere'));
    failing.tick(1000);

    expect(registry.getPosition('Cube')).toEqual([1, 0, 0]);
    expect(registry.getPosition('Sphere')).toEqual([11, 0, 0]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    errorSpy.mockRestore();
  });
});

describe('InstantMotionScheduler', () => {
  it('should reach the target and complete on submit', () => {
    const registry = new EntityRegistry({ Cube: [0, 0, 0] });
    const completions: MoveCompletion[] = [];
    const scheduler = new InstantMotionScheduler(registry, (c) =>
      completions.push(c)
    );

    scheduler.submit(request('r1', [0, 5, 0], 3));

    expect(scheduler.driver).toBe('instant');
    expect(scheduler.isMoving('Cube')).toBe(false);
    expect(registry.getPosition('Cube')).toEqual([0, 5, 0]);
    expect(completions).toEqual([
      {
        objectName: 'Cube',
        finalPosition: [0, 5, 0],
        status: 'success',
        requestId: 'r1',
      },
    ]);
  });
});

describe('ActiveMove sampling', () => {
  it('should treat a zero duration as already done', () => {
    const move = startMove(request('r1', [3, 3, 3], 0), [0, 0, 0], 100);

    expect(sampleMove(move, 100)).toEqual({
      position: [3, 3, 3],
      progress: 1,
      done: true,
    });
  });

  it('should not share tuples with the request or start position', () => {
    const from: [number, number, number] = [0, 0, 0];
    const target: [number, number, number] = [1, 1, 1];
    const move = startMove(request('r1', target, 1), from, 0);

    from[0] = 9;
    target[0] = 9;

    expect(move.startPosition).toEqual([0, 0, 0]);
    expect(move.targetPosition).toEqual([1, 1, 1]);
  });
});
