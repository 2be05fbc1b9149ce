import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { encodeMoveCompletionFeedback } from 'waypoint-motion';
import type { MoveCommand, MoveCompletionFeedback } from 'waypoint-motion';
import { RequestTracker } from '../src/RequestTracker.js';

function command(requestId: string): MoveCommand {
  return {
    object_name: 'Cube',
    target_position: [0, 5, 0],
    duration: 3,
    request_id: requestId,
  };
}

function feedback(
  requestId: string,
  status: MoveCompletionFeedback['status'] = 'success'
): MoveCompletionFeedback {
  return {
    object_name: 'Cube',
    final_position: [0, 5, 0],
    status,
    timestamp: '2024-05-01T12:00:00Z',
    request_id: requestId,
  };
}

describe('RequestTracker', () => {
  let tracker: RequestTracker;

  beforeEach(() => {
    tracker = new RequestTracker();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    tracker.clear();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should report unknown requests as not_found', () => {
    expect(tracker.check('nope')).toEqual({ status: 'not_found', requestId: 'nope' });
  });

  it('should report tracked requests as in_progress until feedback arrives', () => {
    tracker.track(command('r1'));

    expect(tracker.check('r1')).toEqual({ status: 'in_progress', requestId: 'r1' });
    expect(tracker.pendingCount()).toBe(1);
  });

  it('should report a completion once and then forget it', () => {
    tracker.track(command('r1'));

    expect(tracker.record(encodeMoveCompletionFeedback(feedback('r1')))).toEqual(
      feedback('r1')
    );
    expect(tracker.pendingCount()).toBe(0);
    expect(tracker.check('r1')).toEqual({
      status: 'completed',
      requestId: 'r1',
      feedback: feedback('r1'),
    });
    expect(tracker.check('r1')).toEqual({ status: 'not_found', requestId: 'r1' });
  });

  it('should keep the first feedback when a duplicate arrives', () => {
    tracker.track(command('r1'));

    tracker.record(encodeMoveCompletionFeedback(feedback('r1', 'success')));
    const duplicate = tracker.record(encodeMoveCompletionFeedback(feedback('r1', 'failure')));

    expect(duplicate).toBeNull();
    const result = tracker.check('r1');
    expect(result.status === 'completed' && result.feedback.status).toBe('success');
  });

  it('should ignore feedback for untracked requests', () => {
    expect(tracker.record(encodeMoveCompletionFeedback(feedback('other')))).toBeNull();
    expect(tracker.check('other').status).toBe('not_found');
  });

  it('should drop malformed feedback and feedback without a request id', () => {
    expect(tracker.record('{"object_name":"Cube"')).toBeNull();
    expect(tracker.record(encodeMoveCompletionFeedback(feedback('')))).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenLastCalledWith(
      "[Tracker] Dropping feedback without request_id for 'Cube'"
    );
  });

  it('should refuse to track commands without a request id', () => {
    expect(() => tracker.track(command(''))).toThrow(
      'Cannot track a command without a request_id'
    );
  });

  it('should keep distinct requests apart', () => {
    tracker.track(command('a'));
    tracker.track(command('b'));

    tracker.record(encodeMoveCompletionFeedback(feedback('b')));

    expect(tracker.check('a').status).toBe('in_progress');
    expect(tracker.check('b').status).toBe('completed');
  });

  describe('expiry', () => {
    let clock: number;
    let expiring: RequestTracker;

    beforeEach(() => {
      clock = 0;
      expiring = new RequestTracker({ requestTtlMs: 1000, now: () => clock });
    });

    afterEach(() => {
      expiring.clear();
    });

    it('should expire a superseded request that never gets feedback', () => {
      expiring.track(command('r1'));
      clock = 100;
      expiring.track(command('r2'));
      expiring.record(encodeMoveCompletionFeedback(feedback('r2')));

      expect(expiring.check('r2').status).toBe('completed');
      clock = 999;
      expect(expiring.pendingCount()).toBe(1);

      clock = 1000;
      expect(expiring.pendingCount()).toBe(0);
      expect(expiring.check('r1')).toEqual({ status: 'not_found', requestId: 'r1' });
    });

    it('should keep a request that is being waited on', async () => {
      expiring.track(command('r1'));
      const waiting = expiring.waitFor('r1', 60000);

      clock = 5000;
      expect(expiring.pendingCount()).toBe(1);

      expiring.record(encodeMoveCompletionFeedback(feedback('r1')));
      await expect(waiting).resolves.toEqual(feedback('r1'));
    });
  });

  describe('waitFor', () => {
    it('should resolve when the feedback arrives and consume it', async () => {
      tracker.track(command('r1'));

      const waiting = tracker.waitFor('r1', 1000);
      tracker.record(encodeMoveCompletionFeedback(feedback('r1')));

      await expect(waiting).resolves.toEqual(feedback('r1'));
      expect(tracker.check('r1').status).toBe('not_found');
    });

    it('should resolve at once for an already completed request', async () => {
      tracker.track(command('r1'));
      tracker.record(encodeMoveCompletionFeedback(feedback('r1')));

      await expect(tracker.waitFor('r1', 1000)).resolves.toEqual(feedback('r1'));
    });

    it('should reject unknown requests', async () => {
      await expect(tracker.waitFor('ghost', 1000)).rejects.toThrow('Unknown request: ghost');
    });

    it('should time out and stop tracking the request', async () => {
      vi.useFakeTimers();
      tracker.track(command('r1'));

      const waiting = tracker.waitFor('r1', 500);
      vi.advanceTimersByTime(500);

      await expect(waiting).rejects.toThrow('Timed out after 500ms waiting for r1');
      expect(tracker.check('r1').status).toBe('not_found');
      expect(tracker.record(encodeMoveCompletionFeedback(feedback('r1')))).toBeNull();
    });

    it('should leave nothing pending after every wait timed out', async () => {
      vi.useFakeTimers();
      const waits = ['r0', 'r1', 'r2'].map((id) => {
        tracker.track(command(id));
        return expect(tracker.waitFor(id, 5)).rejects.toThrow(
          `Timed out after 5ms waiting for ${id}`
        );
      });

      vi.advanceTimersByTime(5);
      await Promise.all(waits);

      expect(tracker.pendingCount()).toBe(0);
    });

    it('should reject open waits on clear', async () => {
      tracker.track(command('r1'));

      const waiting = tracker.waitFor('r1', 1000);
      tracker.clear();

      await expect(waiting).rejects.toThrow('Request tracker cleared');
    });
  });
});
