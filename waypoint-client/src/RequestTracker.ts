/**
 * RequestTracker - correlates sent move commands with completion feedback
 */

import { decodeMoveCompletionFeedback } from 'waypoint-motion';
import type { MoveCommand, MoveCompletionFeedback } from 'waypoint-motion';

/**
 * Result of a status check
 */
export type MoveStatusCheck =
  | { status: 'completed'; requestId: string; feedback: MoveCompletionFeedback }
  | { status: 'in_progress'; requestId: string }
  | { status: 'not_found'; requestId: string };

interface TrackedRequest {
  command: MoveCommand;
  sentAt: number;
  feedback: MoveCompletionFeedback | null;
}

interface Waiter {
  resolve: (feedback: MoveCompletionFeedback) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface RequestTrackerOptions {
  /**
   * How long a request is kept without being read (default: 300000).
   * Superseded moves never get feedback, so their entries age out here.
   */
  requestTtlMs?: number;
  /** Millisecond clock (default: Date.now) */
  now?: () => number;
  /** Log completions and ignored feedback (default: false) */
  debug?: boolean;
}

/**
 * Request Tracker
 *
 * Holds one entry per tracked request id until its completion has been
 * read once, through `check` or `waitFor`, its wait times out, or it is
 * older than `requestTtlMs`. Feedback for ids that are not tracked, and
 * repeated feedback for one request, is ignored.
 */
export class RequestTracker {
  private requests: Map<string, TrackedRequest> = new Map();
  private waiters: Map<string, Waiter> = new Map();
  private readonly requestTtlMs: number;
  private readonly now: () => number;
  private readonly debug: boolean;

  constructor(options: RequestTrackerOptions = {}) {
    this.requestTtlMs = options.requestTtlMs ?? 300000;
    this.now = options.now ?? (() => Date.now());
    this.debug = options.debug ?? false;
  }

  /**
   * Start tracking a command that is about to be sent
   */
  track(command: MoveCommand): void {
    if (!command.request_id) {
      throw new Error('Cannot track a command without a request_id');
    }
    this.prune();
    this.requests.set(command.request_id, {
      command,
      sentAt: this.now(),
      feedback: null,
    });
  }

  /**
   * Stop tracking a request (e.g. when sending it failed)
   */
  forget(requestId: string): boolean {
    this.rejectWaiter(requestId, new Error(`Request ${requestId} is no longer tracked`));
    return this.requests.delete(requestId);
  }

  /**
   * Record a feedback payload
   * @returns the decoded feedback when it completed a tracked request
   */
  record(payload: string | Uint8Array): MoveCompletionFeedback | null {
    const decoded = decodeMoveCompletionFeedback(payload);
    if (!decoded.ok) {
      console.warn(`[Tracker] Dropping malformed feedback: ${decoded.error.message}`);
      return null;
    }

    const feedback = decoded.value;
    if (!feedback.request_id) {
      console.warn(
        `[Tracker] Dropping feedback without request_id for '${feedback.object_name}'`
      );
      return null;
    }

    const request = this.requests.get(feedback.request_id);
    if (!request || request.feedback) {
      if (this.debug) {
        console.log(
          `[Tracker] Ignoring ${request ? 'duplicate' : 'untracked'} feedback for ${feedback.request_id}`
        );
      }
      return null;
    }

    if (this.debug) {
      console.log(
        `[Tracker] ${feedback.request_id} finished with ${feedback.status} after ${this.now() - request.sentAt}ms`
      );
    }

    const waiter = this.waiters.get(feedback.request_id);
    if (waiter) {
      clearTimeout(waiter.timer);
      this.waiters.delete(feedback.request_id);
      this.requests.delete(feedback.request_id);
      waiter.resolve(feedback);
      return feedback;
    }

    request.feedback = feedback;
    return feedback;
  }

  /**
   * Check a request. A completed request is reported once and then
   * forgotten.
   */
  check(requestId: string): MoveStatusCheck {
    this.prune();
    const request = this.requests.get(requestId);
    if (!request) {
      return { status: 'not_found', requestId };
    }
    if (!request.feedback) {
      return { status: 'in_progress', requestId };
    }

    this.requests.delete(requestId);
    return { status: 'completed', requestId, feedback: request.feedback };
  }

  /**
   * Wait for a tracked request to complete. Consumes the completion.
   */
  waitFor(requestId: string, timeoutMs: number): Promise<MoveCompletionFeedback> {
    const result = this.check(requestId);
    if (result.status === 'completed') {
      return Promise.resolve(result.feedback);
    }
    if (result.status === 'not_found') {
      return Promise.reject(new Error(`Unknown request: ${requestId}`));
    }
    if (this.waiters.has(requestId)) {
      return Promise.reject(new Error(`Already waiting for ${requestId}`));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(requestId);
        this.requests.delete(requestId);
        reject(new Error(`Timed out after ${timeoutMs}ms waiting for ${requestId}`));
      }, timeoutMs);
      this.waiters.set(requestId, { resolve, reject, timer });
    });
  }

  pendingCount(): number {
    this.prune();
    let count = 0;
    for (const request of this.requests.values()) {
      if (!request.feedback) count++;
    }
    return count;
  }

  /**
   * Forget every request and reject open waits
   */
  clear(): void {
    for (const requestId of Array.from(this.waiters.keys())) {
      this.rejectWaiter(requestId, new Error('Request tracker cleared'));
    }
    this.requests.clear();
  }

  /**
   * Drop entries older than the TTL that nobody is waiting on
   */
  private prune(): void {
    const cutoff = this.now() - this.requestTtlMs;
    for (const [requestId, request] of this.requests) {
      if (request.sentAt > cutoff || this.waiters.has(requestId)) continue;
      this.requests.delete(requestId);
      if (this.debug) {
        console.log(`[Tracker] Expired ${requestId} after ${this.requestTtlMs}ms`);
      }
    }
  }

  private rejectWaiter(requestId: string, error: Error): void {
    const waiter = this.waiters.get(requestId);
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.waiters.delete(requestId);
    waiter.reject(error);
  }
}
