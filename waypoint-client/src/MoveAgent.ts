/**
 * MoveAgent - commander-side move tool
 *
 * Validates and publishes move commands with fresh request ids, and reads
 * back completion feedback through a RequestTracker.
 *
 * @example
 * ```typescript
 * const agent = new MoveAgent(socket);
 * await agent.start();
 *
 * const sent = agent.initiateMove('Cube', [0, 5, 0], 3);
 * if (sent.ok) {
 *   const feedback = await agent.waitForCompletion(sent.requestId);
 * }
 * ```
 */

import { randomUUID } from 'crypto';
import {
  COMMAND_TOPIC,
  FEEDBACK_TOPIC,
  DEFAULT_MOVE_DURATION_SECONDS,
  encodeMoveCommand,
  toPublishError,
} from 'waypoint-motion';
import type { MoveCommand, MoveCompletionFeedback } from 'waypoint-motion';
import { RequestTracker } from './RequestTracker.js';
import type { MoveStatusCheck } from './RequestTracker.js';
import type { MessageTransport, Unsubscribe } from './types.js';

/**
 * Configuration for MoveAgent
 */
export interface MoveAgentConfig {
  commandTopic?: string;
  feedbackTopic?: string;
  /** Duration used when initiateMove gets none (default: 2.0) */
  defaultDurationSeconds?: number;
  /** How long unanswered requests are kept (default: 300000) */
  requestTtlMs?: number;
  /** Request id generator (default: crypto.randomUUID) */
  generateId?: () => string;
  debug?: boolean;
}

/**
 * Outcome of initiateMove
 */
export type InitiateMoveResult =
  | { ok: true; requestId: string; command: MoveCommand; message: string }
  | { ok: false; error: string };

export class MoveAgent {
  private readonly transport: MessageTransport;
  private readonly tracker: RequestTracker;
  private readonly commandTopic: string;
  private readonly feedbackTopic: string;
  private readonly defaultDurationSeconds: number;
  private readonly generateId: () => string;
  private readonly debug: boolean;
  private unsubscribeFeedback: Unsubscribe | null = null;

  constructor(transport: MessageTransport, config: MoveAgentConfig = {}) {
    this.transport = transport;
    this.commandTopic = config.commandTopic ?? COMMAND_TOPIC;
    this.feedbackTopic = config.feedbackTopic ?? FEEDBACK_TOPIC;
    this.defaultDurationSeconds =
      config.defaultDurationSeconds ?? DEFAULT_MOVE_DURATION_SECONDS;
    this.generateId = config.generateId ?? (() => randomUUID());
    this.debug = config.debug ?? false;
    this.tracker = new RequestTracker({
      requestTtlMs: config.requestTtlMs,
      debug: this.debug,
    });
  }

  /**
   * Listen for completion feedback
   * @throws Error when the broker refuses the subscription
   */
  async start(): Promise<void> {
    if (this.unsubscribeFeedback) {
      return;
    }

    this.unsubscribeFeedback = this.transport.onMessage(
      this.feedbackTopic,
      (payload) => {
        this.tracker.record(payload);
      }
    );

    const ack = await this.transport.subscribe(this.feedbackTopic, 'observer');
    if (!ack.accepted) {
      this.unsubscribeFeedback();
      this.unsubscribeFeedback = null;
      throw new Error(
        `Feedback topic subscription refused: ${ack.reason ?? 'no reason given'}`
      );
    }
  }

  stop(): void {
    if (this.unsubscribeFeedback) {
      this.unsubscribeFeedback();
      this.unsubscribeFeedback = null;
      this.transport.unsubscribe(this.feedbackTopic);
    }
    this.tracker.clear();
  }

  /**
   * Validate and publish a move command
   */
  initiateMove(
    objectName: string,
    targetPosition: readonly number[],
    durationSeconds: number = this.defaultDurationSeconds
  ): InitiateMoveResult {
    if (!objectName) {
      return { ok: false, error: 'object_name must be a non-empty string' };
    }
    if (
      targetPosition.length !== 3 ||
      !targetPosition.every((value) => Number.isFinite(value))
    ) {
      return {
        ok: false,
        error: 'target_position must be a list of 3 numbers [x, y, z]',
      };
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      return { ok: false, error: 'duration must be a positive number' };
    }

    const requestId = this.generateId();
    const command: MoveCommand = {
      object_name: objectName,
      target_position: [...targetPosition],
      duration: durationSeconds,
      request_id: requestId,
    };

    this.tracker.track(command);
    try {
      this.transport.publish(this.commandTopic, encodeMoveCommand(command));
    } catch (error) {
      this.tracker.forget(requestId);
      const publishError = toPublishError(error, this.commandTopic);
      console.error(
        `[Agent] Failed to send move for '${objectName}': ${publishError.message}`
      );
      return { ok: false, error: publishError.message };
    }

    if (this.debug) {
      console.log(`[Agent] Sent move for '${objectName}' (ID: ${requestId})`);
    }
    return {
      ok: true,
      requestId,
      command,
      message: `Move command sent for '${objectName}' to [${targetPosition.join(', ')}] over ${durationSeconds}s`,
    };
  }

  checkMoveStatus(requestId: string): MoveStatusCheck {
    return this.tracker.check(requestId);
  }

  waitForCompletion(
    requestId: string,
    timeoutMs: number = 10000
  ): Promise<MoveCompletionFeedback> {
    return this.tracker.waitFor(requestId, timeoutMs);
  }

  getTracker(): RequestTracker {
    return this.tracker;
  }
}
