/**
 * MoveExecutor - entity-side host of the motion engine
 *
 * Subscribes to the command topic as the `executor`, applies commands to
 * its own entity registry through a tick scheduler and publishes
 * completion feedback on the same transport.
 */

import {
  COMMAND_TOPIC,
  DEFAULT_MOVE_DURATION_SECONDS,
  CommandIngestion,
  EntityRegistry,
  FeedbackPublisher,
  TickMotionScheduler,
} from 'waypoint-motion';
import type { Clock, IngestResult, MoveCompletion, Vec3 } from 'waypoint-motion';
import { EventEmitter } from './EventEmitter.js';
import { TickLoop } from './TickLoop.js';
import type { MessageTransport, MoveExecutorEvents, Unsubscribe } from './types.js';

/**
 * Configuration for MoveExecutor
 */
export interface MoveExecutorConfig {
  /** Controllable entities and their starting positions */
  entities: Record<string, Vec3>;
  /** Default: 'scene/commands/move' */
  commandTopic?: string;
  /** Default: 'scene/feedback/move_complete' */
  feedbackTopic?: string;
  /** Ticks per second when autoTick is on (default: 30) */
  tickRate?: number;
  /** Drive ticks from an internal TickLoop (default: true) */
  autoTick?: boolean;
  /** Used for absent or non-positive durations (default: 2.0) */
  defaultMoveDurationSeconds?: number;
  /** Millisecond clock shared by scheduler and tick loop */
  clock?: Clock;
  /** Wall clock for feedback timestamps */
  now?: () => Date;
  debug?: boolean;
}

export class MoveExecutor extends EventEmitter<MoveExecutorEvents> {
  private readonly transport: MessageTransport;
  private readonly commandTopic: string;
  private readonly autoTick: boolean;
  private readonly debug: boolean;

  private readonly registry: EntityRegistry;
  private readonly scheduler: TickMotionScheduler;
  private readonly publisher: FeedbackPublisher;
  private readonly ingestion: CommandIngestion;
  private readonly tickLoop: TickLoop;

  private unsubscribeMessages: Unsubscribe | null = null;
  private unsubscribeTicks: Unsubscribe | null = null;

  constructor(transport: MessageTransport, config: MoveExecutorConfig) {
    super();
    this.transport = transport;
    this.commandTopic = config.commandTopic ?? COMMAND_TOPIC;
    this.autoTick = config.autoTick ?? true;
    this.debug = config.debug ?? false;

    const clock = config.clock ?? (() => performance.now());

    this.registry = new EntityRegistry(config.entities);
    this.publisher = new FeedbackPublisher(transport, {
      topic: config.feedbackTopic,
      now: config.now,
      debug: this.debug,
    });
    this.scheduler = new TickMotionScheduler(
      this.registry,
      (completion) => this.handleCompletion(completion),
      { clock, debug: this.debug }
    );
    this.ingestion = new CommandIngestion({
      registry: this.registry,
      scheduler: this.scheduler,
      publisher: this.publisher,
      defaultDurationSeconds:
        config.defaultMoveDurationSeconds ?? DEFAULT_MOVE_DURATION_SECONDS,
      debug: this.debug,
    });
    this.tickLoop = new TickLoop({
      tickRate: config.tickRate,
      clock,
      debug: this.debug,
    });
  }

  /**
   * Subscribe to the command topic and start ticking
   * @throws Error when the broker refuses the subscription
   */
  async start(): Promise<void> {
    if (this.unsubscribeMessages) {
      return;
    }

    this.unsubscribeMessages = this.transport.onMessage(
      this.commandTopic,
      (payload) => {
        this.handleCommand(payload);
      }
    );

    const ack = await this.transport.subscribe(this.commandTopic, 'executor');
    if (!ack.accepted) {
      this.unsubscribeMessages();
      this.unsubscribeMessages = null;
      throw new Error(
        `Command topic subscription refused: ${ack.reason ?? 'no reason given'}`
      );
    }

    if (this.autoTick) {
      this.unsubscribeTicks = this.tickLoop.onTick((now) => {
        this.scheduler.tick(now);
      });
    }

    console.log(
      `[Executor] Controlling ${this.registry.names().join(', ')} on ${this.commandTopic}, feedback on ${this.publisher.getTopic()}`
    );
  }

  /**
   * Stop listening and drop active moves without feedback
   */
  stop(): void {
    if (this.unsubscribeMessages) {
      this.unsubscribeMessages();
      this.unsubscribeMessages = null;
      this.transport.unsubscribe(this.commandTopic);
    }
    if (this.unsubscribeTicks) {
      this.unsubscribeTicks();
      this.unsubscribeTicks = null;
    }
    this.scheduler.clear();
  }

  /**
   * Ingest one raw command payload
   */
  handleCommand(payload: string | Uint8Array): IngestResult {
    const result = this.ingestion.dispatch(payload);

    switch (result.status) {
      case 'accepted':
        this.emit('moveStarted', result.request);
        break;
      case 'rejected':
        this.emit('commandRejected', result.error, result.requestId);
        if (result.feedback && !result.feedback.ok) {
          this.emit('publishError', result.feedback.error);
        }
        break;
      case 'ignored':
        break;
    }
    return result;
  }

  /**
   * Advance every entity. Call from the host loop when autoTick is off.
   */
  tick(now?: number): void {
    this.scheduler.tick(now);
  }

  getPosition(name: string): Vec3 | null {
    return this.registry.getPosition(name);
  }

  isMoving(name: string): boolean {
    return this.scheduler.isMoving(name);
  }

  getEntityNames(): string[] {
    return this.registry.names();
  }

  private handleCompletion(completion: MoveCompletion): void {
    const result = this.publisher.publishCompletion(completion);
    this.emit('moveCompleted', completion);
    if (!result.ok) {
      this.emit('publishError', result.error);
    }
  }
}
