import {
  CommandIngestion,
  EntityRegistry,
  FeedbackPublisher,
  InstantMotionScheduler,
  decodeMoveCommand,
} from 'waypoint-motion';
import type {
  FeedbackChannel,
  IngestResult,
  PublishError,
  PublishResult,
  Vec3,
} from 'waypoint-motion';
import type {
  BrokerHook,
  FeedbackMode,
  HookEvent,
  PublishPacket,
  SubscribeDecision,
  SubscribeRequest,
} from '../types/index.js';

/**
 * Configuration for MoveCommandHook
 */
export interface MoveCommandHookOptions {
  commandTopic: string;
  feedbackTopic: string;
  feedbackMode: FeedbackMode;
  defaultMoveDurationSeconds: number;
  /** Where stand-in feedback goes, normally the broker's inline publish */
  channel: FeedbackChannel;
  /** Wall clock for feedback timestamps */
  now?: () => Date;
  /** Called when stand-in feedback cannot be published */
  onFeedbackError?: (error: PublishError) => void;
  /** Shadow entities kept before the oldest is forgotten (default: 1000) */
  maxShadowEntities?: number;
  debug?: boolean;
}

/**
 * Stand-in executor state, present only in `broker` feedback mode
 */
interface StandIn {
  registry: EntityRegistry;
  ingestion: CommandIngestion;
}

/**
 * Move Command Hook
 *
 * Observes every publish on the command topic and writes an audit line.
 * In `broker` feedback mode it also executes the command against a shadow
 * registry with instant moves and publishes the completion feedback, and
 * refuses `executor` subscriptions to the command topic so there is only
 * one feedback producer.
 */
export class MoveCommandHook implements BrokerHook {
  static readonly ID = 'MoveCommandHook';

  readonly id = MoveCommandHook.ID;
  private readonly commandTopic: string;
  private readonly standIn: StandIn | null;
  private readonly onFeedbackError: (error: PublishError) => void;
  private readonly maxShadowEntities: number;
  private readonly debug: boolean;

  constructor(options: MoveCommandHookOptions) {
    this.commandTopic = options.commandTopic;
    this.onFeedbackError = options.onFeedbackError ?? (() => {});
    this.maxShadowEntities = Math.max(1, options.maxShadowEntities ?? 1000);
    this.debug = options.debug ?? false;
    this.standIn =
      options.feedbackMode === 'broker' ? this.createStandIn(options) : null;
  }

  private createStandIn(options: MoveCommandHookOptions): StandIn {
    const registry = new EntityRegistry();
    const publisher = new FeedbackPublisher(options.channel, {
      topic: options.feedbackTopic,
      now: options.now,
      debug: options.debug,
    });
    const scheduler = new InstantMotionScheduler(registry, (completion) => {
      this.checkFeedback(publisher.publishCompletion(completion));
    });
    const ingestion = new CommandIngestion({
      registry,
      scheduler,
      publisher,
      defaultDurationSeconds: options.defaultMoveDurationSeconds,
      debug: options.debug,
    });
    return { registry, ingestion };
  }

  provides(event: HookEvent): boolean {
    return event === 'publish' || this.standIn !== null;
  }

  /**
   * Audit a command and, in stand-in mode, execute it.
   * @returns the ingestion result in stand-in mode, otherwise null
   */
  onPublish(packet: PublishPacket): IngestResult | null {
    if (packet.topic !== this.commandTopic) {
      return null;
    }

    const decoded = decodeMoveCommand(packet.payload);
    if (!decoded.ok) {
      console.warn(
        `[MOVE-HOOK] Malformed move command from ${packet.clientId}: ${decoded.error.message}`
      );
      return null;
    }

    const command = decoded.value;
    console.log(
      `[MOVE-HOOK] Move '${command.object_name}' to ${JSON.stringify(command.target_position)} over ${command.duration}s (ID: ${command.request_id || '-'}, from ${packet.clientId})`
    );

    if (!this.standIn) {
      return null;
    }
    if (!command.object_name) {
      console.warn('[MOVE-HOOK] Ignoring move command without an object name');
      return null;
    }

    const { registry, ingestion } = this.standIn;
    if (!registry.has(command.object_name)) {
      const [oldest] = registry.names();
      if (registry.size >= this.maxShadowEntities && oldest !== undefined) {
        registry.unregister(oldest);
        console.warn(
          `[MOVE-HOOK] Shadow registry full (${this.maxShadowEntities}), forgetting '${oldest}'`
        );
      }
      registry.register(command.object_name);
      if (this.debug) {
        console.log(
          `[MOVE-HOOK] Tracking '${command.object_name}' at the origin`
        );
      }
    }

    const result = ingestion.dispatch(packet.payload);
    if (result.status === 'rejected' && result.feedback) {
      this.checkFeedback(result.feedback);
    }
    return result;
  }

  private checkFeedback(result: PublishResult): void {
    if (!result.ok) {
      this.onFeedbackError(result.error);
    }
  }

  onSubscribe(request: SubscribeRequest): SubscribeDecision {
    if (
      this.standIn &&
      request.topic === this.commandTopic &&
      request.role === 'executor'
    ) {
      return {
        allow: false,
        reason: "Broker answers move commands itself (feedbackMode 'broker')",
      };
    }
    return { allow: true };
  }

  /**
   * Shadow position of an entity in stand-in mode
   */
  getShadowPosition(name: string): Vec3 | null {
    return this.standIn?.registry.getPosition(name) ?? null;
  }
}
