import type {
  FeedbackChannel,
  MoveCompletion,
  MoveCompletionFeedback,
  PublishResult,
} from './types.js';
import { createFeedback, encodeMoveCompletionFeedback } from './contracts.js';
import { toPublishError } from './errors.js';
import { FEEDBACK_TOPIC } from './constants.js';

/**
 * Configuration for FeedbackPublisher
 */
export interface FeedbackPublisherOptions {
  /** @default 'scene/feedback/move_complete' */
  topic?: string;
  /** Wall clock for feedback timestamps */
  now?: () => Date;
  /** Log successful publishes */
  debug?: boolean;
}

/**
 * Feedback Publisher
 *
 * Sends completion feedback on the feedback topic. A failed send is logged
 * and returned to the caller; it is not retried here and the entity's move
 * stays complete.
 */
export class FeedbackPublisher {
  private readonly channel: FeedbackChannel;
  private readonly topic: string;
  private readonly now: () => Date;
  private readonly debug: boolean;

  constructor(channel: FeedbackChannel, options: FeedbackPublisherOptions = {}) {
    this.channel = channel;
    this.topic = options.topic ?? FEEDBACK_TOPIC;
    this.now = options.now ?? (() => new Date());
    this.debug = options.debug ?? false;
  }

  publish(feedback: MoveCompletionFeedback): PublishResult {
    const payload = encodeMoveCompletionFeedback(feedback);

    try {
      this.channel.publish(this.topic, payload);
    } catch (error) {
      const publishError = toPublishError(error, this.topic);
      console.error(
        `[FEEDBACK] Failed to publish ${feedback.status} for '${feedback.object_name}' (ID: ${feedback.request_id}): ${publishError.message}`
      );
      return { ok: false, error: publishError };
    }

    if (this.debug) {
      console.log(
        `[FEEDBACK] Published ${feedback.status} for '${feedback.object_name}' (ID: ${feedback.request_id})`
      );
    }
    return { ok: true };
  }

  /**
   * Stamp and publish a scheduler completion
   */
  publishCompletion(completion: MoveCompletion): PublishResult {
    return this.publish(createFeedback(completion, this.now()));
  }

  getTopic(): string {
    return this.topic;
  }
}
