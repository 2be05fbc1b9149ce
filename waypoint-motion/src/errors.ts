/**
 * Raised when a message cannot be handed to the transport
 * (not connected, broker stopped, socket closed).
 */
export class PublishError extends Error {
  readonly topic: string;

  constructor(message: string, topic: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PublishError';
    this.topic = topic;
  }
}

/**
 * Normalize anything thrown into a PublishError for the given topic
 */
export function toPublishError(error: unknown, topic: string): PublishError {
  if (error instanceof PublishError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return new PublishError(message, topic, { cause: error });
}
