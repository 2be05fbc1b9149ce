/**
 * Waypoint Broker Types
 * All exported types for TypeScript users
 */

/**
 * CORS configuration
 */
export interface CorsConfig {
  origin: string | string[];
  methods?: string[];
  credentials?: boolean;
}

/**
 * Which process answers move commands with completion feedback.
 * - `executor`: entity-side executors own feedback, the broker only observes
 * - `broker`: the broker's move hook stands in as the executor
 */
export type FeedbackMode = 'executor' | 'broker';

/**
 * Full broker configuration
 */
export interface WaypointConfig {
  // === Server ===
  port: number;
  cors: CorsConfig;

  // === Topics ===
  commandTopic: string;
  feedbackTopic: string;
  maxPayloadBytes: number;

  // === Move Hook ===
  enableMoveHook: boolean;
  feedbackMode: FeedbackMode;
  defaultMoveDurationSeconds: number;

  // === Logging ===
  debug: boolean;
}

/**
 * Role a subscriber declares for a topic
 */
export type SubscriberRole = 'executor' | 'observer';

/**
 * A message accepted for delivery
 */
export interface PublishPacket {
  topic: string;
  payload: string;
  /** Socket ID of the publisher */
  clientId: string;
}

/**
 * A subscription about to be granted
 */
export interface SubscribeRequest {
  topic: string;
  role: SubscriberRole;
  clientId: string;
}

/**
 * Hook verdict on a subscription
 */
export type SubscribeDecision =
  | { allow: true }
  | { allow: false; reason: string };

/**
 * Points in the broker lifecycle a hook can take part in
 */
export type HookEvent = 'publish' | 'subscribe';

/**
 * Broker extension run before message delivery
 */
export interface BrokerHook {
  readonly id: string;
  provides(event: HookEvent): boolean;
  onPublish?(packet: PublishPacket): void;
  onSubscribe?(request: SubscribeRequest): SubscribeDecision;
}

// ============================================
// Wire events
// ============================================

export interface SubscribeEvent {
  topic: string;
  role?: SubscriberRole;
}

export interface SubscribeAckEvent {
  topic: string;
  accepted: boolean;
  reason?: string;
}

export interface UnsubscribeEvent {
  topic: string;
}

export interface PublishEvent {
  topic: string;
  payload: string;
}

export interface MessageEvent {
  topic: string;
  payload: string;
}

export interface PublishRejectedEvent {
  topic: string;
  reason: string;
}

export interface ClientToServerEvents {
  subscribe: (data: SubscribeEvent) => void;
  unsubscribe: (data: UnsubscribeEvent) => void;
  publish: (data: PublishEvent) => void;
}

export interface ServerToClientEvents {
  'subscribe-ack': (data: SubscribeAckEvent) => void;
  message: (data: MessageEvent) => void;
  'publish-rejected': (data: PublishRejectedEvent) => void;
}

// ============================================
// Broker events
// ============================================

/**
 * Available Waypoint events
 */
export type WaypointEventType =
  | 'client-connected'
  | 'client-disconnected'
  | 'subscribed'
  | 'unsubscribed'
  | 'message-published'
  | 'hook-error';

/**
 * Event handler types
 */
export interface WaypointEventHandlers {
  'client-connected': (clientId: string) => void;
  'client-disconnected': (clientId: string, reason: string) => void;
  subscribed: (clientId: string, topic: string, role: SubscriberRole) => void;
  unsubscribed: (clientId: string, topic: string) => void;
  'message-published': (packet: PublishPacket) => void;
  'hook-error': (hookId: string, error: Error) => void;
}
