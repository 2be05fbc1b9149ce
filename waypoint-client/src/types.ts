/**
 * Waypoint Client Types
 */

import type {
  MoveCompletion,
  MoveRequest,
  PublishError,
  ValidationError,
} from 'waypoint-motion';

/**
 * Function that removes a previously registered handler
 */
export type Unsubscribe = () => void;

/**
 * Connection state
 */
export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting';

/**
 * Role declared when subscribing to a topic.
 * Brokers acting as stand-in executors refuse `executor` on the command topic.
 */
export type SubscriberRole = 'executor' | 'observer';

// ============================================
// Wire events
// ============================================

export interface SubscribeAck {
  topic: string;
  accepted: boolean;
  reason?: string;
}

export interface TopicMessage {
  topic: string;
  payload: string;
}

export interface PublishRejected {
  topic: string;
  reason: string;
}

/**
 * Events the broker sends
 */
export interface ServerToClientEvents {
  'subscribe-ack': (data: SubscribeAck) => void;
  message: (data: TopicMessage) => void;
  'publish-rejected': (data: PublishRejected) => void;
}

/**
 * Events the client sends
 */
export interface ClientToServerEvents {
  subscribe: (data: { topic: string; role: SubscriberRole }) => void;
  unsubscribe: (data: { topic: string }) => void;
  publish: (data: TopicMessage) => void;
}

// ============================================
// Transport
// ============================================

/**
 * Handler for messages on one topic
 */
export type MessageHandler = (payload: string, topic: string) => void;

/**
 * Publish/subscribe surface executors and agents run on
 */
export interface MessageTransport {
  subscribe(topic: string, role?: SubscriberRole): Promise<SubscribeAck>;
  unsubscribe(topic: string): void;
  /** @throws PublishError when the message cannot be sent */
  publish(topic: string, payload: string): void;
  onMessage(topic: string, handler: MessageHandler): Unsubscribe;
}

/**
 * Configuration for TopicSocket
 */
export interface TopicSocketConfig {
  /** Broker URL */
  serverUrl: string;
  /** Connection timeout in milliseconds (default: 10000) */
  connectionTimeoutMs?: number;
  /** Whether to reconnect after losing the connection (default: true) */
  autoReconnect?: boolean;
  /** Maximum reconnection attempts (default: 5) */
  maxReconnectAttempts?: number;
  /** Delay between reconnection attempts in milliseconds (default: 1000) */
  reconnectDelayMs?: number;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

/**
 * TopicSocket events
 */
export interface TopicSocketEvents {
  connected: () => void;
  disconnected: (reason: string) => void;
  reconnecting: (attempt: number) => void;
  reconnected: () => void;
  reconnectFailed: () => void;
  publishRejected: (event: PublishRejected) => void;
}

/**
 * MoveExecutor events
 */
export interface MoveExecutorEvents {
  moveStarted: (request: MoveRequest) => void;
  moveCompleted: (completion: MoveCompletion) => void;
  commandRejected: (error: ValidationError, requestId: string | null) => void;
  publishError: (error: PublishError) => void;
}

/**
 * Handler for timer ticks
 * @param now Clock reading in milliseconds
 * @param dt Seconds since the previous tick
 */
export type TickHandler = (now: number, dt: number) => void;
