/**
 * TopicSocket - Socket.IO connection to a Waypoint broker
 *
 * Handles:
 * - Connection/disconnection to the broker
 * - Topic subscriptions and message routing
 * - Reconnection with retries and re-subscription of remembered topics
 * - Connection state tracking
 */

import { io, Socket } from 'socket.io-client';
import { PublishError } from 'waypoint-motion';
import { EventEmitter } from './EventEmitter.js';
import type {
  ClientToServerEvents,
  ConnectionState,
  MessageHandler,
  MessageTransport,
  ServerToClientEvents,
  SubscribeAck,
  SubscriberRole,
  TopicSocketConfig,
  TopicSocketEvents,
  Unsubscribe,
} from './types.js';

type BrokerSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * TopicSocket - publish/subscribe client for the Waypoint broker
 *
 * @example
 * ```typescript
 * const socket = new TopicSocket({ serverUrl: 'http://localhost:1883' });
 * await socket.connect();
 *
 * socket.onMessage('scene/feedback/move_complete', (payload) => {
 *   console.log(JSON.parse(payload));
 * });
 * await socket.subscribe('scene/feedback/move_complete');
 * ```
 */
export class TopicSocket
  extends EventEmitter<TopicSocketEvents>
  implements MessageTransport
{
  private socket: BrokerSocket | null = null;
  private readonly config: Required<TopicSocketConfig>;

  private connectionState: ConnectionState = 'disconnected';
  private reconnectAttempts: number = 0;
  /** Set by disconnect(); stops a reconnection loop in progress */
  private closedByUser: boolean = false;

  /** Topics to restore after reconnecting */
  private subscriptions: Map<string, SubscriberRole> = new Map();
  private messageHandlers: Map<string, Set<MessageHandler>> = new Map();

  constructor(config: TopicSocketConfig) {
    super();
    this.config = {
      connectionTimeoutMs: 10000,
      autoReconnect: true,
      maxReconnectAttempts: 5,
      reconnectDelayMs: 1000,
      debug: false,
      ...config,
    };
  }

  // ============================================
  // CONNECTION
  // ============================================

  /**
   * Connect to the broker
   */
  async connect(): Promise<void> {
    this.closedByUser = false;
    return this.open();
  }

  private async open(): Promise<void> {
    if (this.connectionState === 'connected') {
      return;
    }

    this.connectionState = 'connecting';
    this.socket?.removeAllListeners();

    const socket: BrokerSocket = io(this.config.serverUrl, {
      forceNew: true,
      reconnection: false, // We handle reconnection ourselves
    });
    this.socket = socket;

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        socket.removeAllListeners();
        socket.disconnect();
        this.connectionState = 'disconnected';
        reject(new Error('Connection timeout'));
      }, this.config.connectionTimeoutMs);

      socket.on('connect', () => {
        clearTimeout(timeout);
        this.connectionState = 'connected';
        this.reconnectAttempts = 0;
        this.setupEventHandlers(socket);
        if (this.config.debug) {
          console.log(`[TopicSocket] Connected to ${this.config.serverUrl}`);
        }
        this.emit('connected');
        resolve();
      });

      socket.on('connect_error', (error) => {
        clearTimeout(timeout);
        socket.removeAllListeners();
        socket.disconnect();
        this.connectionState = 'disconnected';
        reject(new Error(`Connection failed: ${error.message}`));
      });
    });
  }

  /**
   * Disconnect from the broker and forget all subscriptions
   */
  disconnect(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.disconnect();
      this.socket = null;
    }

    this.subscriptions.clear();
    this.closedByUser = true;
    this.connectionState = 'disconnected';
  }

  isConnected(): boolean {
    return (
      this.connectionState === 'connected' && this.socket?.connected === true
    );
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  // ============================================
  // TOPICS
  // ============================================

  /**
   * Subscribe to a topic and wait for the broker's answer.
   * Accepted topics are restored after a reconnect.
   */
  async subscribe(
    topic: string,
    role: SubscriberRole = 'observer'
  ): Promise<SubscribeAck> {
    const socket = this.ensureConnected();

    const ack = await new Promise<SubscribeAck>((resolve, reject) => {
      const timeout = setTimeout(() => {
        socket.off('subscribe-ack', ackHandler);
        reject(new Error(`Subscribe timeout: ${topic}`));
      }, this.config.connectionTimeoutMs);

      const ackHandler = (data: SubscribeAck) => {
        if (data.topic !== topic) return;
        clearTimeout(timeout);
        socket.off('subscribe-ack', ackHandler);
        resolve(data);
      };

      socket.on('subscribe-ack', ackHandler);
      socket.emit('subscribe', { topic, role });
    });

    if (ack.accepted) {
      this.subscriptions.set(topic, role);
    } else if (this.config.debug) {
      console.log(
        `[TopicSocket] Subscription to ${topic} refused: ${ack.reason ?? 'unknown reason'}`
      );
    }
    return ack;
  }

  unsubscribe(topic: string): void {
    this.subscriptions.delete(topic);
    if (this.socket && this.isConnected()) {
      this.socket.emit('unsubscribe', { topic });
    }
  }

  /**
   * Publish a raw payload
   * @throws PublishError when not connected
   */
  publish(topic: string, payload: string): void {
    if (!this.socket || !this.isConnected()) {
      throw new PublishError('Not connected to broker', topic);
    }
    this.socket.emit('publish', { topic, payload });
  }

  /**
   * Register a handler for messages on a topic.
   * Handlers survive reconnects.
   */
  onMessage(topic: string, handler: MessageHandler): Unsubscribe {
    const handlers =
      this.messageHandlers.get(topic) ?? new Set<MessageHandler>();
    this.messageHandlers.set(topic, handlers);
    handlers.add(handler);

    return () => {
      handlers.delete(handler);
    };
  }

  getSubscriptions(): string[] {
    return Array.from(this.subscriptions.keys());
  }

  // ============================================
  // RECONNECTION
  // ============================================

  /**
   * Attempt automatic reconnection with retries
   */
  async attemptReconnection(): Promise<void> {
    if (!this.config.autoReconnect) {
      throw new Error('Auto-reconnect is disabled');
    }

    const remembered = Array.from(this.subscriptions.entries());
    this.connectionState = 'reconnecting';

    while (this.reconnectAttempts < this.config.maxReconnectAttempts) {
      this.reconnectAttempts++;
      this.emit('reconnecting', this.reconnectAttempts);

      try {
        await this.delay(this.config.reconnectDelayMs);
        if (this.closedByUser) {
          return;
        }
        await this.open();
        await this.resubscribe(remembered);
        this.emit('reconnected');
        return;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(
          `[TopicSocket] Reconnection attempt ${this.reconnectAttempts} failed: ${message}`
        );
      }
    }

    this.connectionState = 'disconnected';
    this.emit('reconnectFailed');
    throw new Error('Max reconnection attempts reached');
  }

  private async resubscribe(
    remembered: [string, SubscriberRole][]
  ): Promise<void> {
    for (const [topic, role] of remembered) {
      const ack = await this.subscribe(topic, role);
      if (!ack.accepted) {
        console.warn(
          `[TopicSocket] Could not restore subscription to ${topic}: ${ack.reason ?? 'refused'}`
        );
      }
    }
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private setupEventHandlers(socket: BrokerSocket): void {
    socket.on('message', (data: unknown) => {
      this.routeMessage(data);
    });

    socket.on('publish-rejected', (data) => {
      console.warn(
        `[TopicSocket] Publish to ${data.topic} rejected: ${data.reason}`
      );
      this.emit('publishRejected', data);
    });

    socket.on('disconnect', (reason) => {
      this.connectionState = 'disconnected';
      if (this.config.debug) {
        console.log(`[TopicSocket] Disconnected: ${reason}`);
      }
      this.emit('disconnected', reason);

      if (this.config.autoReconnect) {
        this.attemptReconnection().catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[TopicSocket] Giving up on ${this.config.serverUrl}: ${message}`);
        });
      }
    });
  }

  private routeMessage(data: unknown): void {
    const topic = isRecord(data) ? data.topic : undefined;
    const payload = isRecord(data) ? data.payload : undefined;
    if (typeof topic !== 'string' || typeof payload !== 'string') {
      console.warn('[TopicSocket] Dropping message without topic or payload');
      return;
    }

    const handlers = this.messageHandlers.get(topic);
    if (!handlers) return;

    for (const handler of Array.from(handlers)) {
      try {
        handler(payload, topic);
      } catch (error) {
        console.error(`[TopicSocket] Error in message handler for ${topic}:`, error);
      }
    }
  }

  private ensureConnected(): BrokerSocket {
    if (!this.socket || !this.isConnected()) {
      throw new Error('Not connected to broker. Call connect() first.');
    }
    return this.socket;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
