import { EventEmitter } from 'events';
import { Server as SocketIOServer } from 'socket.io';
import type { Socket } from 'socket.io';
import {
  createServer as createHttpServer,
  Server as HttpServer,
  IncomingMessage,
  ServerResponse,
} from 'http';
import { PublishError } from 'waypoint-motion';
import type {
  WaypointConfig,
  WaypointEventType,
  WaypointEventHandlers,
  BrokerHook,
  PublishPacket,
  SubscribeDecision,
  SubscriberRole,
  ClientToServerEvents,
  ServerToClientEvents,
} from './types/index.js';
import { validateConfig } from './config/validation.js';
import { TopicRegistry, roomFor } from './services/TopicRegistry.js';
import { MoveCommandHook } from './hooks/MoveCommandHook.js';

type BrokerServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;
type BrokerSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

const ROLES: readonly SubscriberRole[] = ['executor', 'observer'];

function isRole(value: unknown): value is SubscriberRole {
  return ROLES.some((role) => role === value);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Waypoint Broker
 * Topic publish/subscribe over Socket.IO with hooks that observe command
 * traffic before it is delivered
 */
export class Waypoint extends EventEmitter {
  private readonly config: WaypointConfig;
  private httpServer: HttpServer | null = null;
  private io: BrokerServer | null = null;
  private readonly topics: TopicRegistry = new TopicRegistry();
  private readonly hooks: BrokerHook[] = [];
  private isRunning: boolean = false;

  constructor(config?: Partial<WaypointConfig>) {
    super();
    this.config = validateConfig(config);

    if (this.config.enableMoveHook) {
      this.addHook(
        new MoveCommandHook({
          commandTopic: this.config.commandTopic,
          feedbackTopic: this.config.feedbackTopic,
          feedbackMode: this.config.feedbackMode,
          defaultMoveDurationSeconds: this.config.defaultMoveDurationSeconds,
          channel: { publish: (topic, payload) => this.publish(topic, payload) },
          onFeedbackError: (error) =>
            this.reportHookError(MoveCommandHook.ID, 'feedback', error),
          debug: this.config.debug,
        })
      );
    }
  }

  /**
   * Create HTTP server with health check endpoint
   */
  private createServer(): HttpServer {
    return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
      if (req.url === '/' || req.url === '/health') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(
          JSON.stringify({
            status: 'ok',
            timestamp: new Date().toISOString(),
            feedbackMode: this.config.feedbackMode,
          })
        );
      } else {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ error: 'Not found' }));
      }
    });
  }

  /**
   * Start the broker
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Waypoint broker is already running');
    }

    const httpServer = this.createServer();
    this.httpServer = httpServer;

    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(
      httpServer,
      {
        cors: this.config.cors,
        maxHttpBufferSize: Math.max(this.config.maxPayloadBytes * 2, 1e6),
      }
    );

    this.setupSocketHandlers(this.io);

    console.log(
      `[Waypoint] Hooks: ${this.getHookIds().join(', ') || 'none'} (feedback mode: ${this.config.feedbackMode})`
    );

    return new Promise((resolve, reject) => {
      httpServer.listen(this.config.port, () => {
        this.isRunning = true;
        console.log(`[Waypoint] Listening on port ${this.config.port}`);
        resolve();
      });

      httpServer.on('error', (err) => {
        reject(err);
      });
    });
  }

  /**
   * Stop the broker
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.io) {
      this.io.disconnectSockets(true);
    }

    // Closing the HTTP server also closes Socket.IO
    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
      this.httpServer = null;
    }

    this.io = null;
    this.topics.clear();
  }

  // ============================================
  // Hooks
  // ============================================

  /**
   * Register a hook. Hooks run in registration order.
   */
  addHook(hook: BrokerHook): void {
    if (this.hooks.some((existing) => existing.id === hook.id)) {
      throw new Error(`Hook already registered: ${hook.id}`);
    }
    this.hooks.push(hook);
  }

  removeHook(id: string): boolean {
    const index = this.hooks.findIndex((hook) => hook.id === id);
    if (index === -1) return false;
    this.hooks.splice(index, 1);
    return true;
  }

  getHookIds(): string[] {
    return this.hooks.map((hook) => hook.id);
  }

  private runPublishHooks(packet: PublishPacket): void {
    for (const hook of this.hooks) {
      if (!hook.onPublish || !hook.provides('publish')) continue;
      try {
        hook.onPublish(packet);
      } catch (error) {
        this.reportHookError(hook.id, 'publish', error);
      }
    }
  }

  private runSubscribeHooks(
    clientId: string,
    topic: string,
    role: SubscriberRole
  ): SubscribeDecision {
    for (const hook of this.hooks) {
      if (!hook.onSubscribe || !hook.provides('subscribe')) continue;
      try {
        const decision = hook.onSubscribe({ clientId, topic, role });
        if (!decision.allow) {
          return decision;
        }
      } catch (error) {
        this.reportHookError(hook.id, 'subscribe', error);
      }
    }
    return { allow: true };
  }

  private reportHookError(hookId: string, stage: string, error: unknown): void {
    const err = toError(error);
    console.error(`[Waypoint] Hook ${hookId} failed on ${stage}:`, err);
    this.emitEvent('hook-error', hookId, err);
  }

  // ============================================
  // Publishing
  // ============================================

  /**
   * Publish from the server side. Delivered to subscribers without running
   * hooks.
   * @throws PublishError when the broker is not running
   */
  publish(topic: string, payload: string): void {
    const io = this.io;
    if (!this.isRunning || !io) {
      throw new PublishError('Waypoint broker is not running', topic);
    }
    this.deliver(io, { topic, payload, clientId: 'server' });
  }

  private deliver(io: BrokerServer, packet: PublishPacket): void {
    io.to(roomFor(packet.topic)).emit('message', {
      topic: packet.topic,
      payload: packet.payload,
    });

    if (this.config.debug) {
      console.log(
        `[TOPIC] ${packet.topic} <- ${packet.clientId} (${this.topics.getSubscriberCount(packet.topic)} subscribers)`
      );
    }
    this.emitEvent('message-published', packet);
  }

  // ============================================
  // Socket handlers
  // ============================================

  private setupSocketHandlers(io: BrokerServer): void {
    io.on('connection', (socket: BrokerSocket) => {
      if (this.config.debug) {
        console.log(`[Waypoint] Client connected: ${socket.id}`);
      }
      this.emitEvent('client-connected', socket.id);

      socket.on('subscribe', (data: unknown) => {
        this.handleSubscribe(socket, data);
      });

      socket.on('unsubscribe', (data: unknown) => {
        this.handleUnsubscribe(socket, data);
      });

      socket.on('publish', (data: unknown) => {
        this.handlePublish(io, socket, data);
      });

      socket.on('disconnect', (reason) => {
        const topics = this.topics.removeClient(socket.id);
        if (this.config.debug) {
          console.log(
            `[Waypoint] Client disconnected: ${socket.id} (${reason}), dropped ${topics.length} subscriptions`
          );
        }
        this.emitEvent('client-disconnected', socket.id, reason);
      });
    });
  }

  private handleSubscribe(socket: BrokerSocket, data: unknown): void {
    const topic = readString(data, 'topic');
    if (!topic) {
      socket.emit('subscribe-ack', {
        topic: topic ?? '',
        accepted: false,
        reason: 'Invalid topic',
      });
      return;
    }

    const requestedRole = readField(data, 'role');
    const role: SubscriberRole | null =
      requestedRole === undefined ? 'observer' : isRole(requestedRole) ? requestedRole : null;
    if (!role) {
      socket.emit('subscribe-ack', {
        topic,
        accepted: false,
        reason: `Unknown role: ${String(requestedRole)}`,
      });
      return;
    }

    const decision = this.runSubscribeHooks(socket.id, topic, role);
    if (!decision.allow) {
      console.warn(
        `[TOPIC] Subscription to ${topic} as ${role} refused for ${socket.id}: ${decision.reason}`
      );
      socket.emit('subscribe-ack', {
        topic,
        accepted: false,
        reason: decision.reason,
      });
      return;
    }

    void socket.join(roomFor(topic));
    this.topics.add(socket.id, topic, role);

    if (this.config.debug) {
      console.log(`[TOPIC] ${socket.id} subscribed to ${topic} as ${role}`);
    }
    socket.emit('subscribe-ack', { topic, accepted: true });
    this.emitEvent('subscribed', socket.id, topic, role);
  }

  private handleUnsubscribe(socket: BrokerSocket, data: unknown): void {
    const topic = readString(data, 'topic');
    if (!topic) return;

    void socket.leave(roomFor(topic));
    if (this.topics.remove(socket.id, topic)) {
      this.emitEvent('unsubscribed', socket.id, topic);
    }
  }

  private handlePublish(io: BrokerServer, socket: BrokerSocket, data: unknown): void {
    const topic = readString(data, 'topic');
    const payload = readString(data, 'payload');

    if (!topic || payload === null) {
      socket.emit('publish-rejected', {
        topic: topic ?? '',
        reason: 'Missing required fields (topic, payload)',
      });
      return;
    }

    if (Buffer.byteLength(payload, 'utf8') > this.config.maxPayloadBytes) {
      socket.emit('publish-rejected', {
        topic,
        reason: `Payload exceeds ${this.config.maxPayloadBytes} bytes`,
      });
      return;
    }

    const packet: PublishPacket = { topic, payload, clientId: socket.id };
    this.runPublishHooks(packet);
    this.deliver(io, packet);
  }

  // ============================================
  // Events
  // ============================================

  /**
   * Register an event handler
   */
  override on<E extends WaypointEventType>(
    event: E,
    handler: WaypointEventHandlers[E]
  ): this {
    return super.on(event, handler);
  }

  /**
   * Remove an event handler
   */
  override off<E extends WaypointEventType>(
    event: E,
    handler: WaypointEventHandlers[E]
  ): this {
    return super.off(event, handler);
  }

  private emitEvent<E extends WaypointEventType>(
    event: E,
    ...args: Parameters<WaypointEventHandlers[E]>
  ): void {
    this.emit(event, ...args);
  }

  // ============================================
  // Introspection
  // ============================================

  getSubscriberCount(topic: string, role?: SubscriberRole): number {
    return this.topics.getSubscriberCount(topic, role);
  }

  getTopics(): string[] {
    return this.topics.getTopics();
  }

  /**
   * Get the current configuration
   */
  getConfig(): WaypointConfig {
    return { ...this.config };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readField(data: unknown, key: string): unknown {
  return isRecord(data) ? data[key] : undefined;
}

/**
 * A string field of an incoming event, or null when absent or not a string
 */
function readString(data: unknown, key: string): string | null {
  const value = readField(data, key);
  return typeof value === 'string' ? value : null;
}
