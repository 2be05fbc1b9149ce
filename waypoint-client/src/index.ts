/**
 * Waypoint Client
 * Broker connection, move executor and move agent
 */

// Transport
export { TopicSocket } from './TopicSocket.js';
export { EventEmitter } from './EventEmitter.js';

// Execution
export { TickLoop } from './TickLoop.js';
export type { TickLoopConfig } from './TickLoop.js';
export { MoveExecutor } from './MoveExecutor.js';
export type { MoveExecutorConfig } from './MoveExecutor.js';

// Commanding
export { MoveAgent } from './MoveAgent.js';
export type { MoveAgentConfig, InitiateMoveResult } from './MoveAgent.js';
export { RequestTracker } from './RequestTracker.js';
export type { MoveStatusCheck, RequestTrackerOptions } from './RequestTracker.js';

// Types
export type {
  Unsubscribe,
  ConnectionState,
  SubscriberRole,
  SubscribeAck,
  TopicMessage,
  PublishRejected,
  ServerToClientEvents,
  ClientToServerEvents,
  MessageHandler,
  MessageTransport,
  TopicSocketConfig,
  TopicSocketEvents,
  MoveExecutorEvents,
  TickHandler,
} from './types.js';
