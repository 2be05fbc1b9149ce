/**
 * Waypoint Broker
 * Socket.IO topic broker with a move command hook
 */

// Main class
export { Waypoint } from './Waypoint.js';

// Hooks
export { MoveCommandHook } from './hooks/MoveCommandHook.js';
export type { MoveCommandHookOptions } from './hooks/MoveCommandHook.js';

// Services
export { TopicRegistry, roomFor } from './services/TopicRegistry.js';

// Configuration
export { DEFAULT_CONFIG, FEEDBACK_MODES } from './config/defaults.js';
export { validateConfig } from './config/validation.js';

// Types for TypeScript users
export type {
  WaypointConfig,
  CorsConfig,
  FeedbackMode,
  SubscriberRole,
  PublishPacket,
  SubscribeRequest,
  SubscribeDecision,
  HookEvent,
  BrokerHook,
  SubscribeEvent,
  SubscribeAckEvent,
  UnsubscribeEvent,
  PublishEvent,
  MessageEvent,
  PublishRejectedEvent,
  ClientToServerEvents,
  ServerToClientEvents,
  WaypointEventType,
  WaypointEventHandlers,
} from './types/index.js';
