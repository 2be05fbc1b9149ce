import {
  COMMAND_TOPIC,
  FEEDBACK_TOPIC,
  DEFAULT_MOVE_DURATION_SECONDS,
} from 'waypoint-motion';
import type { FeedbackMode, WaypointConfig } from '../types/index.js';

/**
 * Supported feedback modes
 */
export const FEEDBACK_MODES: readonly FeedbackMode[] = ['executor', 'broker'];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: WaypointConfig = {
  // Server
  port: 1883,
  cors: { origin: '*' },

  // Topics
  commandTopic: COMMAND_TOPIC,
  feedbackTopic: FEEDBACK_TOPIC,
  maxPayloadBytes: 64 * 1024,

  // Move Hook
  enableMoveHook: true,
  feedbackMode: 'executor',
  defaultMoveDurationSeconds: DEFAULT_MOVE_DURATION_SECONDS,

  debug: false,
};
