import type { WaypointConfig } from '../types/index.js';
import { DEFAULT_CONFIG, FEEDBACK_MODES } from './defaults.js';

/**
 * Validates and merges user configuration with defaults
 * @param userConfig - Partial user configuration
 * @returns Complete validated configuration
 */
export function validateConfig(
  userConfig: Partial<WaypointConfig> = {}
): WaypointConfig {
  const config: WaypointConfig = {
    ...DEFAULT_CONFIG,
    ...userConfig,
    cors: {
      ...DEFAULT_CONFIG.cors,
      ...(userConfig.cors || {}),
    },
  };

  // Validate port
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new Error(
      `Invalid port: ${config.port}. Must be between 1 and 65535.`
    );
  }

  // Validate topics
  if (!config.commandTopic) {
    throw new Error('commandTopic must be a non-empty string');
  }
  if (!config.feedbackTopic) {
    throw new Error('feedbackTopic must be a non-empty string');
  }
  if (config.commandTopic === config.feedbackTopic) {
    throw new Error(
      `commandTopic and feedbackTopic must differ (both are '${config.commandTopic}')`
    );
  }

  if (config.maxPayloadBytes < 1) {
    throw new Error(
      `Invalid maxPayloadBytes: ${config.maxPayloadBytes}. Must be positive.`
    );
  }

  // Validate move hook settings
  if (!FEEDBACK_MODES.includes(config.feedbackMode)) {
    throw new Error(
      `Invalid feedbackMode: ${config.feedbackMode}. Valid modes: ${FEEDBACK_MODES.join(', ')}`
    );
  }
  if (config.feedbackMode === 'broker' && !config.enableMoveHook) {
    throw new Error("feedbackMode 'broker' requires enableMoveHook");
  }
  if (!(config.defaultMoveDurationSeconds > 0)) {
    throw new Error(
      `Invalid defaultMoveDurationSeconds: ${config.defaultMoveDurationSeconds}. Must be positive.`
    );
  }

  return config;
}
