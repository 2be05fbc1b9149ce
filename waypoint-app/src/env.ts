/**
 * Environment and argument parsing for the Waypoint processes
 */

import { FEEDBACK_MODES } from 'waypoint-server';
import type { FeedbackMode, WaypointConfig } from 'waypoint-server';
import type { Vec3 } from 'waypoint-motion';

type Env = Record<string, string | undefined>;

function isFeedbackMode(value: string): value is FeedbackMode {
  return FEEDBACK_MODES.some((mode) => mode === value);
}

/**
 * Settings for an executor process
 */
export interface ExecutorEnv {
  brokerUrl: string;
  entities: Record<string, Vec3>;
  tickRate: number;
  commandTopic?: string;
  feedbackTopic?: string;
  debug: boolean;
}

/**
 * Settings for the move command line tool
 */
export interface AgentEnv {
  brokerUrl: string;
  commandTopic?: string;
  feedbackTopic?: string;
  timeoutMs: number;
  debug: boolean;
}

export function parseInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

export function parseBoolean(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Comma-separated list, trimmed, without empty items
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse `Name:x,y,z;Other:x,y,z` into starting positions
 */
export function parseEntities(value: string): Record<string, Vec3> {
  const entities: Record<string, Vec3> = {};

  for (const entry of value.split(';')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf(':');
    const name = (separator === -1 ? trimmed : trimmed.slice(0, separator)).trim();
    if (!name) {
      throw new Error(`Entity entry without a name: '${trimmed}'`);
    }
    if (Object.hasOwn(entities, name)) {
      throw new Error(`Entity listed twice: ${name}`);
    }

    if (separator === -1) {
      entities[name] = [0, 0, 0];
      continue;
    }

    const raw = trimmed.slice(separator + 1).split(',').map((part) => part.trim());
    const parts = raw.map((part) => Number(part));
    const [x, y, z] = parts;
    if (
      parts.length !== 3 ||
      raw.includes('') ||
      x === undefined ||
      y === undefined ||
      z === undefined ||
      !parts.every((part) => Number.isFinite(part))
    ) {
      throw new Error(`Entity ${name} needs a position of 3 numbers, got '${trimmed}'`);
    }
    entities[name] = [x, y, z];
  }

  if (Object.keys(entities).length === 0) {
    throw new Error('ENTITIES must name at least one entity');
  }
  return entities;
}

/**
 * Broker options from PORT, CORS_ORIGINS, FEEDBACK_MODE, COMMAND_TOPIC,
 * FEEDBACK_TOPIC, MAX_PAYLOAD_BYTES and DEBUG
 */
export function loadBrokerConfig(env: Env): Partial<WaypointConfig> {
  const config: Partial<WaypointConfig> = {
    port: parseInteger('PORT', env.PORT, 1883),
    debug: parseBoolean(env.DEBUG),
  };

  if (env.CORS_ORIGINS) {
    config.cors = { origin: parseList(env.CORS_ORIGINS), credentials: true };
  }

  if (env.FEEDBACK_MODE) {
    const mode = env.FEEDBACK_MODE.trim();
    if (!isFeedbackMode(mode)) {
      throw new Error(
        `FEEDBACK_MODE must be one of ${FEEDBACK_MODES.join(', ')}, got '${mode}'`
      );
    }
    config.feedbackMode = mode;
  }

  if (env.COMMAND_TOPIC) config.commandTopic = env.COMMAND_TOPIC;
  if (env.FEEDBACK_TOPIC) config.feedbackTopic = env.FEEDBACK_TOPIC;
  if (env.MAX_PAYLOAD_BYTES) {
    config.maxPayloadBytes = parseInteger('MAX_PAYLOAD_BYTES', env.MAX_PAYLOAD_BYTES, 0);
  }

  return config;
}

/**
 * Executor settings from BROKER_URL, ENTITIES, TICK_RATE, COMMAND_TOPIC,
 * FEEDBACK_TOPIC and DEBUG
 */
export function loadExecutorEnv(env: Env): ExecutorEnv {
  return {
    brokerUrl: env.BROKER_URL || 'http://localhost:1883',
    entities: parseEntities(env.ENTITIES || 'Cube:0,0,0'),
    tickRate: parseInteger('TICK_RATE', env.TICK_RATE, 30),
    commandTopic: env.COMMAND_TOPIC || undefined,
    feedbackTopic: env.FEEDBACK_TOPIC || undefined,
    debug: parseBoolean(env.DEBUG),
  };
}

/**
 * Move tool settings from BROKER_URL, COMMAND_TOPIC, FEEDBACK_TOPIC,
 * MOVE_TIMEOUT_MS and DEBUG
 */
export function loadAgentEnv(env: Env): AgentEnv {
  return {
    brokerUrl: env.BROKER_URL || 'http://localhost:1883',
    commandTopic: env.COMMAND_TOPIC || undefined,
    feedbackTopic: env.FEEDBACK_TOPIC || undefined,
    timeoutMs: parseInteger('MOVE_TIMEOUT_MS', env.MOVE_TIMEOUT_MS, 15000),
    debug: parseBoolean(env.DEBUG),
  };
}

export interface MoveArgs {
  objectName: string;
  target: number[];
  durationSeconds?: number;
}

/**
 * Parse `<object> <x> <y> <z> [duration]`
 */
export function parseMoveArgs(argv: readonly string[]): MoveArgs {
  const [objectName, ...rest] = argv;
  if (!objectName || rest.length < 3 || rest.length > 4) {
    throw new Error('Usage: move <object> <x> <y> <z> [duration]');
  }

  const numbers = rest.map((value) => Number(value));
  const bad = rest.find((value, index) => value.trim() === '' || !Number.isFinite(numbers[index]));
  if (bad !== undefined) {
    throw new Error(`Not a number: '${bad}'`);
  }

  return {
    objectName,
    target: numbers.slice(0, 3),
    durationSeconds: numbers[3],
  };
}
