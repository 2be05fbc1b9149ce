/**
 * Message Contracts
 *
 * Decoding and encoding of the two wire payloads. Decoding is strict:
 * a payload either yields a complete command or a MalformedPayload error,
 * never a partially populated value.
 */

import type {
  DecodeResult,
  MoveCommand,
  MoveCompletion,
  MoveCompletionFeedback,
  ValidationError,
} from './types.js';
import { Vector3 } from './Vector3.js';

function malformed(message: string): { ok: false; error: ValidationError } {
  return { ok: false, error: { kind: 'MalformedPayload', message } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseJson(raw: string | Uint8Array): DecodeResult<unknown> {
  const text = typeof raw === 'string' ? raw : new TextDecoder().decode(raw);
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return malformed(`Invalid JSON: ${message}`);
  }
}

/**
 * Decode a command payload
 */
export function decodeMoveCommand(
  raw: string | Uint8Array
): DecodeResult<MoveCommand> {
  const parsed = parseJson(raw);
  if (!parsed.ok) return parsed;

  const payload = parsed.value;
  if (!isRecord(payload)) {
    return malformed('Payload must be a JSON object');
  }

  const objectName = payload.object_name;
  if (typeof objectName !== 'string') {
    return malformed('object_name must be a string');
  }

  const requestId =
    payload.request_id === undefined || payload.request_id === null
      ? ''
      : payload.request_id;
  if (typeof requestId !== 'string') {
    return malformed('request_id must be a string');
  }

  // A missing position is an arity problem (reported with feedback),
  // a non-numeric one is undecodable.
  let targetPosition: number[] = [];
  const rawPosition = payload.target_position;
  if (rawPosition !== undefined && rawPosition !== null) {
    if (!Array.isArray(rawPosition) || !rawPosition.every(isFiniteNumber)) {
      return malformed('target_position must be an array of numbers');
    }
    targetPosition = [...rawPosition];
  }

  const duration =
    payload.duration === undefined || payload.duration === null
      ? 0
      : payload.duration;
  if (!isFiniteNumber(duration)) {
    return malformed('duration must be a number');
  }

  return {
    ok: true,
    value: {
      object_name: objectName,
      target_position: targetPosition,
      duration,
      request_id: requestId,
    },
  };
}

/**
 * Encode a command payload (agent side)
 */
export function encodeMoveCommand(command: MoveCommand): string {
  return JSON.stringify({
    object_name: command.object_name,
    target_position: command.target_position,
    duration: command.duration,
    request_id: command.request_id,
  });
}

/**
 * Decode a feedback payload (agent side)
 */
export function decodeMoveCompletionFeedback(
  raw: string | Uint8Array
): DecodeResult<MoveCompletionFeedback> {
  const parsed = parseJson(raw);
  if (!parsed.ok) return parsed;

  const payload = parsed.value;
  if (!isRecord(payload)) {
    return malformed('Payload must be a JSON object');
  }

  const { object_name, final_position, status, timestamp, request_id } =
    payload;

  if (typeof object_name !== 'string') {
    return malformed('object_name must be a string');
  }
  if (
    !Array.isArray(final_position) ||
    !final_position.every(isFiniteNumber) ||
    !Vector3.isVec3(final_position)
  ) {
    return malformed('final_position must be an array of 3 numbers');
  }
  if (status !== 'success' && status !== 'failure') {
    return malformed(`Unknown status: ${String(status)}`);
  }
  if (typeof timestamp !== 'string') {
    return malformed('timestamp must be a string');
  }
  if (typeof request_id !== 'string') {
    return malformed('request_id must be a string');
  }

  return {
    ok: true,
    value: {
      object_name,
      final_position: Vector3.clone(final_position),
      status,
      timestamp,
      request_id,
    },
  };
}

/**
 * Encode a feedback payload. Total for any well-formed value.
 */
export function encodeMoveCompletionFeedback(
  feedback: MoveCompletionFeedback
): string {
  return JSON.stringify({
    object_name: feedback.object_name,
    final_position: feedback.final_position,
    status: feedback.status,
    timestamp: feedback.timestamp,
    request_id: feedback.request_id,
  });
}

/**
 * UTC timestamp with seconds precision, e.g. `2024-05-01T12:30:05Z`
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Build the wire feedback for a completion
 */
export function createFeedback(
  completion: MoveCompletion,
  at: Date = new Date()
): MoveCompletionFeedback {
  return {
    object_name: completion.objectName,
    final_position: Vector3.clone(completion.finalPosition),
    status: completion.status,
    timestamp: formatTimestamp(at),
    request_id: completion.requestId,
  };
}
