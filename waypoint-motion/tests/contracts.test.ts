import { describe, it, expect } from 'vitest';
import {
  decodeMoveCommand,
  encodeMoveCommand,
  decodeMoveCompletionFeedback,
  encodeMoveCompletionFeedback,
  formatTimestamp,
  createFeedback,
} from '../src/index.js';
import type { MoveCompletionFeedback } from '../src/index.js';

/**
 * Tests for the move command / completion feedback wire contracts
 */
describe('Message Contracts', () => {
  describe('decodeMoveCommand', () => {
    it('should decode a complete command', () => {
      const result = decodeMoveCommand(
        '{"object_name":"Cube","target_position":[0,5,0],"duration":3.0,"request_id":"r1"}'
      );

      expect(result).toEqual({
        ok: true,
        value: {
          object_name: 'Cube',
          target_position: [0, 5, 0],
          duration: 3,
          request_id: 'r1',
        },
      });
    });

    it('should decode a UTF-8 byte payload', () => {
      const bytes = new TextEncoder().encode(
        '{"object_name":"Cube","target_position":[1,2,3],"duration":1,"request_id":"r2"}'
      );
      const result = decodeMoveCommand(bytes);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.target_position).toEqual([1, 2, 3]);
      }
    });

    it('should default absent duration to 0 and absent request_id to empty', () => {
      const result = decodeMoveCommand(
        '{"object_name":"Cube","target_position":[1,2,3]}'
      );

      expect(result).toEqual({
        ok: true,
        value: {
          object_name: 'Cube',
          target_position: [1, 2, 3],
          duration: 0,
          request_id: '',
        },
      });
    });

    it('should keep a wrong-arity position for ingestion to reject', () => {
      const result = decodeMoveCommand(
        '{"object_name":"Cube","target_position":[1,2],"duration":1,"request_id":"r3"}'
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.target_position).toEqual([1, 2]);
      }
    });

    it('should decode a missing position as an empty position', () => {
      const result = decodeMoveCommand('{"object_name":"Cube","request_id":"r4"}');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.target_position).toEqual([]);
        expect(result.value.request_id).toBe('r4');
      }
    });

    it('should reject invalid JSON', () => {
      const result = decodeMoveCommand('{"object_name":');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('MalformedPayload');
        expect(result.error.message).toMatch(/^Invalid JSON: /);
      }
    });

    it('should reject a payload that is not an object', () => {
      expect(decodeMoveCommand('[1,2,3]')).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'Payload must be a JSON object' },
      });
      expect(decodeMoveCommand('null')).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'Payload must be a JSON object' },
      });
    });

    it('should reject a missing object_name', () => {
      expect(decodeMoveCommand('{"target_position":[0,0,0]}')).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'object_name must be a string' },
      });
    });

    it('should reject non-numeric position components', () => {
      expect(
        decodeMoveCommand('{"object_name":"Cube","target_position":["a",1,2]}')
      ).toEqual({
        ok: false,
        error: {
          kind: 'MalformedPayload',
          message: 'target_position must be an array of numbers',
        },
      });
    });

    it('should reject a non-numeric duration', () => {
      expect(
        decodeMoveCommand(
          '{"object_name":"Cube","target_position":[0,0,0],"duration":"3"}'
        )
      ).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'duration must be a number' },
      });
    });

    it('should reject a non-string request_id', () => {
      expect(
        decodeMoveCommand(
          '{"object_name":"Cube","target_position":[0,0,0],"request_id":7}'
        )
      ).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'request_id must be a string' },
      });
    });
  });

  describe('encodeMoveCommand', () => {
    it('should write the wire field names', () => {
      const payload = encodeMoveCommand({
        object_name: 'Cube',
        target_position: [0, 5, 0],
        duration: 3,
        request_id: 'r1',
      });

      expect(payload).toBe(
        '{"object_name":"Cube","target_position":[0,5,0],"duration":3,"request_id":"r1"}'
      );
    });
  });

  describe('feedback', () => {
    it('should format timestamps with seconds precision in UTC', () => {
      expect(formatTimestamp(new Date('2024-05-01T12:30:05.123Z'))).toBe(
        '2024-05-01T12:30:05Z'
      );
    });

    it('should build feedback from a completion', () => {
      const feedback = createFeedback(
        {
          objectName: 'Cube',
          finalPosition: [0, 5, 0],
          status: 'success',
          requestId: 'r1',
        },
        new Date('2024-05-01T12:30:05.999Z')
      );

      expect(feedback).toEqual({
        object_name: 'Cube',
        final_position: [0, 5, 0],
        status: 'success',
        timestamp: '2024-05-01T12:30:05Z',
        request_id: 'r1',
      });
    });

    it('should encode feedback with the wire field order', () => {
      const payload = encodeMoveCompletionFeedback({
        object_name: 'Cube',
        final_position: [0, 5, 0],
        status: 'success',
        timestamp: '2024-05-01T12:30:05Z',
        request_id: 'r1',
      });

      expect(payload).toBe(
        '{"object_name":"Cube","final_position":[0,5,0],"status":"success","timestamp":"2024-05-01T12:30:05Z","request_id":"r1"}'
      );
    });

    it('should decode what it encodes', () => {
      const feedback: MoveCompletionFeedback = {
        object_name: 'Sphere',
        final_position: [1, 1, 1],
        status: 'failure',
        timestamp: '2024-05-01T12:30:05Z',
        request_id: 'r9',
      };

      expect(
        decodeMoveCompletionFeedback(encodeMoveCompletionFeedback(feedback))
      ).toEqual({ ok: true, value: feedback });
    });

    it('should reject an unknown status', () => {
      const result = decodeMoveCompletionFeedback(
        '{"object_name":"Cube","final_position":[0,0,0],"status":"done","timestamp":"t","request_id":"r1"}'
      );

      expect(result).toEqual({
        ok: false,
        error: { kind: 'MalformedPayload', message: 'Unknown status: done' },
      });
    });

    it('should reject a final position without 3 components', () => {
      const result = decodeMoveCompletionFeedback(
        '{"object_name":"Cube","final_position":[0,0],"status":"success","timestamp":"t","request_id":"r1"}'
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'final_position must be an array of 3 numbers'
        );
      }
    });
  });
});
