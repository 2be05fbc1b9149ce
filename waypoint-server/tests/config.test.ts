import { describe, it, expect } from 'vitest';
import { validateConfig, DEFAULT_CONFIG } from '../src/index.js';

describe('validateConfig', () => {
  it('should fill in defaults', () => {
    const config = validateConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.commandTopic).toBe('scene/commands/move');
    expect(config.feedbackTopic).toBe('scene/feedback/move_complete');
    expect(config.feedbackMode).toBe('executor');
    expect(config.defaultMoveDurationSeconds).toBe(2);
  });

  it('should merge cors options', () => {
    const config = validateConfig({ cors: { origin: ['http://localhost:5173'] } });

    expect(config.cors).toEqual({ origin: ['http://localhost:5173'] });
  });

  it('should reject ports outside 1-65535', () => {
    expect(() => validateConfig({ port: 0 })).toThrow(
      'Invalid port: 0. Must be between 1 and 65535.'
    );
    expect(() => validateConfig({ port: 70000 })).toThrow('Invalid port: 70000');
  });

  it('should reject empty topics', () => {
    expect(() => validateConfig({ commandTopic: '' })).toThrow(
      'commandTopic must be a non-empty string'
    );
    expect(() => validateConfig({ feedbackTopic: '' })).toThrow(
      'feedbackTopic must be a non-empty string'
    );
  });

  it('should reject identical command and feedback topics', () => {
    expect(() =>
      validateConfig({ commandTopic: 'scene/all', feedbackTopic: 'scene/all' })
    ).toThrow("commandTopic and feedbackTopic must differ (both are 'scene/all')");
  });

  it('should reject non-positive limits and durations', () => {
    expect(() => validateConfig({ maxPayloadBytes: 0 })).toThrow(
      'Invalid maxPayloadBytes: 0. Must be positive.'
    );
    expect(() => validateConfig({ defaultMoveDurationSeconds: 0 })).toThrow(
      'Invalid defaultMoveDurationSeconds: 0. Must be positive.'
    );
    expect(() => validateConfig({ defaultMoveDurationSeconds: Number.NaN })).toThrow(
      'Invalid defaultMoveDurationSeconds: NaN'
    );
  });

  it('should require the move hook in broker feedback mode', () => {
    expect(() =>
      validateConfig({ feedbackMode: 'broker', enableMoveHook: false })
    ).toThrow("feedbackMode 'broker' requires enableMoveHook");
  });
});
