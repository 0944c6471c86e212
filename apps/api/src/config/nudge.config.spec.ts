import { DEFAULT_NUDGE_CONFIG, loadNudgeConfig } from './nudge.config';
import { ConfigurationError } from '../common/errors';

describe('loadNudgeConfig', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadNudgeConfig({})).toEqual(DEFAULT_NUDGE_CONFIG);
  });

  it('should read overrides from the environment', () => {
    const config = loadNudgeConfig({
      PORT: '8080',
      NUDGE_MIN_INTERVAL_MINUTES: '45',
      NUDGE_MAX_PER_DAY: '3',
      NUDGE_DEFER_THRESHOLD: '0.25',
    });

    expect(config.port).toBe(8080);
    expect(config.minIntervalMinutes).toBe(45);
    expect(config.maxPerDay).toBe(3);
    expect(config.deferThreshold).toBe(0.25);
    expect(config.immediateThreshold).toBe(0.8);
  });

  it('should fall back to the default for malformed or negative numbers', () => {
    const config = loadNudgeConfig({
      NUDGE_MIN_INTERVAL_MINUTES: 'soon',
      NUDGE_NEXT_BREAK_MINUTES: '-5',
      NUDGE_DEFER_MINUTES: '   ',
    });

    expect(config.minIntervalMinutes).toBe(30);
    expect(config.nextBreakMinutes).toBe(25);
    expect(config.deferMinutes).toBe(120);
  });

  describe('integer settings', () => {
    /** TEST: a fractional or out-of-range port falls back to 3000 */
    it('should reject a fractional or out-of-range PORT', () => {
      expect(loadNudgeConfig({ PORT: '0.5' }).port).toBe(3000);
      expect(loadNudgeConfig({ PORT: '8080.7' }).port).toBe(3000);
      expect(loadNudgeConfig({ PORT: '70000' }).port).toBe(3000);
      expect(loadNudgeConfig({ PORT: '65535' }).port).toBe(65535);
    });

    it('should require whole numbers for counts', () => {
      const config = loadNudgeConfig({
        NUDGE_MAX_PER_DAY: '2.5',
        NUDGE_HISTORY_MAX_LENGTH: '10.1',
        NUDGE_DISMISSAL_BACKOFF_THRESHOLD: '1.5',
      });

      expect(config.maxPerDay).toBe(5);
      expect(config.historyMaxLength).toBe(100);
      expect(config.dismissalBackoffThreshold).toBe(2);
    });

    it('should keep fractional minutes', () => {
      expect(loadNudgeConfig({ NUDGE_DISMISSAL_WINDOW_MINUTES: '90.5' }).dismissalWindowMinutes).toBe(90.5);
    });
  });

  describe('boot-time errors', () => {
    it('should reject a threshold above 1', () => {
      expect(() => loadNudgeConfig({ NUDGE_IMMEDIATE_THRESHOLD: '1.5' })).toThrow(ConfigurationError);
    });

    it('should reject a defer threshold at or above the immediate threshold', () => {
      expect(() => loadNudgeConfig({ NUDGE_DEFER_THRESHOLD: '0.9' })).toThrow(
        'NUDGE_DEFER_THRESHOLD (0.9) must be below NUDGE_IMMEDIATE_THRESHOLD (0.8)',
      );
      expect(() => loadNudgeConfig({ NUDGE_DEFER_THRESHOLD: '0.8' })).toThrow(ConfigurationError);
    });

    it('should reject an empty history window', () => {
      expect(() => loadNudgeConfig({ NUDGE_HISTORY_MAX_LENGTH: '0' })).toThrow(
        'NUDGE_HISTORY_MAX_LENGTH must be at least 1',
      );
    });
  });
});
