import { Logger } from '@nestjs/common';
import { ConfigurationError } from '../common/errors';

/**
 * Injection token for the resolved NudgeConfig.
 */
export const NUDGE_CONFIG = 'NUDGE_CONFIG';

export interface NudgeConfig {
  port: number;

  /** Frequency cap: minimum gap between two nudges for one user */
  minIntervalMinutes: number;

  /** Daily cap over a rolling 24h window */
  maxPerDay: number;

  /** Interaction history entries kept per user (oldest dropped first) */
  historyMaxLength: number;

  /** score > this → immediate */
  immediateThreshold: number;

  /** score < this → defer */
  deferThreshold: number;

  /** A deadline this close forces immediate delivery */
  deadlineImminentMinutes: number;

  nextBreakMinutes: number;
  deferMinutes: number;

  /** Dismissals inside the window that pause nudging; 0 disables */
  dismissalBackoffThreshold: number;
  dismissalWindowMinutes: number;
}

export const DEFAULT_NUDGE_CONFIG: Readonly<NudgeConfig> = Object.freeze({
  port: 3000,
  minIntervalMinutes: 30,
  maxPerDay: 5,
  historyMaxLength: 100,
  immediateThreshold: 0.8,
  deferThreshold: 0.3,
  deadlineImminentMinutes: 60,
  nextBreakMinutes: 25,
  deferMinutes: 120,
  dismissalBackoffThreshold: 2,
  dismissalWindowMinutes: 120,
});

const ENV_KEYS: Record<keyof NudgeConfig, string> = {
  port: 'PORT',
  minIntervalMinutes: 'NUDGE_MIN_INTERVAL_MINUTES',
  maxPerDay: 'NUDGE_MAX_PER_DAY',
  historyMaxLength: 'NUDGE_HISTORY_MAX_LENGTH',
  immediateThreshold: 'NUDGE_IMMEDIATE_THRESHOLD',
  deferThreshold: 'NUDGE_DEFER_THRESHOLD',
  deadlineImminentMinutes: 'NUDGE_DEADLINE_IMMINENT_MINUTES',
  nextBreakMinutes: 'NUDGE_NEXT_BREAK_MINUTES',
  deferMinutes: 'NUDGE_DEFER_MINUTES',
  dismissalBackoffThreshold: 'NUDGE_DISMISSAL_BACKOFF_THRESHOLD',
  dismissalWindowMinutes: 'NUDGE_DISMISSAL_WINDOW_MINUTES',
};

const MAX_PORT = 65535;

interface NumberRule {
  integer?: boolean;
  max?: number;
}

const logger = new Logger('NudgeConfig');

function readNumber(
  env: NodeJS.ProcessEnv,
  key: keyof NudgeConfig,
  rule: NumberRule = {},
): number {
  const envKey = ENV_KEYS[key];
  const raw = env[envKey]?.trim();
  const fallback = DEFAULT_NUDGE_CONFIG[key];

  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn(`${envKey}="${raw}" is not a non-negative number, using ${fallback}`);
    return fallback;
  }
  if (rule.integer && !Number.isInteger(value)) {
    logger.warn(`${envKey}="${raw}" is not an integer, using ${fallback}`);
    return fallback;
  }
  if (rule.max !== undefined && value > rule.max) {
    logger.warn(`${envKey}="${raw}" exceeds ${rule.max}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Resolve NudgeConfig from environment variables.
 *
 * Malformed numbers fall back to their defaults with a warning.
 * Thresholds that cannot produce a sensible decision are a boot-time
 * ConfigurationError.
 */
export function loadNudgeConfig(env: NodeJS.ProcessEnv = process.env): NudgeConfig {
  const config: NudgeConfig = {
    port: readNumber(env, 'port', { integer: true, max: MAX_PORT }),
    minIntervalMinutes: readNumber(env, 'minIntervalMinutes'),
    maxPerDay: readNumber(env, 'maxPerDay', { integer: true }),
    historyMaxLength: readNumber(env, 'historyMaxLength', { integer: true }),
    immediateThreshold: readNumber(env, 'immediateThreshold'),
    deferThreshold: readNumber(env, 'deferThreshold'),
    deadlineImminentMinutes: readNumber(env, 'deadlineImminentMinutes'),
    nextBreakMinutes: readNumber(env, 'nextBreakMinutes'),
    deferMinutes: readNumber(env, 'deferMinutes'),
    dismissalBackoffThreshold: readNumber(env, 'dismissalBackoffThreshold', { integer: true }),
    dismissalWindowMinutes: readNumber(env, 'dismissalWindowMinutes'),
  };

  if (config.immediateThreshold > 1 || config.deferThreshold > 1) {
    throw new ConfigurationError(
      `Timing thresholds must be within [0, 1] (immediate=${config.immediateThreshold}, defer=${config.deferThreshold})`,
    );
  }
  if (config.deferThreshold >= config.immediateThreshold) {
    throw new ConfigurationError(
      `${ENV_KEYS.deferThreshold} (${config.deferThreshold}) must be below ${ENV_KEYS.immediateThreshold} (${config.immediateThreshold})`,
    );
  }
  if (config.historyMaxLength < 1) {
    throw new ConfigurationError(`${ENV_KEYS.historyMaxLength} must be at least 1`);
  }

  return config;
}
