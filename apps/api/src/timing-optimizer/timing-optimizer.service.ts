import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  HistoryEntry,
  NudgeContext,
  NudgeIntensity,
  NudgeOutcome,
  PersonaConfig,
  TimingDecision,
  TimingResult,
} from '@nudgeline/shared';
import { NUDGE_CONFIG, NudgeConfig } from '../config/nudge.config';
import { parseHistoryTimestamp } from '../common/utils/history-timestamp';

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/** score < SUBTLE_BELOW → subtle, < MODERATE_BELOW → moderate, else strong */
export const SUBTLE_BELOW = 0.3;
export const MODERATE_BELOW = 0.7;

export type TimingReason =
  | 'frequency_cap'
  | 'daily_cap'
  | 'dismissal_backoff'
  | 'flow_state'
  | 'deadline_imminent'
  | 'high_score'
  | 'low_score'
  | 'default';

/**
 * TimingOptimizer
 *
 * Rule order (first match wins):
 * 1) last nudge within the persona's interval       → skip (frequency_cap)
 * 2) >= the persona's daily limit in the last 24h   → skip (daily_cap)
 * 3) recent dismissals reach the back-off threshold → skip (dismissal_backoff)
 * 4) context reports a flow state                    → skip (flow_state)
 * 5) deadline within deadlineImminentMinutes         → immediate
 * 6) score > immediateThreshold                      → immediate
 * 7) score < deferThreshold                          → defer
 * 8) otherwise                                       → next_break
 *
 * Persona interval/limit fall back to minIntervalMinutes/maxPerDay. The
 * skip gates ignore the score entirely. Deterministic given the same
 * context, score, history, now and persona.
 */
@Injectable()
export class TimingOptimizerService {
  private readonly logger = new Logger(TimingOptimizerService.name);

  constructor(@Inject(NUDGE_CONFIG) private readonly config: NudgeConfig) {}

  optimize(
    context: NudgeContext,
    score: number,
    history: readonly HistoryEntry[] = [],
    now: Date = new Date(),
    persona?: PersonaConfig,
  ): TimingResult {
    const boundedScore = Number.isFinite(score) ? Math.max(0, Math.min(1, score)) : 0;
    const { decision, reason } = this.decide(context, boundedScore, history, now.getTime(), persona);
    const delayMinutes = this.delayFor(decision);

    this.logger.debug(`Timing decision ${decision} (${reason}) at score ${boundedScore}`);

    return {
      decision,
      score: boundedScore,
      intensity: this.intensityFor(boundedScore),
      delay_minutes: delayMinutes,
      deliver_at: new Date(now.getTime() + delayMinutes * MINUTE_MS).toISOString(),
      reason,
    };
  }

  /**
   * True when the most recent entry is inside the minimum interval.
   * Future timestamps count as "just now".
   */
  isWithinMinInterval(
    history: readonly HistoryEntry[],
    nowMs: number,
    intervalMinutes: number = this.config.minIntervalMinutes,
  ): boolean {
    const latest = this.latestTimestamp(history);
    if (latest === null) {
      return false;
    }
    const elapsed = Math.max(0, nowMs - latest);
    return elapsed < intervalMinutes * MINUTE_MS;
  }

  isDailyCapReached(
    history: readonly HistoryEntry[],
    nowMs: number,
    limit: number = this.config.maxPerDay,
  ): boolean {
    if (limit <= 0) {
      return false;
    }
    return this.countSince(history, nowMs - DAY_MS) >= limit;
  }

  /**
   * Dismissed entries inside dismissalWindowMinutes. A threshold of 0
   * disables the back-off.
   */
  isBackingOff(history: readonly HistoryEntry[], nowMs: number): boolean {
    const threshold = this.config.dismissalBackoffThreshold;
    if (threshold <= 0) {
      return false;
    }
    const dismissed = history.filter((entry) => entry.outcome === NudgeOutcome.DISMISSED);
    return this.countSince(dismissed, nowMs - this.config.dismissalWindowMinutes * MINUTE_MS) >= threshold;
  }

  private decide(
    context: NudgeContext,
    score: number,
    history: readonly HistoryEntry[],
    nowMs: number,
    persona: PersonaConfig | undefined,
  ): { decision: TimingDecision; reason: TimingReason } {
    if (this.isWithinMinInterval(history, nowMs, persona?.nudge_interval_minutes)) {
      return { decision: TimingDecision.SKIP, reason: 'frequency_cap' };
    }
    if (this.isDailyCapReached(history, nowMs, persona?.daily_nudge_limit)) {
      return { decision: TimingDecision.SKIP, reason: 'daily_cap' };
    }
    if (this.isBackingOff(history, nowMs)) {
      return { decision: TimingDecision.SKIP, reason: 'dismissal_backoff' };
    }
    if (context.in_flow_state === true) {
      return { decision: TimingDecision.SKIP, reason: 'flow_state' };
    }
    if (this.isDeadlineImminent(context)) {
      return { decision: TimingDecision.IMMEDIATE, reason: 'deadline_imminent' };
    }
    if (score > this.config.immediateThreshold) {
      return { decision: TimingDecision.IMMEDIATE, reason: 'high_score' };
    }
    if (score < this.config.deferThreshold) {
      return { decision: TimingDecision.DEFER, reason: 'low_score' };
    }
    return { decision: TimingDecision.NEXT_BREAK, reason: 'default' };
  }

  private isDeadlineImminent(context: NudgeContext): boolean {
    const minutes = context.deadline_proximity_minutes;
    return (
      typeof minutes === 'number' &&
      Number.isFinite(minutes) &&
      minutes <= this.config.deadlineImminentMinutes
    );
  }

  /** Entries strictly after windowStartMs; future entries count. */
  private countSince(history: readonly HistoryEntry[], windowStartMs: number): number {
    return history.filter((entry) => {
      const ms = parseHistoryTimestamp(entry.timestamp);
      return ms !== null && ms > windowStartMs;
    }).length;
  }

  private latestTimestamp(history: readonly HistoryEntry[]): number | null {
    let latest: number | null = null;
    for (const entry of history) {
      const ms = parseHistoryTimestamp(entry.timestamp);
      if (ms !== null && (latest === null || ms > latest)) {
        latest = ms;
      }
    }
    return latest;
  }

  private delayFor(decision: TimingDecision): number {
    switch (decision) {
      case TimingDecision.NEXT_BREAK:
        return this.config.nextBreakMinutes;
      case TimingDecision.DEFER:
        return this.config.deferMinutes;
      default:
        return 0;
    }
  }

  private intensityFor(score: number): NudgeIntensity {
    if (score < SUBTLE_BELOW) {
      return NudgeIntensity.SUBTLE;
    }
    if (score < MODERATE_BELOW) {
      return NudgeIntensity.MODERATE;
    }
    return NudgeIntensity.STRONG;
  }
}
