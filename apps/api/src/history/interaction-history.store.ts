import { Inject, Injectable, Logger } from '@nestjs/common';
import { HistoryEntry, NudgeOutcome } from '@nudgeline/shared';
import { NUDGE_CONFIG, NudgeConfig } from '../config/nudge.config';
import { parseHistoryTimestamp } from '../common/utils/history-timestamp';

const MINUTE_MS = 60 * 1000;
const DAY_MINUTES = 24 * 60;

/** Appends between two idle-user sweeps */
export const HISTORY_SWEEP_EVERY = 100;

/**
 * InteractionHistoryStore
 *
 * In-memory, per-user, append-only log of delivered nudges used for
 * frequency capping. Each user's log holds at most historyMaxLength
 * entries; the oldest are dropped first.
 *
 * Every HISTORY_SWEEP_EVERY appends, users whose newest entry is older
 * than the retention window (the longest of 24h, the minimum interval and
 * the dismissal window, measured from the appended timestamp) are evicted.
 * Nothing they hold could still affect a timing decision.
 *
 * Read-modify-write sequences must run inside withUserLock(userId) so that
 * concurrent requests for the same user are serialized. Different users
 * never wait on each other.
 */
@Injectable()
export class InteractionHistoryStore {
  private readonly logger = new Logger(InteractionHistoryStore.name);
  private readonly entries = new Map<string, HistoryEntry[]>();
  private readonly locks = new Map<string, Promise<void>>();
  private appendsSinceSweep = 0;

  constructor(@Inject(NUDGE_CONFIG) private readonly config: NudgeConfig) {}

  /**
   * Snapshot copy of the user's history, oldest first.
   */
  get(userId: string): HistoryEntry[] {
    return [...(this.entries.get(userId) ?? [])];
  }

  append(userId: string, entry: HistoryEntry): void {
    const log = this.entries.get(userId) ?? [];
    log.push(
      entry.outcome === undefined
        ? { timestamp: entry.timestamp, template_id: entry.template_id }
        : { timestamp: entry.timestamp, template_id: entry.template_id, outcome: entry.outcome },
    );

    const overflow = log.length - this.config.historyMaxLength;
    if (overflow > 0) {
      log.splice(0, overflow);
      this.logger.debug(`Trimmed ${overflow} history entries for user ${userId}`);
    }
    this.entries.set(userId, log);

    this.appendsSinceSweep += 1;
    if (this.appendsSinceSweep >= HISTORY_SWEEP_EVERY) {
      this.appendsSinceSweep = 0;
      const appendedMs = parseHistoryTimestamp(entry.timestamp);
      if (appendedMs !== null) {
        this.evictIdle(appendedMs, userId);
      }
    }
  }

  /**
   * Mark the newest entry (optionally the newest for templateId) with an
   * outcome. Returns a copy of the updated entry, or undefined when the
   * user has no matching entry.
   */
  recordOutcome(userId: string, outcome: NudgeOutcome, templateId?: string): HistoryEntry | undefined {
    const log = this.entries.get(userId) ?? [];
    for (let i = log.length - 1; i >= 0; i--) {
      const current = log[i];
      if (templateId === undefined || current.template_id === templateId) {
        const updated: HistoryEntry = { ...current, outcome };
        log[i] = updated;
        return { ...updated };
      }
    }
    return undefined;
  }

  clear(userId: string): void {
    this.entries.delete(userId);
  }

  /**
   * Drop users whose newest entry is older than the retention window
   * before referenceMs. keepUserId is never evicted. Returns the number
   * of users removed.
   */
  evictIdle(referenceMs: number, keepUserId?: string): number {
    const retentionMs =
      Math.max(DAY_MINUTES, this.config.minIntervalMinutes, this.config.dismissalWindowMinutes) * MINUTE_MS;
    const cutoff = referenceMs - retentionMs;
    let evicted = 0;

    for (const [userId, log] of this.entries) {
      if (userId === keepUserId) {
        continue;
      }
      const newest = log.reduce<number | null>((latest, entry) => {
        const ms = parseHistoryTimestamp(entry.timestamp);
        return ms !== null && (latest === null || ms > latest) ? ms : latest;
      }, null);
      if (newest === null || newest < cutoff) {
        this.entries.delete(userId);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      this.logger.debug(`Evicted ${evicted} idle users from history`);
    }
    return evicted;
  }

  /** Users with at least one stored entry */
  userCount(): number {
    return this.entries.size;
  }

  /**
   * Run fn while holding the lock for userId.
   *
   * Implemented as a per-key promise chain: each caller waits for the
   * previous holder to settle. A rejected fn releases the lock and its
   * error is returned to that caller only.
   */
  async withUserLock<T>(userId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.locks.get(userId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(userId, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Drop the entry once nobody is queued behind us
      if (this.locks.get(userId) === tail) {
        this.locks.delete(userId);
      }
    }
  }

  /** Users with a lock held or queued */
  pendingLockCount(): number {
    return this.locks.size;
  }
}
