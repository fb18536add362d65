import type { AppConfig } from '../config/index.js';
import type { ProgressRecord } from '../domain/progress.js';

export type PostingPolicy = {
  monthlyLimit: number;
  timeGateEnabled: boolean;
  minIntervalMs: number;
};

export type GateDecision =
  | { allowed: true }
  | { allowed: false; reason: 'monthly_limit_reached'; postedThisMonth: number; limit: number }
  | { allowed: false; reason: 'too_soon'; minutesRemaining: number };

function assertFiniteInt(n: number, label: string): number {
  if (!Number.isFinite(n)) throw new Error(`${label} must be finite`);
  return Math.trunc(n);
}

export function getPostingPolicy(cfg: Pick<AppConfig, 'monthlyVerseLimit' | 'timeGateEnabled' | 'minPostIntervalMinutes'>): PostingPolicy {
  const minutes = Math.max(0, assertFiniteInt(cfg.minPostIntervalMinutes, 'minPostIntervalMinutes'));
  return {
    monthlyLimit: Math.max(0, assertFiniteInt(cfg.monthlyVerseLimit, 'monthlyVerseLimit')),
    timeGateEnabled: cfg.timeGateEnabled,
    minIntervalMs: minutes * 60_000,
  };
}

/** Parses last_post_time; undefined when absent or not a date. */
export function parseLastPostTime(record: ProgressRecord): number | undefined {
  if (!record.lastPostTime) return undefined;
  const ms = Date.parse(record.lastPostTime);
  return Number.isFinite(ms) ? ms : undefined;
}

export function evaluatePostingGate(record: ProgressRecord, policy: PostingPolicy, now: Date): GateDecision {
  if (record.versesPostedThisMonth >= policy.monthlyLimit) {
    return {
      allowed: false,
      reason: 'monthly_limit_reached',
      postedThisMonth: record.versesPostedThisMonth,
      limit: policy.monthlyLimit,
    };
  }

  if (policy.timeGateEnabled) {
    const last = parseLastPostTime(record);
    if (last !== undefined) {
      const elapsedMs = now.getTime() - last;
      if (elapsedMs < policy.minIntervalMs) {
        return { allowed: false, reason: 'too_soon', minutesRemaining: Math.floor((policy.minIntervalMs - elapsedMs) / 60_000) };
      }
    }
  }

  return { allowed: true };
}
