import { describeError } from '../errors';

export type RefreshStatus = 'idle' | 'ok' | 'unchanged' | 'error' | 'stalled';

export interface RefreshStateSnapshot {
  status: RefreshStatus;
  lastAttemptIso: string | null;
  lastSuccessIso: string | null;
  lastPublishIso: string | null;
  lastDurationMs: number | null;
  lastError: string | null;
  consecutiveFailures: number;
  stallThresholdSeconds: number;
}

export class RefreshMonitor {
  private firstAttemptAt: number | null = null;
  private lastAttemptStartedAt: number | null = null;
  private lastAttemptCompletedAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private lastPublishAt: number | null = null;
  private lastDurationMs: number | null = null;
  private lastStatus: RefreshStatus = 'idle';
  private lastError: string | null = null;
  private consecutiveFailures = 0;
  private lastAlertAt: number | null = null;

  constructor(private readonly stallThresholdMs: number) {}

  markAttemptStart(atMs = Date.now()): void {
    this.firstAttemptAt ??= atMs;
    this.lastAttemptStartedAt = atMs;
  }

  markPublished(atMs = Date.now()): void {
    this.complete(atMs);
    this.lastSuccessAt = atMs;
    this.lastPublishAt = atMs;
    this.lastStatus = 'ok';
    this.lastError = null;
    this.consecutiveFailures = 0;
  }

  markUnchanged(atMs = Date.now()): void {
    this.complete(atMs);
    this.lastSuccessAt = atMs;
    this.lastStatus = 'unchanged';
    this.lastError = null;
    this.consecutiveFailures = 0;
  }

  markFailure(err: unknown, atMs = Date.now()): void {
    this.complete(atMs);
    this.lastStatus = 'error';
    this.lastError = describeError(err);
    this.consecutiveFailures += 1;
  }

  getState(nowMs = Date.now()): RefreshStateSnapshot {
    const reference = this.lastSuccessAt ?? this.firstAttemptAt;
    const stalled = reference !== null && nowMs - reference > this.stallThresholdMs;

    return {
      status: stalled ? 'stalled' : this.lastStatus,
      lastAttemptIso: iso(this.lastAttemptCompletedAt),
      lastSuccessIso: iso(this.lastSuccessAt),
      lastPublishIso: iso(this.lastPublishAt),
      lastDurationMs: this.lastDurationMs,
      lastError: this.lastError,
      consecutiveFailures: this.consecutiveFailures,
      stallThresholdSeconds: this.stallThresholdMs / 1000,
    };
  }

  /**
   * True once per cooldown window while the failure streak is at or above
   * the threshold.
   */
  shouldAlertFailures(threshold: number, cooldownMs: number, nowMs = Date.now()): boolean {
    if (this.consecutiveFailures < threshold) return false;
    if (this.lastAlertAt !== null && nowMs - this.lastAlertAt < cooldownMs) return false;
    this.lastAlertAt = nowMs;
    return true;
  }

  private complete(atMs: number): void {
    this.lastAttemptCompletedAt = atMs;
    this.lastDurationMs =
      this.lastAttemptStartedAt !== null ? atMs - this.lastAttemptStartedAt : null;
  }
}

function iso(ms: number | null): string | null {
  return ms !== null ? new Date(ms).toISOString() : null;
}
