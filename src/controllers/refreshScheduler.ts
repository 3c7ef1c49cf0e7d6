import { setTimeout as delay } from 'node:timers/promises';
import { FetchError } from '../errors';
import logger from '../logger';
import { incrementCounter, observeHistogram, setGaugeValue } from '../observability/metrics';
import type { FeedFetcher, FeedValidators } from '../services/mosmix/feedFetcher';
import type { SnapshotSource } from '../services/mosmix/timeseriesParser';
import { RefreshMonitor } from '../state/refreshMonitor';
import { SnapshotStore } from '../state/snapshotStore';
import type { ForecastSnapshot } from '../types/forecast';

export type RefreshPhase = 'idle' | 'fetching' | 'parsing';

export type RefreshOutcome =
  | { kind: 'published'; snapshot: ForecastSnapshot }
  | { kind: 'unchanged' }
  | { kind: 'fetch_failed'; error: Error }
  | { kind: 'parse_failed'; error: Error };

export type SnapshotParser = (document: string, source: SnapshotSource) => ForecastSnapshot;

/** Resolves after `ms`, or rejects as soon as `signal` aborts. */
export type WaitFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface RefreshSchedulerOptions {
  url: string;
  fetcher: FeedFetcher;
  parse: SnapshotParser;
  store: SnapshotStore;
  intervalMs: number;
  monitor?: RefreshMonitor;
  wait?: WaitFn;
  onOutcome?: (outcome: RefreshOutcome) => void;
  clock?: () => number;
}

const defaultWait: WaitFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Owns the polling cadence and the published-snapshot slot. `runOnce` makes a
 * single attempt and surfaces its failure; `start` polls until `stop`.
 */
export class RefreshScheduler {
  readonly monitor: RefreshMonitor;
  private readonly wait: WaitFn;
  private readonly clock: () => number;
  private phase: RefreshPhase = 'idle';
  private validators: FeedValidators = {};
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly options: RefreshSchedulerOptions) {
    this.monitor = options.monitor ?? new RefreshMonitor(options.intervalMs * 3);
    this.wait = options.wait ?? defaultWait;
    this.clock = options.clock ?? Date.now;
  }

  get state(): RefreshPhase {
    return this.phase;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  async tick(): Promise<RefreshOutcome> {
    const startedAt = this.clock();
    this.monitor.markAttemptStart(startedAt);
    const outcome = await this.attempt();
    this.phase = 'idle';

    const finishedAt = this.clock();
    if (outcome.kind === 'published') {
      this.monitor.markPublished(finishedAt);
    } else if (outcome.kind === 'unchanged') {
      this.monitor.markUnchanged(finishedAt);
    } else {
      this.monitor.markFailure(outcome.error, finishedAt);
    }

    incrementCounter('mosmix_refresh_total', { outcome: outcome.kind });
    observeHistogram('mosmix_refresh_duration_seconds', (finishedAt - startedAt) / 1000, {
      outcome: outcome.kind,
    });
    setGaugeValue('mosmix_refresh_consecutive_failures', this.monitor.getState(finishedAt).consecutiveFailures);

    if (this.options.onOutcome) {
      try {
        this.options.onOutcome(outcome);
      } catch (err) {
        logger.error({ err }, '[refresh] outcome handler failed');
      }
    }
    return outcome;
  }

  async runOnce(): Promise<ForecastSnapshot> {
    const outcome = await this.tick();
    switch (outcome.kind) {
      case 'published':
        return outcome.snapshot;
      case 'unchanged': {
        const latest = this.options.store.getLatest();
        if (!latest) {
          throw new FetchError('Forecast unchanged and no snapshot has been published', this.options.url);
        }
        return latest;
      }
      default:
        throw outcome.error;
    }
  }

  start(): Promise<void> {
    if (this.running) return this.running;
    const controller = new AbortController();
    this.controller = controller;
    logger.info('[refresh] polling started', {
      url: this.options.url,
      intervalSeconds: this.options.intervalMs / 1000,
    });
    this.running = this.loop(controller.signal).finally(() => {
      this.running = null;
      this.controller = null;
      logger.info('[refresh] polling stopped');
    });
    return this.running;
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.running;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.tick();
      if (signal.aborted) break;
      try {
        await this.wait(this.options.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
  }

  private async attempt(): Promise<RefreshOutcome> {
    const { url, fetcher, parse, store } = this.options;

    this.phase = 'fetching';
    let fetched;
    try {
      fetched = await fetcher.fetch(url, this.validators);
    } catch (err) {
      const error = toError(err);
      logger.warn('[refresh] fetch failed', { url, err: error });
      return { kind: 'fetch_failed', error };
    }

    if (fetched.kind === 'unchanged') {
      this.validators = fetched.validators;
      logger.debug('[refresh] forecast unchanged', { bundleUrl: fetched.bundleUrl });
      return { kind: 'unchanged' };
    }

    this.phase = 'parsing';
    // The same bytes would fail the same way, so a rejected document is not parsed again.
    this.validators = fetched.validators;
    let snapshot: ForecastSnapshot;
    try {
      snapshot = parse(fetched.document, {
        fetchedAt: fetched.fetchedAt,
        fingerprint: fetched.validators.fingerprint,
        sourceUrl: fetched.bundleUrl,
      });
    } catch (err) {
      const error = toError(err);
      logger.error({ err: error, bundleUrl: fetched.bundleUrl, entry: fetched.entryName }, '[refresh] parse failed');
      return { kind: 'parse_failed', error };
    }

    store.publish(snapshot);
    setGaugeValue('mosmix_snapshot_observations', snapshot.observations.length);
    setGaugeValue('mosmix_snapshot_excluded', snapshot.excludedCount);
    setGaugeValue('mosmix_snapshot_published_timestamp_seconds', Math.floor(this.clock() / 1000));
    logger.info('[refresh] snapshot published', {
      fingerprint: snapshot.fingerprint.slice(0, 12),
      issueTime: snapshot.issueTime?.toISOString() ?? null,
      observations: snapshot.observations.length,
      excluded: snapshot.excludedCount,
    });
    return { kind: 'published', snapshot };
  }
}
