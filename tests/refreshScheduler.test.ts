import assert from 'node:assert/strict';
import { beforeEach, describe, it } from 'node:test';

import { RefreshScheduler, type RefreshOutcome, type SnapshotParser, type WaitFn } from '../src/controllers/refreshScheduler';
import { FetchError } from '../src/errors';
import { renderPrometheus, resetMetricsForTest } from '../src/observability/metrics';
import type { FeedFetcher, FeedValidators, FetchOutcome } from '../src/services/mosmix/feedFetcher';
import { parseForecastDocument } from '../src/services/mosmix/timeseriesParser';
import { SnapshotStore } from '../src/state/snapshotStore';
import { loadFixture } from './helpers/fixtures';

const BUNDLE_URL = 'https://forecast.test/P755/MOSMIX_L_LATEST_P755.kmz';

function updated(fingerprint: string, document = loadFixture()): FetchOutcome {
  return {
    kind: 'updated',
    document,
    entryName: 'MOSMIX_L_LATEST_P755.kml',
    bundleUrl: BUNDLE_URL,
    fetchedAt: new Date('2024-06-01T04:00:00.000Z'),
    validators: { fingerprint },
  };
}

class ScriptedFetcher implements FeedFetcher {
  readonly seen: FeedValidators[] = [];

  constructor(private readonly script: Array<() => FetchOutcome>) {}

  async fetch(_url: string, previous: FeedValidators = {}): Promise<FetchOutcome> {
    this.seen.push(previous);
    const step = this.script.shift();
    if (!step) throw new Error('script exhausted');
    return step();
  }
}

function countingParser(): { parse: SnapshotParser; calls: () => number } {
  let calls = 0;
  return {
    parse: (document, source) => {
      calls += 1;
      return parseForecastDocument(document, source);
    },
    calls: () => calls,
  };
}

const failing = (message: string) => (): FetchOutcome => {
  throw new FetchError(message, BUNDLE_URL, 503);
};

describe('RefreshScheduler', () => {
  beforeEach(() => {
    resetMetricsForTest();
  });

  it('runOnce fetches exactly once and returns the published snapshot', async () => {
    const fetcher = new ScriptedFetcher([() => updated('fp-1')]);
    const store = new SnapshotStore();
    const scheduler = new RefreshScheduler({ url: BUNDLE_URL, fetcher, parse: parseForecastDocument, store, intervalMs: 15_000 });

    const snapshot = await scheduler.runOnce();

    assert.equal(fetcher.seen.length, 1);
    assert.equal(snapshot.fingerprint, 'fp-1');
    assert.equal(store.getLatest(), snapshot);
    assert.equal(scheduler.state, 'idle');
    assert.match(renderPrometheus(), /^mosmix_refresh_total\{outcome="published"\} 1$/m);
  });

  it('runOnce surfaces a fetch failure', async () => {
    const fetcher = new ScriptedFetcher([failing('HTTP 503')]);
    const scheduler = new RefreshScheduler({
      url: BUNDLE_URL,
      fetcher,
      parse: parseForecastDocument,
      store: new SnapshotStore(),
      intervalMs: 15_000,
    });

    await assert.rejects(scheduler.runOnce(), { name: 'FetchError', message: 'HTTP 503' });
    assert.equal(scheduler.monitor.getState().consecutiveFailures, 1);
  });

  it('runOnce surfaces a parse failure and leaves the slot untouched', async () => {
    const fetcher = new ScriptedFetcher([() => updated('fp-bad', '<kml:kml></kml:kml>')]);
    const store = new SnapshotStore();
    const scheduler = new RefreshScheduler({ url: BUNDLE_URL, fetcher, parse: parseForecastDocument, store, intervalMs: 15_000 });

    await assert.rejects(scheduler.runOnce(), { name: 'ParseError' });
    assert.equal(store.getLatest(), null);
  });

  it('skips parsing when the feed is unchanged', async () => {
    const fetcher = new ScriptedFetcher([
      () => updated('fp-1'),
      () => ({ kind: 'unchanged', checkedAt: new Date(), bundleUrl: BUNDLE_URL, validators: { fingerprint: 'fp-1' } }),
    ]);
    const parser = countingParser();
    const store = new SnapshotStore();
    const scheduler = new RefreshScheduler({ url: BUNDLE_URL, fetcher, parse: parser.parse, store, intervalMs: 15_000 });

    const first = await scheduler.tick();
    const second = await scheduler.tick();

    assert.equal(first.kind, 'published');
    assert.equal(second.kind, 'unchanged');
    assert.equal(parser.calls(), 1);
    assert.deepEqual(fetcher.seen[1], { fingerprint: 'fp-1' });
    assert.equal(store.getLatest()?.fingerprint, 'fp-1');
  });

  it('does not parse a rejected document twice', async () => {
    const fetcher = new ScriptedFetcher([
      () => updated('fp-bad', '<kml:kml></kml:kml>'),
      () => ({ kind: 'unchanged', checkedAt: new Date(), bundleUrl: BUNDLE_URL, validators: { fingerprint: 'fp-bad' } }),
    ]);
    const parser = countingParser();
    const scheduler = new RefreshScheduler({
      url: BUNDLE_URL,
      fetcher,
      parse: parser.parse,
      store: new SnapshotStore(),
      intervalMs: 15_000,
    });

    assert.equal((await scheduler.tick()).kind, 'parse_failed');
    assert.deepEqual(fetcher.seen[0], {});
    assert.equal((await scheduler.tick()).kind, 'unchanged');
    assert.deepEqual(fetcher.seen[1], { fingerprint: 'fp-bad' });
    assert.equal(parser.calls(), 1);
  });

  it('keeps polling through consecutive failures and publishes the next good snapshot', async () => {
    const fetcher = new ScriptedFetcher([
      failing('HTTP 500'),
      failing('HTTP 502'),
      failing('HTTP 503'),
      () => updated('fp-good'),
    ]);
    const store = new SnapshotStore();
    const outcomes: RefreshOutcome['kind'][] = [];
    const waits: number[] = [];
    let markParked: () => void = () => undefined;
    const parked = new Promise<void>((resolve) => {
      markParked = resolve;
    });

    const wait: WaitFn = (ms, signal) => {
      waits.push(ms);
      if (!store.getLatest()) return Promise.resolve();
      markParked();
      return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    };

    const scheduler = new RefreshScheduler({
      url: BUNDLE_URL,
      fetcher,
      parse: parseForecastDocument,
      store,
      intervalMs: 15_000,
      wait,
      onOutcome: (outcome) => outcomes.push(outcome.kind),
    });

    const running = scheduler.start();
    assert.equal(scheduler.isRunning, true);
    await parked;
    await scheduler.stop();
    await running;

    assert.equal(store.getLatest()?.fingerprint, 'fp-good');
    assert.deepEqual(outcomes, ['fetch_failed', 'fetch_failed', 'fetch_failed', 'published']);
    assert.deepEqual(waits, [15_000, 15_000, 15_000, 15_000]);
    assert.equal(scheduler.isRunning, false);
    assert.equal(scheduler.monitor.getState().consecutiveFailures, 0);
  });

  it('stops promptly while waiting', async () => {
    const fetcher = new ScriptedFetcher([() => updated('fp-1')]);
    const scheduler = new RefreshScheduler({
      url: BUNDLE_URL,
      fetcher,
      parse: parseForecastDocument,
      store: new SnapshotStore(),
      intervalMs: 3_600_000,
    });

    const running = scheduler.start();
    await new Promise((resolve) => setImmediate(resolve));
    await scheduler.stop();
    await running;
    assert.equal(fetcher.seen.length, 1);
  });
});
