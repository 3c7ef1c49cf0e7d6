import { checkRefreshAlerts } from './alerting';
import type { Config } from './config';
import { type RefreshOutcome, RefreshScheduler, type WaitFn } from './controllers/refreshScheduler';
import { simulate } from './controllers/simulationStage';
import { type Database, createDatabase } from './db';
import logger from './logger';
import { runMigrations } from './migrations';
import type { ForecastReadModel } from './routes/forecast';
import { type FeedFetcher, MosmixFeedFetcher } from './services/mosmix/feedFetcher';
import { parseForecastDocument } from './services/mosmix/timeseriesParser';
import { loadEquipmentCatalog } from './services/solar/equipmentCatalog';
import type { PowerModel } from './services/solar/powerModel';
import { createPvSystemModel } from './services/solar/pvSystemModel';
import type { SunPositionFn } from './services/solar/sunPosition';
import { createConsoleSink } from './sinks/consoleSink';
import { createCsvSink } from './sinks/csvSink';
import { createDatabaseSink } from './sinks/databaseSink';
import { type DispatchResult, dispatchToSinks } from './sinks/sinkDispatcher';
import type { ForecastSink } from './sinks/types';
import { RefreshMonitor } from './state/refreshMonitor';
import { SnapshotStore } from './state/snapshotStore';
import type { ForecastSnapshot, SimulatedRecord } from './types/forecast';

export interface PipelineOverrides {
  fetcher?: FeedFetcher;
  powerModel?: PowerModel;
  sunPosition?: SunPositionFn;
  sinks?: ForecastSink[];
  database?: Database;
  wait?: WaitFn;
  clock?: () => number;
}

export interface RunResult extends DispatchResult {
  snapshot: ForecastSnapshot;
  records: readonly SimulatedRecord[];
}

export function buildSinks(config: Config, database?: Database): ForecastSink[] {
  const sinks: ForecastSink[] = [];
  if (config.output.print) sinks.push(createConsoleSink(config.system.timezone));
  if (config.output.csv) sinks.push(createCsvSink(config.output.csvFile));
  if (config.output.db && database) sinks.push(createDatabaseSink(database.query, config.db.table));
  return sinks;
}

/**
 * Scheduler → snapshot slot → simulation → sinks. In continuous mode
 * published snapshots are written one at a time, newest last; a snapshot
 * replaced before its turn is skipped. `runOnce` does the same for a single
 * fetch.
 */
export class ForecastPipeline implements ForecastReadModel {
  readonly store = new SnapshotStore();
  readonly monitor: RefreshMonitor;
  readonly scheduler: RefreshScheduler;
  readonly database?: Database;
  private readonly sinks: ForecastSink[];
  private readonly powerModel: PowerModel;
  private readonly sunPosition?: SunPositionFn;
  private latestSimulation: { fingerprint: string; records: readonly SimulatedRecord[] } | null = null;
  private unsubscribe: (() => void) | null = null;
  /** Tail of the write queue; one snapshot is written at a time. */
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly config: Config, overrides: PipelineOverrides = {}) {
    this.database = overrides.database ?? (config.output.db ? createDatabase(config.db) : undefined);
    this.sinks = overrides.sinks ?? buildSinks(config, this.database);
    this.powerModel = overrides.powerModel ?? createPvSystemModel(config.system, loadEquipmentCatalog());
    this.sunPosition = overrides.sunPosition;
    this.monitor = new RefreshMonitor(config.refresh.stallThresholdSeconds * 1000);

    this.scheduler = new RefreshScheduler({
      url: config.station.url,
      fetcher: overrides.fetcher ?? new MosmixFeedFetcher({ timeoutMs: config.fetchTimeoutMs }),
      parse: (document, source) => parseForecastDocument(document, source, { stationId: config.station.id }),
      store: this.store,
      intervalMs: config.pollIntervalSeconds * 1000,
      monitor: this.monitor,
      wait: overrides.wait,
      clock: overrides.clock,
      onOutcome: (outcome) => this.handleOutcome(outcome),
    });
  }

  getLatest(): ForecastSnapshot | null {
    return this.store.getLatest();
  }

  getLatestSimulation(): readonly SimulatedRecord[] | null {
    const snapshot = this.store.getLatest();
    if (!snapshot) return null;
    return this.simulationFor(snapshot);
  }

  async prepare(): Promise<void> {
    if (this.database && this.config.output.db) {
      await runMigrations(this.database, { table: this.config.db.table });
    }
  }

  async process(snapshot: ForecastSnapshot): Promise<RunResult> {
    const records = this.simulationFor(snapshot);
    const result = await dispatchToSinks(this.sinks, records, snapshot);
    logger.info('[pipeline] forecast written', {
      records: records.length,
      sinks: result.written,
      failedSinks: result.failures.map((f) => f.sink),
    });
    return { ...result, snapshot, records };
  }

  /** Exactly one fetch; fetch, parse and sink failures all reject or report. */
  async runOnce(): Promise<RunResult> {
    const snapshot = await this.scheduler.runOnce();
    return this.process(snapshot);
  }

  start(): Promise<void> {
    this.unsubscribe ??= this.store.subscribe((snapshot) => {
      this.enqueueWrite(snapshot);
    });
    return this.scheduler.start();
  }

  /** Stops polling, then waits for queued sink writes to finish. */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.writes;
  }

  async close(): Promise<void> {
    await this.stop();
    await this.database?.close();
  }

  private enqueueWrite(snapshot: ForecastSnapshot): void {
    this.writes = this.writes
      .then(async () => {
        // A newer snapshot is already queued behind this one.
        if (this.store.getLatest() !== snapshot) {
          logger.debug('[pipeline] skipping superseded snapshot', { fingerprint: snapshot.fingerprint.slice(0, 12) });
          return;
        }
        await this.process(snapshot);
      })
      .catch((err: unknown) => {
        logger.error({ err, fingerprint: snapshot.fingerprint }, '[pipeline] forecast write failed');
      });
  }

  private simulationFor(snapshot: ForecastSnapshot): readonly SimulatedRecord[] {
    if (this.latestSimulation?.fingerprint === snapshot.fingerprint) {
      return this.latestSimulation.records;
    }
    const records = simulate(snapshot, this.config.system, this.powerModel, this.sunPosition);
    this.latestSimulation = { fingerprint: snapshot.fingerprint, records };
    return records;
  }

  private handleOutcome(outcome: RefreshOutcome): void {
    if (outcome.kind === 'published' || outcome.kind === 'unchanged') return;
    checkRefreshAlerts(this.monitor, {
      webhookUrl: this.config.refresh.alertWebhookUrl,
      afterFailures: this.config.refresh.alertAfterFailures,
      cooldownMs: this.config.refresh.alertCooldownSeconds * 1000,
    }).catch((err: unknown) => {
      logger.error({ err }, '[pipeline] alert check failed');
    });
  }
}
