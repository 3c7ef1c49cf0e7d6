import { Router } from 'express';
import { summarizeByDay } from '../controllers/simulationStage';
import type { SnapshotReader } from '../state/snapshotStore';
import { type ForecastSnapshot, type SimulatedRecord, toForecastRow } from '../types/forecast';

export interface ForecastReadModel extends SnapshotReader {
  /** Simulation of the latest snapshot, or null before the first publish. */
  getLatestSimulation(): readonly SimulatedRecord[] | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function serializeSnapshot(snapshot: ForecastSnapshot) {
  return {
    stationId: snapshot.stationId,
    stationName: snapshot.stationName,
    coordinates: snapshot.coordinates,
    issueTime: snapshot.issueTime?.toISOString() ?? null,
    fetchedAt: snapshot.fetchedAt.toISOString(),
    fingerprint: snapshot.fingerprint,
    sourceUrl: snapshot.sourceUrl,
    axisLength: snapshot.axisLength,
    excludedCount: snapshot.excludedCount,
    observations: snapshot.observations.map((o) => ({
      timestamp: o.timestamp.toISOString(),
      irradianceHourly: o.irradianceHourly,
      pressure: o.pressure,
      windSpeed: o.windSpeed,
      temperature: o.temperature,
    })),
  };
}

const NOT_PUBLISHED = { error: 'No forecast snapshot has been published yet' };

export function createForecastRouter(model: ForecastReadModel, timezone: string): Router {
  const router = Router();

  router.get('/snapshot', (_req, res) => {
    const snapshot = model.getLatest();
    if (!snapshot) {
      res.status(404).json(NOT_PUBLISHED);
      return;
    }
    res.json(serializeSnapshot(snapshot));
  });

  router.get('/simulation', (_req, res) => {
    const snapshot = model.getLatest();
    const records = model.getLatestSimulation();
    if (!snapshot || !records) {
      res.status(404).json(NOT_PUBLISHED);
      return;
    }
    res.json({
      fingerprint: snapshot.fingerprint,
      timezone,
      rows: records.map(toForecastRow),
    });
  });

  router.get('/daily', (_req, res) => {
    const records = model.getLatestSimulation();
    if (!records) {
      res.status(404).json(NOT_PUBLISHED);
      return;
    }
    res.json({
      timezone,
      days: summarizeByDay(records, timezone).map((day) => ({
        date: day.date,
        hours: day.hours,
        simplifiedEnergyWh: round2(day.simplifiedEnergyWh),
        acEnergyWh: round2(day.acEnergyWh),
        peakAcPowerW: round2(day.peakAcPowerW),
      })),
    });
  });

  return router;
}
