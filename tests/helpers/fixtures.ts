import fs from 'node:fs';
import path from 'node:path';
import { type Config, loadConfig } from '../../src/config';
import type { FetchFn } from '../../src/services/mosmix/feedFetcher';
import type { PowerModel } from '../../src/services/solar/powerModel';
import type { ForecastSnapshot, WeatherObservation } from '../../src/types/forecast';

export const BASE_ENV: Record<string, string> = {
  MOSMIX_STATION_ID: 'P755',
  MOSMIX_STATION_URL: 'https://forecast.test/P755/MOSMIX_L_LATEST_P755.kmz',
  SITE_LATITUDE: '48.1',
  SITE_LONGITUDE: '11.6',
  SITE_ALTITUDE_M: '491',
  SITE_TIMEZONE: 'Europe/Berlin',
  PV_TILT_DEG: '35',
  PV_AZIMUTH_DEG: '177',
  PV_MODULES_PER_STRING: '14',
  PV_STRINGS: '2',
  PV_ALBEDO: '0.14',
  PV_MODULE_NAME: 'LG_Electronics_Inc__LG335E1C_A5',
  PV_INVERTER_NAME: 'SMA_America__SB10000TL_US__240V_',
  TEMPERATURE_OFFSET_C: '15',
  SIMPLE_MULTIPLICATION_FACTOR: '8.605184',
  OUTPUT_CSV: 'false',
};

export function testConfig(overrides: Record<string, string> = {}): Config {
  return loadConfig({ ...BASE_ENV, ...overrides });
}

export function loadFixture(name = 'mosmix-sample.kml'): string {
  return fs.readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf-8');
}

export function observation(iso: string, irradianceHourly: number, temperature = 20): WeatherObservation {
  return {
    timestamp: new Date(iso),
    irradianceHourly,
    pressure: 1013.25,
    windSpeed: 2,
    temperature,
  };
}

export function buildSnapshot(
  observations: WeatherObservation[],
  overrides: Partial<ForecastSnapshot> = {},
): ForecastSnapshot {
  return {
    observations,
    fetchedAt: new Date('2024-06-01T04:00:00.000Z'),
    fingerprint: 'fp-test',
    sourceUrl: 'https://forecast.test/P755/MOSMIX_L_LATEST_P755.kmz',
    issueTime: new Date('2024-06-01T03:00:00.000Z'),
    stationId: 'P755',
    stationName: 'TEST STATION',
    coordinates: { longitude: 11.6, latitude: 48.1, altitudeM: 491 },
    axisLength: observations.length,
    excludedCount: 0,
    ...overrides,
  };
}

/** Power model returning fixed values, for tests that only check plumbing. */
export const flatPowerModel: PowerModel = {
  estimate: (input) => ({
    acPower: input.irradiance * 2,
    dcPower: input.irradiance * 3,
    cellTemperature: input.temperature + 1,
  }),
};

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

/** Serves queued responses in order and records what was asked for. */
export function scriptedFetch(responses: Array<() => Response>): { fetchImpl: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchFn = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({ url: input, headers });
    const next = responses.shift();
    if (!next) {
      throw new Error(`unexpected request to ${input}`);
    }
    return next();
  };
  return { fetchImpl, requests };
}
