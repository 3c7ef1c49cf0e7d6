import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ParseError } from '../src/errors';
import {
  extractParameterSeries,
  kelvinToCelsius,
  kilojoulesToWattHours,
  parseForecastDocument,
  pascalToHectopascal,
  readMosmixDocument,
} from '../src/services/mosmix/timeseriesParser';
import { loadFixture } from './helpers/fixtures';

const source = {
  fetchedAt: new Date('2024-06-01T04:00:00.000Z'),
  fingerprint: 'abc123',
  sourceUrl: 'https://forecast.test/P755/MOSMIX_L_LATEST_P755.kmz',
};

function minimalDocument(steps: string[], values: Record<string, string>): string {
  const timeSteps = steps.map((s) => `<dwd:TimeStep>${s}</dwd:TimeStep>`).join('');
  const forecasts = Object.entries(values)
    .map(([code, v]) => `<dwd:Forecast dwd:elementName="${code}"><dwd:value>${v}</dwd:value></dwd:Forecast>`)
    .join('');
  return `<?xml version="1.0"?>
<kml:kml xmlns:dwd="urn:dwd" xmlns:kml="urn:kml"><kml:Document>
<kml:ExtendedData><dwd:ProductDefinition><dwd:ForecastTimeSteps>${timeSteps}</dwd:ForecastTimeSteps></dwd:ProductDefinition></kml:ExtendedData>
<kml:Placemark><kml:name>X001</kml:name><kml:ExtendedData>${forecasts}</kml:ExtendedData></kml:Placemark>
</kml:Document></kml:kml>`;
}

describe('parseForecastDocument', () => {
  it('builds a snapshot from the station placemark', () => {
    const snapshot = parseForecastDocument(loadFixture(), source, { stationId: 'P755' });

    assert.equal(snapshot.stationId, 'P755');
    assert.equal(snapshot.stationName, 'TEST STATION');
    assert.deepEqual(snapshot.coordinates, { longitude: 11.6, latitude: 48.1, altitudeM: 491 });
    assert.equal(snapshot.issueTime?.toISOString(), '2024-06-01T03:00:00.000Z');
    assert.equal(snapshot.fingerprint, 'abc123');
    assert.equal(snapshot.axisLength, 6);
    assert.equal(snapshot.excludedCount, 1);
    assert.equal(snapshot.observations.length, 5);

    assert.deepEqual(snapshot.observations[0], {
      timestamp: new Date('2024-06-01T08:00:00.000Z'),
      irradianceHourly: 100,
      pressure: 1013.25,
      windSpeed: 2.1,
      temperature: 15,
    });
  });

  it('drops timestamps with a missing value in any required parameter', () => {
    const snapshot = parseForecastDocument(loadFixture(), source);
    const times = snapshot.observations.map((o) => o.timestamp.toISOString());
    assert.deepEqual(times, [
      '2024-06-01T08:00:00.000Z',
      '2024-06-01T09:00:00.000Z',
      '2024-06-01T11:00:00.000Z',
      '2024-06-01T12:00:00.000Z',
      '2024-06-01T13:00:00.000Z',
    ]);
  });

  it('keeps observation timestamps strictly increasing', () => {
    const { observations } = parseForecastDocument(loadFixture(), source);
    for (let i = 1; i < observations.length; i += 1) {
      assert.ok(observations[i].timestamp.getTime() > observations[i - 1].timestamp.getTime());
    }
  });

  it('freezes the snapshot and its observations', () => {
    const snapshot = parseForecastDocument(loadFixture(), source);
    assert.ok(Object.isFrozen(snapshot));
    assert.ok(Object.isFrozen(snapshot.observations));
    assert.ok(Object.isFrozen(snapshot.observations[0]));
  });

  it('rejects a document whose axis goes backwards', () => {
    const raw = minimalDocument(['2024-06-01T09:00:00Z', '2024-06-01T08:00:00Z'], {
      Rad1h: '1 2',
      TTT: '280 281',
      PPPP: '100000 100000',
      FF: '1 1',
    });
    assert.throws(() => parseForecastDocument(raw, source), ParseError);
  });

  it('rejects a parameter list that does not match the axis', () => {
    const raw = minimalDocument(['2024-06-01T08:00:00Z', '2024-06-01T09:00:00Z'], {
      Rad1h: '1',
      TTT: '280 281',
      PPPP: '100000 100000',
      FF: '1 1',
    });
    assert.throws(() => parseForecastDocument(raw, source), {
      name: 'ParseError',
      message: 'Parameter Rad1h has 1 values for 2 timestamps',
    });
  });

  it('rejects a document without a required parameter', () => {
    const raw = minimalDocument(['2024-06-01T08:00:00Z'], { TTT: '280', PPPP: '100000', FF: '1' });
    assert.throws(() => parseForecastDocument(raw, source), {
      name: 'ParseError',
      message: 'Document is missing required parameters: Rad1h',
    });
  });

  it('rejects malformed XML', () => {
    assert.throws(() => parseForecastDocument('<kml:kml><unclosed></kml:kml>', source), ParseError);
  });

  it('rejects a document without the requested station', () => {
    assert.throws(() => parseForecastDocument(loadFixture(), source, { stationId: '10865' }), {
      name: 'ParseError',
      message: 'Document has no Placemark for station 10865',
    });
  });
});

describe('extractParameterSeries', () => {
  it('returns null for placeholder tokens', () => {
    const document = readMosmixDocument(loadFixture());
    const series = extractParameterSeries(document, ['Rad1h', 'N']);
    assert.deepEqual(series.get('Rad1h'), [360, 720, null, 1800, 2160, 2520]);
    assert.deepEqual(series.get('N'), [20, 25, 30, 35, 40, 45]);
  });
});

describe('unit conversion', () => {
  it('converts upstream units', () => {
    assert.equal(kilojoulesToWattHours(1800), 500);
    assert.equal(kelvinToCelsius(273.15), 0);
    assert.equal(pascalToHectopascal(101325), 1013.25);
  });
});
