import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { simulate } from '../src/controllers/simulationStage';
import { renderPrometheus, resetMetricsForTest } from '../src/observability/metrics';
import { createConsoleSink, formatLocalTime, formatTable } from '../src/sinks/consoleSink';
import { createCsvSink, formatCsv } from '../src/sinks/csvSink';
import { createDatabaseSink } from '../src/sinks/databaseSink';
import { dispatchToSinks } from '../src/sinks/sinkDispatcher';
import type { ForecastSink } from '../src/sinks/types';
import { toForecastRow } from '../src/types/forecast';
import { buildSnapshot, flatPowerModel, observation, testConfig } from './helpers/fixtures';

const system = testConfig().system;
const snapshot = buildSnapshot([observation('2024-06-01T10:00:00Z', 100, 20)]);
const records = simulate(snapshot, system, flatPowerModel);

describe('toForecastRow', () => {
  it('maps a record onto the eleven persisted columns', () => {
    assert.deepEqual(toForecastRow(records[0]), {
      forecast_time: '2024-06-01T10:00:00.000Z',
      forecast_epoch: 1717236000,
      irradiance_wh_m2: 100,
      pressure_hpa: 1013.25,
      wind_speed_ms: 2,
      temperature_c: 20,
      temperature_adjusted_c: 35,
      simplified_energy_wh: 860.52,
      ac_power_w: 200,
      dc_power_w: 300,
      cell_temperature_c: 36,
    });
  });
});

describe('csv sink', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mosmix-csv-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('formats a header and one line per record', () => {
    assert.equal(
      formatCsv(records.map(toForecastRow)),
      'forecast_time,forecast_epoch,irradiance_wh_m2,pressure_hpa,wind_speed_ms,temperature_c,' +
        'temperature_adjusted_c,simplified_energy_wh,ac_power_w,dc_power_w,cell_temperature_c\n' +
        '2024-06-01T10:00:00.000Z,1717236000,100,1013.25,2,20,35,860.52,200,300,36\n',
    );
  });

  it('rewrites the file on every publish', async () => {
    const file = path.join(dir, 'forecast.csv');
    const sink = createCsvSink(file);
    await sink.write(simulate(buildSnapshot([
      observation('2024-06-01T09:00:00Z', 50),
      observation('2024-06-01T10:00:00Z', 60),
    ]), system, flatPowerModel), snapshot);
    await sink.write(records, snapshot);

    const lines = fs.readFileSync(file, 'utf-8').trimEnd().split('\n');
    assert.equal(lines.length, 2);
    assert.ok(lines[1].startsWith('2024-06-01T10:00:00.000Z,'));
  });
});

describe('console sink', () => {
  it('renders timestamps in the configured zone', () => {
    assert.equal(formatLocalTime(new Date('2024-06-01T10:00:00Z'), 'Europe/Berlin'), '2024-06-01 12:00:00');
  });

  it('prints a fixed-width table', async () => {
    const printed: string[] = [];
    const sink = createConsoleSink('Europe/Berlin', (text) => printed.push(text));
    await sink.write(records, snapshot);

    assert.equal(printed[0], 'Station P755 (TEST STATION), issued 2024-06-01 05:00:00 Europe/Berlin\n');
    const lines = formatTable(records, 'Europe/Berlin').trimEnd().split('\n');
    assert.equal(printed[1], formatTable(records, 'Europe/Berlin'));
    assert.equal(lines.length, 3);
    assert.equal(lines[0].length, lines[2].length);
    assert.equal(
      lines[2],
      '2024-06-01 12:00:00    100.00  1013.25   2.00   20.00    35.00     860.52    200.00    300.00   36.00',
    );
  });
});

describe('database sink', () => {
  it('upserts the rows through the injected query function', async () => {
    const statements: Array<{ text: string; params: unknown[] }> = [];
    const sink = createDatabaseSink(async (text, params = []) => {
      statements.push({ text, params });
      return { rows: [] };
    }, 'dwd_forecast');

    await sink.write(records, snapshot);

    assert.equal(statements.length, 1);
    assert.ok(statements[0].text.startsWith('INSERT INTO dwd_forecast (forecast_time, forecast_epoch,'));
    assert.deepEqual(statements[0].params, ['2024-06-01T10:00:00.000Z', 1717236000, 100, 1013.25, 2, 20, 35, 860.52, 200, 300, 36]);
  });
});

describe('dispatchToSinks', () => {
  beforeEach(() => {
    resetMetricsForTest();
  });

  it('keeps writing after a sink fails and reports the failure', async () => {
    const order: string[] = [];
    const sinks: ForecastSink[] = [
      {
        name: 'database',
        write: async () => {
          order.push('database');
          throw new Error('connection refused');
        },
      },
      {
        name: 'csv',
        write: async () => {
          order.push('csv');
        },
      },
    ];

    const result = await dispatchToSinks(sinks, records, snapshot);

    assert.deepEqual(order, ['database', 'csv']);
    assert.deepEqual(result.written, ['csv']);
    assert.equal(result.failures.length, 1);
    assert.equal(result.failures[0].name, 'SinkError');
    assert.equal(result.failures[0].sink, 'database');
    assert.equal(result.failures[0].message, 'database sink failed: connection refused');
    assert.match(renderPrometheus(), /^mosmix_sink_error_total\{sink="database"\} 1$/m);
    assert.match(renderPrometheus(), /^mosmix_sink_write_duration_seconds_count\{sink="csv"\} 1$/m);
  });
});
