import type { SimulatedRecord } from '../types/forecast';
import type { ForecastSink } from './types';

type Column = {
  header: string;
  width: number;
  value: (record: SimulatedRecord) => number;
};

const NUMERIC_COLUMNS: readonly Column[] = [
  { header: 'Rad1h', width: 9, value: (r) => r.irradianceHourly },
  { header: 'PPPP', width: 8, value: (r) => r.pressure },
  { header: 'FF', width: 6, value: (r) => r.windSpeed },
  { header: 'TTT', width: 7, value: (r) => r.temperature },
  { header: 'TTT_adj', width: 8, value: (r) => r.temperatureAdjusted },
  { header: 'Simple_Wh', width: 10, value: (r) => r.simplifiedEnergy },
  { header: 'AC_W', width: 9, value: (r) => r.acPower },
  { header: 'DC_W', width: 9, value: (r) => r.dcPower },
  { header: 'Cell_C', width: 7, value: (r) => r.cellTemperature },
];

const TIME_WIDTH = 19;

/** `YYYY-MM-DD HH:mm:ss` in the given zone. */
export function formatLocalTime(timestamp: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(timestamp);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00';
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

export function formatTable(records: readonly SimulatedRecord[], timezone: string): string {
  const header = ['Time'.padEnd(TIME_WIDTH), ...NUMERIC_COLUMNS.map((c) => c.header.padStart(c.width))].join(' ');
  const lines = [header, '-'.repeat(header.length)];
  for (const record of records) {
    lines.push(
      [
        formatLocalTime(record.timestamp, timezone).padEnd(TIME_WIDTH),
        ...NUMERIC_COLUMNS.map((c) => c.value(record).toFixed(2).padStart(c.width)),
      ].join(' '),
    );
  }
  return `${lines.join('\n')}\n`;
}

export function createConsoleSink(
  timezone: string,
  out: (text: string) => void = (text) => {
    process.stdout.write(text);
  },
): ForecastSink {
  return {
    name: 'console',
    async write(records, snapshot) {
      const station = snapshot.stationName ? `${snapshot.stationId} (${snapshot.stationName})` : snapshot.stationId;
      const issued = snapshot.issueTime ? formatLocalTime(snapshot.issueTime, timezone) : 'unknown';
      out(`Station ${station}, issued ${issued} ${timezone}\n`);
      out(formatTable(records, timezone));
    },
  };
}
