import { writeFile } from 'fs/promises';
import logger from '../logger';
import { FORECAST_ROW_COLUMNS, type ForecastRow, type SimulatedRecord, toForecastRow } from '../types/forecast';
import type { ForecastSink } from './types';

function escapeCell(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv(rows: readonly ForecastRow[]): string {
  const lines = [FORECAST_ROW_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(FORECAST_ROW_COLUMNS.map((column) => escapeCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

/** Rewrites the whole file on every publish. */
export function createCsvSink(filePath: string): ForecastSink {
  return {
    name: 'csv',
    async write(records: readonly SimulatedRecord[]) {
      await writeFile(filePath, formatCsv(records.map(toForecastRow)), 'utf-8');
      logger.debug('[sink:csv] wrote forecast file', { filePath, rows: records.length });
    },
  };
}
