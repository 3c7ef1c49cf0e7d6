import type { QueryFn } from '../db';
import logger from '../logger';
import { upsertForecastRows } from '../repositories/forecastRepo';
import { toForecastRow } from '../types/forecast';
import type { ForecastSink } from './types';

export function createDatabaseSink(query: QueryFn, table: string): ForecastSink {
  return {
    name: 'database',
    async write(records) {
      const written = await upsertForecastRows(query, table, records.map(toForecastRow));
      logger.debug('[sink:database] upserted rows', { table, rows: written });
    },
  };
}
