import type { QueryFn } from '../db';
import { FORECAST_ROW_COLUMNS, type ForecastRow } from '../types/forecast';

const KEY_COLUMNS: readonly (keyof ForecastRow)[] = ['forecast_time', 'forecast_epoch'];

/** 11 columns per row keeps a batch well under the 65535 bind-parameter limit. */
export const UPSERT_BATCH_SIZE = 500;

export interface SqlStatement {
  text: string;
  params: unknown[];
}

export function buildUpsertStatement(table: string, rows: readonly ForecastRow[]): SqlStatement {
  const params: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = FORECAST_ROW_COLUMNS.map((column) => {
      params.push(row[column]);
      return `$${params.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  const updates = FORECAST_ROW_COLUMNS.filter((column) => !KEY_COLUMNS.includes(column))
    .map((column) => `${column} = EXCLUDED.${column}`)
    .concat('updated_at = NOW()');

  const text =
    `INSERT INTO ${table} (${FORECAST_ROW_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')} ` +
    `ON CONFLICT (${KEY_COLUMNS.join(', ')}) DO UPDATE SET ${updates.join(', ')}`;
  return { text, params };
}

/**
 * Inserts new forecast hours and overwrites the ones already stored.
 * Returns the number of rows sent.
 */
export async function upsertForecastRows(
  query: QueryFn,
  table: string,
  rows: readonly ForecastRow[],
): Promise<number> {
  for (let offset = 0; offset < rows.length; offset += UPSERT_BATCH_SIZE) {
    const { text, params } = buildUpsertStatement(table, rows.slice(offset, offset + UPSERT_BATCH_SIZE));
    await query(text, params);
  }
  return rows.length;
}
