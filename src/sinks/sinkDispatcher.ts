import { SinkError, describeError } from '../errors';
import logger from '../logger';
import { incrementCounter, observeHistogram } from '../observability/metrics';
import type { ForecastSnapshot, SimulatedRecord } from '../types/forecast';
import type { ForecastSink } from './types';

export interface DispatchResult {
  written: string[];
  failures: SinkError[];
}

/**
 * Writes to every sink in order. A failing sink is logged and counted but
 * never stops the ones after it.
 */
export async function dispatchToSinks(
  sinks: readonly ForecastSink[],
  records: readonly SimulatedRecord[],
  snapshot: ForecastSnapshot,
  clock: () => number = Date.now,
): Promise<DispatchResult> {
  const result: DispatchResult = { written: [], failures: [] };

  for (const sink of sinks) {
    const startedAt = clock();
    try {
      await sink.write(records, snapshot);
      result.written.push(sink.name);
    } catch (err) {
      const failure = new SinkError(sink.name, `${sink.name} sink failed: ${describeError(err)}`, { cause: err });
      result.failures.push(failure);
      incrementCounter('mosmix_sink_error_total', { sink: sink.name });
      logger.error({ err: failure, sink: sink.name, fingerprint: snapshot.fingerprint }, '[sinks] write failed');
    } finally {
      observeHistogram('mosmix_sink_write_duration_seconds', (clock() - startedAt) / 1000, { sink: sink.name });
    }
  }

  return result;
}
