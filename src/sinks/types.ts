import type { ForecastSnapshot, SimulatedRecord } from '../types/forecast';

export interface ForecastSink {
  readonly name: string;
  write(records: readonly SimulatedRecord[], snapshot: ForecastSnapshot): Promise<void>;
}
