import type { PowerModel } from '../services/solar/powerModel';
import { type SunPositionFn, sunPosition as defaultSunPosition } from '../services/solar/sunPosition';
import type { ForecastSnapshot, SimulatedRecord, SystemDescription } from '../types/forecast';

export interface DailySummary {
  /** Local calendar date, YYYY-MM-DD. */
  date: string;
  hours: number;
  simplifiedEnergyWh: number;
  acEnergyWh: number;
  peakAcPowerW: number;
}

/**
 * Maps every observation of a snapshot through the power model, in order.
 * Pure: sun geometry comes from the observation's own timestamp.
 */
export function simulate(
  snapshot: ForecastSnapshot,
  system: SystemDescription,
  powerModel: PowerModel,
  sunPosition: SunPositionFn = defaultSunPosition,
): SimulatedRecord[] {
  return snapshot.observations.map((observation) => {
    const temperatureAdjusted = observation.temperature + system.temperatureOffsetC;
    const sun = sunPosition(observation.timestamp, system.latitude, system.longitude);
    const power = powerModel.estimate({
      timestamp: observation.timestamp,
      irradiance: observation.irradianceHourly,
      temperature: temperatureAdjusted,
      windSpeed: observation.windSpeed,
      pressure: observation.pressure,
      sun,
    });

    return {
      timestamp: observation.timestamp,
      irradianceHourly: observation.irradianceHourly,
      pressure: observation.pressure,
      windSpeed: observation.windSpeed,
      temperature: observation.temperature,
      temperatureAdjusted,
      simplifiedEnergy: observation.irradianceHourly * system.simpleMultiplicationFactor,
      acPower: power.acPower,
      dcPower: power.dcPower,
      cellTemperature: power.cellTemperature,
    };
  });
}

export function localDateKey(timestamp: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(timestamp);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/** Groups hourly records by local date. Each record stands for one hour. */
export function summarizeByDay(records: readonly SimulatedRecord[], timezone: string): DailySummary[] {
  const days = new Map<string, DailySummary>();
  for (const record of records) {
    const date = localDateKey(record.timestamp, timezone);
    const day = days.get(date) ?? {
      date,
      hours: 0,
      simplifiedEnergyWh: 0,
      acEnergyWh: 0,
      peakAcPowerW: 0,
    };
    day.hours += 1;
    day.simplifiedEnergyWh += record.simplifiedEnergy;
    day.acEnergyWh += record.acPower;
    day.peakAcPowerW = Math.max(day.peakAcPowerW, record.acPower);
    days.set(date, day);
  }
  return [...days.values()];
}
