export interface WeatherObservation {
  timestamp: Date;
  /** Global horizontal irradiance accumulated over the preceding hour, Wh/m². */
  irradianceHourly: number;
  /** Surface pressure, hPa. */
  pressure: number;
  /** Wind speed, m/s. */
  windSpeed: number;
  /** 2 m air temperature as published, °C (no offset applied). */
  temperature: number;
}

export interface StationCoordinates {
  longitude: number;
  latitude: number;
  altitudeM: number;
}

export interface ForecastSnapshot {
  readonly observations: readonly Readonly<WeatherObservation>[];
  readonly fetchedAt: Date;
  readonly fingerprint: string;
  readonly sourceUrl: string;
  readonly issueTime: Date | null;
  readonly stationId: string;
  readonly stationName: string | null;
  readonly coordinates: StationCoordinates | null;
  readonly axisLength: number;
  readonly excludedCount: number;
}

export interface SystemDescription {
  latitude: number;
  longitude: number;
  altitudeM: number;
  tiltDeg: number;
  /** Degrees clockwise from north; 180 faces south. */
  azimuthDeg: number;
  modulesPerString: number;
  strings: number;
  albedo: number;
  moduleName: string;
  inverterName: string;
  temperatureModel: string;
  timezone: string;
  temperatureOffsetC: number;
  simpleMultiplicationFactor: number;
}

export interface SimulatedRecord extends WeatherObservation {
  temperatureAdjusted: number;
  simplifiedEnergy: number;
  acPower: number;
  dcPower: number;
  cellTemperature: number;
}

/** Flat row persisted by the CSV and database sinks. */
export interface ForecastRow {
  forecast_time: string;
  forecast_epoch: number;
  irradiance_wh_m2: number;
  pressure_hpa: number;
  wind_speed_ms: number;
  temperature_c: number;
  temperature_adjusted_c: number;
  simplified_energy_wh: number;
  ac_power_w: number;
  dc_power_w: number;
  cell_temperature_c: number;
}

export const FORECAST_ROW_COLUMNS: readonly (keyof ForecastRow)[] = [
  'forecast_time',
  'forecast_epoch',
  'irradiance_wh_m2',
  'pressure_hpa',
  'wind_speed_ms',
  'temperature_c',
  'temperature_adjusted_c',
  'simplified_energy_wh',
  'ac_power_w',
  'dc_power_w',
  'cell_temperature_c',
];

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function toForecastRow(record: SimulatedRecord): ForecastRow {
  return {
    forecast_time: record.timestamp.toISOString(),
    forecast_epoch: Math.floor(record.timestamp.getTime() / 1000),
    irradiance_wh_m2: round(record.irradianceHourly, 2),
    pressure_hpa: round(record.pressure, 2),
    wind_speed_ms: round(record.windSpeed, 2),
    temperature_c: round(record.temperature, 2),
    temperature_adjusted_c: round(record.temperatureAdjusted, 2),
    simplified_energy_wh: round(record.simplifiedEnergy, 2),
    ac_power_w: round(record.acPower, 2),
    dc_power_w: round(record.dcPower, 2),
    cell_temperature_c: round(record.cellTemperature, 2),
  };
}
