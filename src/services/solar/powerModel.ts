import type { SunGeometry } from './sunPosition';

export interface PowerModelInput {
  timestamp: Date;
  /** Hourly global horizontal irradiance, Wh/m² (read as the hour's mean W/m²). */
  irradiance: number;
  /** Air temperature with the configured offset applied, °C. */
  temperature: number;
  windSpeed: number;
  /** hPa */
  pressure: number;
  sun: SunGeometry;
}

export interface PowerEstimate {
  acPower: number;
  dcPower: number;
  cellTemperature: number;
}

export interface PowerModel {
  estimate(input: PowerModelInput): PowerEstimate;
}
