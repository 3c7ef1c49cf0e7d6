import { ConfigError } from '../../errors';
import type { SystemDescription } from '../../types/forecast';
import { type EquipmentCatalog, lookupInverter, lookupModule } from './equipmentCatalog';
import { dayOfYear, discDni, erbsDhi, planeOfArray, stationPressure } from './irradiance';
import type { PowerEstimate, PowerModel, PowerModelInput } from './powerModel';

export interface SapmTemperatureParameters {
  a: number;
  b: number;
  deltaT: number;
}

export const SAPM_TEMPERATURE_PARAMETERS: Readonly<Record<string, SapmTemperatureParameters>> = {
  open_rack_glass_glass: { a: -3.47, b: -0.0594, deltaT: 3 },
  close_mount_glass_glass: { a: -2.98, b: -0.0471, deltaT: 1 },
  open_rack_glass_polymer: { a: -3.56, b: -0.075, deltaT: 3 },
  insulated_back_glass_polymer: { a: -2.81, b: -0.0455, deltaT: 0 },
};

const REFERENCE_IRRADIANCE = 1000;
const REFERENCE_TEMPERATURE_C = 25;
const REFERENCE_INVERTER_EFFICIENCY = 0.9637;

export function sapmCellTemperature(
  poaGlobal: number,
  airTemperature: number,
  windSpeed: number,
  params: SapmTemperatureParameters,
): number {
  const moduleTemperature = poaGlobal * Math.exp(params.a + params.b * windSpeed) + airTemperature;
  return moduleTemperature + (poaGlobal / REFERENCE_IRRADIANCE) * params.deltaT;
}

export function pvwattsDc(poaGlobal: number, cellTemperature: number, pdc0: number, gammaPdc: number): number {
  return (poaGlobal / REFERENCE_IRRADIANCE) * pdc0 * (1 + gammaPdc * (cellTemperature - REFERENCE_TEMPERATURE_C));
}

/** NREL PVWatts inverter curve; zero without DC input, clipped at `paco`. */
export function pvwattsInverter(pdc: number, paco: number, etaNominal: number): number {
  if (pdc <= 0) return 0;
  const pdc0 = paco / etaNominal;
  const zeta = pdc / pdc0;
  const eta = (etaNominal / REFERENCE_INVERTER_EFFICIENCY) * (-0.0162 * zeta - 0.0059 / zeta + 0.9858);
  return Math.min(Math.max(eta * pdc, 0), paco);
}

export function resolveTemperatureParameters(name: string): SapmTemperatureParameters {
  const params = SAPM_TEMPERATURE_PARAMETERS[name];
  if (!params) {
    throw new ConfigError(
      'PV_TEMPERATURE_MODEL',
      `must be one of ${Object.keys(SAPM_TEMPERATURE_PARAMETERS).join(', ')}`,
    );
  }
  return params;
}

/**
 * Builds the power model for one installation. Equipment is looked up once
 * here, so an unknown module or inverter fails at startup.
 */
export function createPvSystemModel(system: SystemDescription, catalog: EquipmentCatalog): PowerModel {
  const panel = lookupModule(catalog, system.moduleName);
  const inverter = lookupInverter(catalog, system.inverterName);
  const temperatureParams = resolveTemperatureParameters(system.temperatureModel);
  const arrayPdc0 = panel.stcPowerW * system.modulesPerString * system.strings;

  return {
    estimate(input: PowerModelInput): PowerEstimate {
      const { sun } = input;
      const ghi = Math.max(input.irradiance, 0);
      let poaGlobal = 0;
      if (ghi > 0 && sun.zenithDeg < 90) {
        const doy = dayOfYear(input.timestamp);
        const poa = planeOfArray({
          ghi,
          dni: discDni(ghi, sun.zenithDeg, doy, stationPressure(input.pressure * 100, system.altitudeM)),
          dhi: erbsDhi(ghi, sun.zenithDeg, doy),
          zenithDeg: sun.zenithDeg,
          sunAzimuthDeg: sun.azimuthDeg,
          tiltDeg: system.tiltDeg,
          surfaceAzimuthDeg: system.azimuthDeg,
          albedo: system.albedo,
        });
        poaGlobal = poa.global;
      }

      const cellTemperature = sapmCellTemperature(poaGlobal, input.temperature, input.windSpeed, temperatureParams);
      const dcPower = Math.max(pvwattsDc(poaGlobal, cellTemperature, arrayPdc0, panel.gammaPdc), 0);
      const acPower = pvwattsInverter(dcPower, inverter.pacoW, inverter.etaNominal);
      return { acPower, dcPower, cellTemperature };
    },
  };
}
