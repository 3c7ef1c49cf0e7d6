const DEG_TO_RAD = Math.PI / 180;
const MIN_COS_ZENITH = 0.065;
const MAX_ZENITH_DEG = 87;
const MAX_AIRMASS = 12;
const SEA_LEVEL_PRESSURE_PA = 101325;

function cosd(deg: number): number {
  return Math.cos(deg * DEG_TO_RAD);
}

function sind(deg: number): number {
  return Math.sin(deg * DEG_TO_RAD);
}

export function dayOfYear(timestamp: Date): number {
  const start = Date.UTC(timestamp.getUTCFullYear(), 0, 1);
  return Math.floor((timestamp.getTime() - start) / 86_400_000) + 1;
}

/** Extraterrestrial normal irradiance (Spencer 1971), W/m². */
export function extraterrestrialIrradiance(doy: number, solarConstant = 1366.1): number {
  const b = (2 * Math.PI * (doy - 1)) / 365;
  const ratio =
    1.00011 +
    0.034221 * Math.cos(b) +
    0.00128 * Math.sin(b) +
    0.000719 * Math.cos(2 * b) +
    0.000077 * Math.sin(2 * b);
  return solarConstant * ratio;
}

export function clearnessIndex(
  ghi: number,
  zenithDeg: number,
  extraRadiation: number,
  maxClearness = 2,
): number {
  const cosZenith = Math.max(cosd(zenithDeg), MIN_COS_ZENITH);
  const kt = ghi / (extraRadiation * cosZenith);
  return Math.min(Math.max(kt, 0), maxClearness);
}

/** Kasten (1966) relative optical air mass; NaN with the sun below the horizon. */
export function relativeAirmass(zenithDeg: number): number {
  if (zenithDeg > 90) return Number.NaN;
  return 1 / (cosd(zenithDeg) + 0.15 * (93.885 - zenithDeg) ** -1.253);
}

function discKn(kt: number, airmass: number): number {
  const kt2 = kt * kt;
  const kt3 = kt2 * kt;
  let a: number;
  let b: number;
  let c: number;
  if (kt <= 0.6) {
    a = 0.512 - 1.56 * kt + 2.286 * kt2 - 2.222 * kt3;
    b = 0.37 + 0.962 * kt;
    c = -0.28 + 0.932 * kt - 2.048 * kt2;
  } else {
    a = -5.743 + 21.77 * kt - 27.49 * kt2 + 11.56 * kt3;
    b = 41.4 - 118.5 * kt + 66.05 * kt2 + 31.9 * kt3;
    c = -47.01 + 184.2 * kt - 222.0 * kt2 + 73.81 * kt3;
  }
  const deltaKn = a + b * Math.exp(c * airmass);
  const knc =
    0.866 - 0.122 * airmass + 0.0121 * airmass ** 2 - 0.000653 * airmass ** 3 + 1.4e-5 * airmass ** 4;
  return knc - deltaKn;
}

/**
 * Pressure at `altitudeM` from a sea-level-reduced reading (standard
 * atmosphere). MOSMIX `PPPP` is reduced to mean sea level.
 */
export function stationPressure(seaLevelPa: number, altitudeM: number): number {
  return seaLevelPa * (1 - 2.25577e-5 * altitudeM) ** 5.25588;
}

/**
 * Direct normal irradiance from global horizontal using the DISC model
 * (Maxwell 1987). Pressure in Pa scales the air mass.
 */
export function discDni(ghi: number, zenithDeg: number, doy: number, pressurePa = SEA_LEVEL_PRESSURE_PA): number {
  if (ghi <= 0 || zenithDeg < 0 || zenithDeg >= MAX_ZENITH_DEG) return 0;
  const i0 = extraterrestrialIrradiance(doy, 1370);
  const kt = clearnessIndex(ghi, zenithDeg, i0, 1);
  const airmass = Math.min((relativeAirmass(zenithDeg) * pressurePa) / SEA_LEVEL_PRESSURE_PA, MAX_AIRMASS);
  const dni = discKn(kt, airmass) * i0;
  return Math.max(dni, 0);
}

/** Diffuse horizontal irradiance from global horizontal (Erbs 1982). */
export function erbsDhi(ghi: number, zenithDeg: number, doy: number): number {
  if (ghi <= 0) return 0;
  const kt = clearnessIndex(ghi, zenithDeg, extraterrestrialIrradiance(doy), 1);
  let fraction: number;
  if (kt <= 0.22) {
    fraction = 1 - 0.09 * kt;
  } else if (kt <= 0.8) {
    fraction = 0.9511 - 0.1604 * kt + 4.388 * kt ** 2 - 16.638 * kt ** 3 + 12.336 * kt ** 4;
  } else {
    fraction = 0.165;
  }
  return fraction * ghi;
}

export interface PlaneOfArrayInput {
  ghi: number;
  dni: number;
  dhi: number;
  zenithDeg: number;
  sunAzimuthDeg: number;
  tiltDeg: number;
  surfaceAzimuthDeg: number;
  albedo: number;
}

export interface PlaneOfArrayIrradiance {
  global: number;
  beam: number;
  skyDiffuse: number;
  groundDiffuse: number;
}

/** Transposition with an isotropic sky; no angle-of-incidence losses. */
export function planeOfArray(input: PlaneOfArrayInput): PlaneOfArrayIrradiance {
  const cosAoi =
    cosd(input.zenithDeg) * cosd(input.tiltDeg) +
    sind(input.zenithDeg) * sind(input.tiltDeg) * cosd(input.sunAzimuthDeg - input.surfaceAzimuthDeg);
  const beam = Math.max(input.dni * Math.max(cosAoi, 0), 0);
  const skyDiffuse = Math.max(input.dhi * ((1 + cosd(input.tiltDeg)) / 2), 0);
  const groundDiffuse = Math.max(input.ghi * input.albedo * ((1 - cosd(input.tiltDeg)) / 2), 0);
  return { global: beam + skyDiffuse + groundDiffuse, beam, skyDiffuse, groundDiffuse };
}
