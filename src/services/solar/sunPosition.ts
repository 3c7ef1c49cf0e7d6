import * as SunCalc from 'suncalc';

export interface SunGeometry {
  /** Angle from the vertical, degrees. Above 90 the sun is below the horizon. */
  zenithDeg: number;
  /** Compass bearing, degrees clockwise from north. */
  azimuthDeg: number;
  elevationDeg: number;
}

export type SunPositionFn = (timestamp: Date, latitude: number, longitude: number) => SunGeometry;

const RAD_TO_DEG = 180 / Math.PI;

/**
 * suncalc reports azimuth in radians measured from south towards west;
 * this converts to a north-based compass bearing.
 */
export const sunPosition: SunPositionFn = (timestamp, latitude, longitude) => {
  const { altitude, azimuth } = SunCalc.getPosition(timestamp, latitude, longitude);
  const elevationDeg = altitude * RAD_TO_DEG;
  const compass = (azimuth * RAD_TO_DEG + 180) % 360;
  return {
    zenithDeg: 90 - elevationDeg,
    azimuthDeg: compass < 0 ? compass + 360 : compass,
    elevationDeg,
  };
};
