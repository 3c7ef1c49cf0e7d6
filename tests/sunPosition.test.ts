import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { sunPosition } from '../src/services/solar/sunPosition';

const LAT = 48.1;
const LON = 11.6;

function assertClose(actual: number, expected: number, tolerance: number) {
  assert.ok(Math.abs(actual - expected) <= tolerance, `${actual} not within ${tolerance} of ${expected}`);
}

describe('sunPosition', () => {
  it('puts the midsummer noon sun due south at its highest', () => {
    const sun = sunPosition(new Date('2024-06-21T11:15:00Z'), LAT, LON);
    assertClose(sun.azimuthDeg, 180, 3);
    assertClose(sun.zenithDeg, 48.1 - 23.44, 1);
    assertClose(sun.elevationDeg + sun.zenithDeg, 90, 1e-9);
  });

  it('reports an eastern sun in the morning', () => {
    const sun = sunPosition(new Date('2024-06-21T05:00:00Z'), LAT, LON);
    assert.ok(sun.azimuthDeg > 45 && sun.azimuthDeg < 110, `azimuth ${sun.azimuthDeg}`);
    assert.ok(sun.zenithDeg < 90);
  });

  it('reports the sun below the horizon at night', () => {
    const sun = sunPosition(new Date('2024-06-21T23:15:00Z'), LAT, LON);
    assert.ok(sun.zenithDeg > 90);
    assert.ok(sun.azimuthDeg >= 0 && sun.azimuthDeg < 360);
  });
});
