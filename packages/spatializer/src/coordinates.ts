import type { PositionPi, PositionRad, PositionXyz } from '@spatial-audio/contracts';

export const AZIMUTH_PI_RANGE = 2;
export const DISTANCE_MIN = 0.25;
export const DISTANCE_MAX = 3.0;
const PRECISION = 4;

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function round4(value: number): number {
  const factor = 10 ** PRECISION;
  const rounded = Math.round(value * factor) / factor;
  // avoid -0 in persisted output
  return rounded === 0 ? 0 : rounded;
}

export function wrapAzimuthPi(value: number): number {
  const wrapped = ((value % AZIMUTH_PI_RANGE) + AZIMUTH_PI_RANGE) % AZIMUTH_PI_RANGE;
  const rounded = round4(wrapped);
  return rounded >= AZIMUTH_PI_RANGE ? 0 : rounded;
}

export function normalizeConfidence(value: number): number {
  return round4(clamp(finiteOr(value, 0), 0, 1));
}

export function normalizePositionPi(raw: PositionPi): PositionPi {
  return {
    azimuthPi: wrapAzimuthPi(finiteOr(raw.azimuthPi, 0)),
    elevationPi: round4(clamp(finiteOr(raw.elevationPi, 0.5), 0, 1)),
    distance: round4(clamp(finiteOr(raw.distance, 1), DISTANCE_MIN, DISTANCE_MAX)),
  };
}

export function toRadians(pi: PositionPi): PositionRad {
  return {
    azimuth: round4(pi.azimuthPi * Math.PI),
    elevation: round4(pi.elevationPi * Math.PI),
    distance: pi.distance,
  };
}

/**
 * Spherical to Cartesian with elevation measured from the +y (polar) axis.
 */
export function toCartesian(rad: PositionRad): PositionXyz {
  const horizontal = rad.distance * Math.sin(rad.elevation);
  return {
    x: round4(horizontal * Math.cos(rad.azimuth)),
    y: round4(rad.distance * Math.cos(rad.elevation)),
    z: round4(horizontal * Math.sin(rad.azimuth)),
  };
}

export interface DerivedPosition {
  positionPi: PositionPi;
  positionRad: PositionRad;
  positionXyz: PositionXyz;
}

export function derivePosition(raw: PositionPi): DerivedPosition {
  const positionPi = normalizePositionPi(raw);
  const positionRad = toRadians(positionPi);
  return { positionPi, positionRad, positionXyz: toCartesian(positionRad) };
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}
