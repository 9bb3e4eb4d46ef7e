import type { IdmtCurve, StartingTrajectory, TripTime } from '../types';

export const MIN_TRIP_TIME_S = 0.01;
export const START_PROFILE_POINTS = 200;
const MIN_SLIP = 0.01;

export const NEVER_TRIPS: TripTime = { kind: 'never' };

const trips = (seconds: number): TripTime => ({ kind: 'trips', seconds });

/**
 * Converts a trip time to seconds for plotting. "Never trips" becomes Infinity,
 * which a log time axis leaves open-ended.
 */
export const tripSeconds = (t: TripTime): number =>
  t.kind === 'trips' ? t.seconds : Number.POSITIVE_INFINITY;

export const formatTripTime = (t: TripTime, digits: number = 2): string =>
  t.kind === 'trips' ? `${t.seconds.toFixed(digits)} s` : 'No trip';

/**
 * Thermal overload trip time from the single time-constant thermal replica.
 *
 * Negative-sequence current adds rotor heating through the weighting K:
 * I_eq = sqrt(I² + K·I2²). With A2 the residual heat of a previous run
 * (0 = cold), the trip time is t = -τ·ln(1 - (I_th/I_eq)²·(1 - A2)),
 * never shorter than MIN_TRIP_TIME_S.
 */
export const thermalTripTime = (
  current: number,
  pickupA: number,
  timeConstantS: number,
  hotFactor: number = 0,
  npsWeighting: number = 1,
  npsCurrentA: number = 0
): TripTime => {
  const iEq = Math.sqrt(Math.pow(current, 2) + npsWeighting * Math.pow(npsCurrentA, 2));
  if (iEq <= pickupA) return NEVER_TRIPS;

  const arg = 1 - Math.pow(pickupA / iEq, 2) * (1 - hotFactor);
  // Already past the thermal limit: saturate instead of producing NaN
  if (arg <= 0) return NEVER_TRIPS;

  const t = -timeConstantS * Math.log(arg);
  if (!Number.isFinite(t)) return NEVER_TRIPS;
  return trips(Math.max(t, MIN_TRIP_TIME_S));
};

interface IdmtConstants {
  k: number;
  alpha: number;
  label: string;
}

export const IDMT_CURVES: Record<IdmtCurve, IdmtConstants> = {
  NI: { k: 0.14, alpha: 0.02, label: 'Normal Inverse' },
  VI: { k: 13.5, alpha: 1, label: 'Very Inverse' },
  EI: { k: 80, alpha: 2, label: 'Extremely Inverse' },
};

export const isIdmtCurve = (curve: string): curve is IdmtCurve =>
  Object.prototype.hasOwnProperty.call(IDMT_CURVES, curve);

/**
 * Inverse-time overcurrent trip time: t = tms·k / (M^α - 1), M = I / I_pickup.
 * Only operates above pickup. A curve label other than NI, VI or EI never trips.
 */
export const idmtTripTime = (
  current: number,
  pickupA: number,
  tms: number,
  curve: string = 'NI'
): TripTime => {
  const m = current / pickupA;
  if (m <= 1) return NEVER_TRIPS;
  if (!isIdmtCurve(curve)) return NEVER_TRIPS;

  const { k, alpha } = IDMT_CURVES[curve];
  return trips((tms * k) / (Math.pow(m, alpha) - 1));
};

/**
 * Starting current during acceleration. The locked-rotor current is scaled by
 * the start voltage, then decays with slip towards full-load current.
 * Slip falls linearly from 1 and is floored at MIN_SLIP, so the last sample
 * sits just above full-load current.
 */
export const startingTrajectory = (
  fullLoadCurrentA: number,
  lockedRotorCurrentA: number,
  accelerationTimeS: number,
  voltagePct: number = 100,
  points: number = START_PROFILE_POINTS
): StartingTrajectory => {
  const iLrAdj = (lockedRotorCurrentA * voltagePct) / 100;
  const times: number[] = [];
  const currents: number[] = [];

  for (let i = 0; i < points; i++) {
    const t = points > 1 ? (accelerationTimeS * i) / (points - 1) : 0;
    const slip = Math.max(MIN_SLIP, 1 - t / accelerationTimeS);
    times.push(t);
    currents.push(fullLoadCurrentA + (iLrAdj - fullLoadCurrentA) * slip);
  }

  return { times, currents };
};
