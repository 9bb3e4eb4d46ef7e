import type {
  CurveFamily,
  ProtectionSettings,
  StartingAssessment,
  ThresholdLine,
  TripCurve,
  TripTime,
} from '../types';
import { idmtTripTime, startingTrajectory, thermalTripTime } from './protectionCalculations';

export const CURRENT_SWEEP_POINTS = 200;
export const CURRENT_SWEEP_MULTIPLE = 20;

/**
 * Log-spaced current sweep from I_f to multiple × I_f.
 * Endpoints are pinned so the sweep starts and ends exactly on them.
 */
export const currentSweep = (
  fullLoadCurrentA: number,
  multiple: number = CURRENT_SWEEP_MULTIPLE,
  count: number = CURRENT_SWEEP_POINTS
): number[] => {
  const last = multiple * fullLoadCurrentA;
  if (count < 2) return [fullLoadCurrentA];

  const logStart = Math.log10(fullLoadCurrentA);
  const logEnd = Math.log10(last);
  const sweep: number[] = [];
  for (let i = 0; i < count; i++) {
    if (i === 0) sweep.push(fullLoadCurrentA);
    else if (i === count - 1) sweep.push(last);
    else sweep.push(Math.pow(10, logStart + ((logEnd - logStart) * i) / (count - 1)));
  }
  return sweep;
};

const sampleCurve = (
  currents: ReadonlyArray<number>,
  tripTime: (current: number) => TripTime
): TripCurve => currents.map((current) => ({ current, time: tripTime(current) }));

export const buildThresholds = (settings: ProtectionSettings): ThresholdLine[] => [
  {
    kind: 'instantaneousOc',
    label: 'Instantaneous OC',
    currentThreshold: settings.instantaneousOc.pickupA,
    timeThreshold: null,
  },
  {
    kind: 'definiteTimeOc',
    label: 'Definite-time OC',
    currentThreshold: settings.definiteTimeOc.pickupA,
    timeThreshold: settings.definiteTimeOc.delayS,
  },
  {
    kind: 'earthFault',
    label: 'Earth Fault',
    currentThreshold: settings.earthFault.pickupA,
    timeThreshold: settings.earthFault.delayS,
  },
  {
    kind: 'nps',
    label: 'NPS',
    currentThreshold: settings.nps.pickupA,
    timeThreshold: settings.nps.delayS,
  },
  {
    kind: 'lockedRotor',
    label: 'Locked Rotor',
    currentThreshold: settings.lockedRotor.pickupA,
    timeThreshold: settings.lockedRotor.maxTimeS,
  },
];

/**
 * Evaluates every protection model for one settings snapshot.
 */
export const sampleCurveFamily = (settings: ProtectionSettings): CurveFamily => {
  const { fullLoadCurrentA, thermal, idmt, starting } = settings;
  const currents = currentSweep(fullLoadCurrentA);

  const thermalAt = (hotFactor: number) => (i: number) =>
    thermalTripTime(
      i,
      thermal.pickupA,
      thermal.timeConstantS,
      hotFactor,
      thermal.npsWeighting,
      thermal.unbalanceCurrentA
    );

  return {
    currents,
    thermalCold: sampleCurve(currents, thermalAt(0)),
    thermalHot: sampleCurve(currents, thermalAt(thermal.hotFactor)),
    idmt: sampleCurve(currents, (i) => idmtTripTime(i, idmt.pickupA, idmt.tms, idmt.curve)),
    starting: startingTrajectory(
      fullLoadCurrentA,
      starting.lockedRotorCurrentA,
      starting.accelerationTimeS,
      starting.voltagePct
    ),
    thresholds: buildThresholds(settings),
  };
};

const outlasts = (t: TripTime, seconds: number): boolean =>
  t.kind === 'never' || t.seconds > seconds;

/**
 * Checks the protections against the initial starting current: each time-graded
 * function should let the motor finish accelerating before it operates.
 */
export const assessStarting = (settings: ProtectionSettings): StartingAssessment => {
  const { thermal, idmt, starting } = settings;
  const startingCurrentA = (starting.lockedRotorCurrentA * starting.voltagePct) / 100;
  const accelerationTimeS = starting.accelerationTimeS;

  const thermalCold = thermalTripTime(
    startingCurrentA,
    thermal.pickupA,
    thermal.timeConstantS,
    0,
    thermal.npsWeighting,
    thermal.unbalanceCurrentA
  );
  const thermalHot = thermalTripTime(
    startingCurrentA,
    thermal.pickupA,
    thermal.timeConstantS,
    thermal.hotFactor,
    thermal.npsWeighting,
    thermal.unbalanceCurrentA
  );
  const idmtTime = idmtTripTime(startingCurrentA, idmt.pickupA, idmt.tms, idmt.curve);

  return {
    startingCurrentA,
    accelerationTimeS,
    thermalCold,
    thermalHot,
    idmt: idmtTime,
    thermalColdClearsStart: outlasts(thermalCold, accelerationTimeS),
    thermalHotClearsStart: outlasts(thermalHot, accelerationTimeS),
    idmtClearsStart: outlasts(idmtTime, accelerationTimeS),
    lockedRotorClearsStart: settings.lockedRotor.maxTimeS > accelerationTimeS,
    instantaneousAboveStart: settings.instantaneousOc.pickupA > startingCurrentA,
  };
};
