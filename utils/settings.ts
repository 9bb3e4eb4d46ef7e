import { z } from 'zod';
import type { MotorSettings, ProtectionSettings, SettingsResolution } from '../types';

const range = (min: number, max: number) => z.number().finite().min(min).max(max);

// Ranges follow the limits of the input controls
export const MotorSettingsSchema = z.object({
  motor: z.object({
    ratingKw: range(1, 5000),
    voltageV: range(100, 15000),
    fullLoadCurrentA: range(1, 2000),
  }),
  starting: z.object({
    lockedRotorMultiple: range(3, 10),
    accelerationTimeS: range(1, 60),
    startVoltagePct: range(50, 100),
  }),
  thermal: z.object({
    pickupMultiple: range(1, 8),
    timeConstantS: range(10, 600),
    hotFactor: range(0, 1),
    npsWeighting: range(0, 5),
    unbalancePct: range(0, 50),
  }),
  overcurrent: z.object({
    instantaneousMultiple: range(1, 20),
    definiteTimeMultiple: range(1, 10),
    definiteTimeDelayS: range(0.1, 10),
  }),
  idmt: z.object({
    pickupMultiple: range(1, 5),
    tms: range(0.05, 1),
    curve: z.enum(['NI', 'VI', 'EI']),
  }),
  earthFault: z.object({
    pickupMultiple: range(0.05, 1),
    delayS: range(0.05, 10),
  }),
  nps: z.object({
    pickupPct: range(1, 50),
    delayS: range(0.05, 10),
  }),
  lockedRotor: z.object({
    pickupMultiple: range(3, 10),
    maxTimeS: range(1, 60),
  }),
}) satisfies z.ZodType<MotorSettings>;

export const DEFAULT_MOTOR_SETTINGS: MotorSettings = {
  motor: { ratingKw: 500, voltageV: 3300, fullLoadCurrentA: 100 },
  starting: { lockedRotorMultiple: 6, accelerationTimeS: 10, startVoltagePct: 100 },
  thermal: { pickupMultiple: 1.2, timeConstantS: 120, hotFactor: 0.5, npsWeighting: 2, unbalancePct: 10 },
  overcurrent: { instantaneousMultiple: 8, definiteTimeMultiple: 2, definiteTimeDelayS: 1 },
  idmt: { pickupMultiple: 1.2, tms: 0.1, curve: 'NI' },
  earthFault: { pickupMultiple: 0.2, delayS: 0.5 },
  nps: { pickupPct: 10, delayS: 0.5 },
  lockedRotor: { pickupMultiple: 6, maxTimeS: 10 },
};

/**
 * Multiplies every ×FLC and %FLC setting out to amperes.
 * Assumes the input has already passed MotorSettingsSchema.
 */
export const toProtectionSettings = (s: MotorSettings): ProtectionSettings => {
  const iF = s.motor.fullLoadCurrentA;
  const pct = (value: number) => (value / 100) * iF;

  return {
    fullLoadCurrentA: iF,
    thermal: {
      pickupA: s.thermal.pickupMultiple * iF,
      timeConstantS: s.thermal.timeConstantS,
      hotFactor: s.thermal.hotFactor,
      npsWeighting: s.thermal.npsWeighting,
      unbalanceCurrentA: pct(s.thermal.unbalancePct),
    },
    idmt: {
      pickupA: s.idmt.pickupMultiple * iF,
      tms: s.idmt.tms,
      curve: s.idmt.curve,
    },
    instantaneousOc: { pickupA: s.overcurrent.instantaneousMultiple * iF },
    definiteTimeOc: {
      pickupA: s.overcurrent.definiteTimeMultiple * iF,
      delayS: s.overcurrent.definiteTimeDelayS,
    },
    earthFault: { pickupA: s.earthFault.pickupMultiple * iF, delayS: s.earthFault.delayS },
    nps: { pickupA: pct(s.nps.pickupPct), delayS: s.nps.delayS },
    lockedRotor: { pickupA: s.lockedRotor.pickupMultiple * iF, maxTimeS: s.lockedRotor.maxTimeS },
    starting: {
      lockedRotorCurrentA: s.starting.lockedRotorMultiple * iF,
      accelerationTimeS: s.starting.accelerationTimeS,
      voltagePct: s.starting.startVoltagePct,
    },
  };
};

export const resolveProtectionSettings = (raw: unknown): SettingsResolution => {
  const parsed = MotorSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }
  return { ok: true, settings: toProtectionSettings(parsed.data) };
};
