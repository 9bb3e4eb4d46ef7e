import { describe, expect, it } from 'vitest';
import { DEFAULT_MOTOR_SETTINGS, resolveProtectionSettings } from './settings';

describe('resolveProtectionSettings', () => {
  it('resolves multiples and percentages of FLC to amperes', () => {
    const result = resolveProtectionSettings(DEFAULT_MOTOR_SETTINGS);
    if (!result.ok) throw new Error('defaults should be valid');

    const { settings } = result;
    expect(settings.fullLoadCurrentA).toBe(100);
    expect(settings.thermal).toEqual({
      pickupA: 120,
      timeConstantS: 120,
      hotFactor: 0.5,
      npsWeighting: 2,
      unbalanceCurrentA: 10,
    });
    expect(settings.idmt).toEqual({ pickupA: 120, tms: 0.1, curve: 'NI' });
    expect(settings.instantaneousOc.pickupA).toBe(800);
    expect(settings.definiteTimeOc).toEqual({ pickupA: 200, delayS: 1 });
    expect(settings.earthFault).toEqual({ pickupA: 20, delayS: 0.5 });
    expect(settings.nps).toEqual({ pickupA: 10, delayS: 0.5 });
    expect(settings.lockedRotor).toEqual({ pickupA: 600, maxTimeS: 10 });
    expect(settings.starting).toEqual({ lockedRotorCurrentA: 600, accelerationTimeS: 10, voltagePct: 100 });
  });

  it('scales every current with the full-load current', () => {
    const result = resolveProtectionSettings({
      ...DEFAULT_MOTOR_SETTINGS,
      motor: { ...DEFAULT_MOTOR_SETTINGS.motor, fullLoadCurrentA: 250 },
    });
    if (!result.ok) throw new Error('settings should be valid');
    expect(result.settings.thermal.pickupA).toBe(300);
    expect(result.settings.instantaneousOc.pickupA).toBe(2000);
    expect(result.settings.nps.pickupA).toBe(25);
  });

  it('rejects a non-positive full-load current', () => {
    const result = resolveProtectionSettings({
      ...DEFAULT_MOTOR_SETTINGS,
      motor: { ...DEFAULT_MOTOR_SETTINGS.motor, fullLoadCurrentA: 0 },
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.issues.map((i) => i.path)).toEqual(['motor.fullLoadCurrentA']);
  });

  it('reports each out-of-range field by path', () => {
    const result = resolveProtectionSettings({
      ...DEFAULT_MOTOR_SETTINGS,
      thermal: { ...DEFAULT_MOTOR_SETTINGS.thermal, hotFactor: 1.5 },
      idmt: { ...DEFAULT_MOTOR_SETTINGS.idmt, tms: 0, curve: 'XI' },
    });
    if (result.ok) throw new Error('settings should be rejected');
    expect(result.issues.map((i) => i.path)).toEqual(['thermal.hotFactor', 'idmt.tms', 'idmt.curve']);
  });

  it('rejects values that are not settings at all', () => {
    expect(resolveProtectionSettings(null).ok).toBe(false);
    expect(resolveProtectionSettings({ motor: { ratingKw: Number.NaN } }).ok).toBe(false);
  });
});
