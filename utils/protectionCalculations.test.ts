import { describe, expect, it } from 'vitest';
import {
  MIN_TRIP_TIME_S,
  formatTripTime,
  idmtTripTime,
  startingTrajectory,
  thermalTripTime,
  tripSeconds,
} from './protectionCalculations';
import type { TripTime } from '../types';

const seconds = (t: TripTime): number => {
  if (t.kind !== 'trips') throw new Error('expected a finite trip time');
  return t.seconds;
};

describe('thermalTripTime', () => {
  it('never trips at or below pickup without unbalance', () => {
    for (const i of [0, 50, 100, 119.9, 120]) {
      expect(thermalTripTime(i, 120, 120, 0, 0, 0)).toEqual({ kind: 'never' });
    }
  });

  it('counts negative-sequence current towards the heating current', () => {
    expect(thermalTripTime(119.5, 120, 120, 0, 0, 10).kind).toBe('never');
    expect(thermalTripTime(119.5, 120, 120, 0, 2, 10).kind).toBe('trips');
  });

  it('reproduces the thermal replica equation with NPS weighting', () => {
    const t = thermalTripTime(200, 120, 120, 0, 2, 10);
    expect(t).toEqual({
      kind: 'trips',
      seconds: -120 * Math.log(1 - Math.pow(120 / Math.sqrt(40200), 2)),
    });
    expect(seconds(t)).toBeCloseTo(53.2191, 4);
  });

  it('is long just above pickup and falls as current rises', () => {
    expect(seconds(thermalTripTime(121, 120, 120))).toBeCloseTo(492.814, 3);

    const times = [121, 130, 150, 200, 400, 800, 1600, 2400].map((i) => seconds(thermalTripTime(i, 120, 120)));
    for (let k = 1; k < times.length; k++) {
      expect(times[k]).toBeLessThan(times[k - 1]);
    }
  });

  it('shortens the trip time as the hot factor rises', () => {
    const times = [0, 0.25, 0.5, 0.75, 0.95].map((a2) => seconds(thermalTripTime(240, 120, 120, a2, 0, 0)));
    expect(times[0]).toBeCloseTo(34.52185, 4);
    expect(times[2]).toBeCloseTo(16.02377, 4);
    for (let k = 1; k < times.length; k++) {
      expect(times[k]).toBeLessThan(times[k - 1]);
    }
  });

  it('never reports less than the minimum trip time', () => {
    expect(thermalTripTime(1e6, 120, 10)).toEqual({ kind: 'trips', seconds: MIN_TRIP_TIME_S });
    expect(thermalTripTime(240, 120, 120, 1, 0, 0)).toEqual({ kind: 'trips', seconds: MIN_TRIP_TIME_S });

    for (const i of [125, 300, 1000, 5000, 50000]) {
      for (const a2 of [0, 0.5, 0.99]) {
        expect(seconds(thermalTripTime(i, 120, 60, a2, 2, 20))).toBeGreaterThanOrEqual(MIN_TRIP_TIME_S);
      }
    }
  });

  it('saturates to never when the log argument leaves its domain', () => {
    // A hot factor below zero pushes (I_th/I_eq)²·(1 - A2) past 1
    expect(thermalTripTime(121, 120, 120, -1, 0, 0)).toEqual({ kind: 'never' });
  });
});

describe('idmtTripTime', () => {
  it('never trips at or below pickup for any curve', () => {
    for (const curve of ['NI', 'VI', 'EI']) {
      for (const i of [0, 60, 119, 120]) {
        expect(idmtTripTime(i, 120, 0.5, curve)).toEqual({ kind: 'never' });
      }
    }
  });

  it('matches the normal inverse formula at twice pickup', () => {
    const t = idmtTripTime(240, 120, 1, 'NI');
    expect(t).toEqual({ kind: 'trips', seconds: 0.14 / (Math.pow(2, 0.02) - 1) });
    expect(seconds(t)).toBeCloseTo(10.029, 3);
  });

  it('matches the very and extremely inverse formulas', () => {
    expect(idmtTripTime(360, 120, 0.5, 'VI')).toEqual({ kind: 'trips', seconds: 3.375 });
    expect(idmtTripTime(360, 120, 0.5, 'EI')).toEqual({ kind: 'trips', seconds: 5 });
  });

  it('scales linearly with the time multiplier', () => {
    const base = seconds(idmtTripTime(600, 100, 1, 'VI'));
    expect(seconds(idmtTripTime(600, 100, 0.1, 'VI'))).toBeCloseTo(base * 0.1, 12);
  });

  it('falls back to never for an unrecognised curve', () => {
    expect(idmtTripTime(1000, 100, 1, 'XI')).toEqual({ kind: 'never' });
    expect(idmtTripTime(1000, 100, 1, 'toString')).toEqual({ kind: 'never' });
  });
});

describe('startingTrajectory', () => {
  const traj = startingTrajectory(100, 600, 10, 100);

  it('pairs 200 time samples with 200 currents across the acceleration time', () => {
    expect(traj.times).toHaveLength(200);
    expect(traj.currents).toHaveLength(200);
    expect(traj.times[0]).toBe(0);
    expect(traj.times[199]).toBe(10);
  });

  it('starts at locked-rotor current and decays without rising', () => {
    expect(traj.currents[0]).toBe(600);
    for (let k = 1; k < traj.currents.length; k++) {
      expect(traj.currents[k]).toBeLessThanOrEqual(traj.currents[k - 1]);
    }
  });

  it('levels off above full-load current at the slip floor', () => {
    expect(traj.currents[197]).toBeCloseTo(100 + 500 * (1 - (10 * 197) / 199 / 10), 10);
    expect(traj.currents[198]).toBeCloseTo(105, 10);
    expect(traj.currents[199]).toBeCloseTo(105, 10);
    expect(Math.min(...traj.currents)).toBeGreaterThan(100);
  });

  it('scales the locked-rotor current with start voltage', () => {
    const reduced = startingTrajectory(100, 600, 10, 50);
    expect(reduced.currents[0]).toBe(300);
    expect(reduced.currents[199]).toBeCloseTo(100 + 200 * 0.01, 10);
  });
});

describe('trip time helpers', () => {
  it('maps never to Infinity for plotting', () => {
    expect(tripSeconds({ kind: 'never' })).toBe(Number.POSITIVE_INFINITY);
    expect(tripSeconds({ kind: 'trips', seconds: 2.5 })).toBe(2.5);
  });

  it('formats trip times for display', () => {
    expect(formatTripTime({ kind: 'trips', seconds: 4.895863 })).toBe('4.90 s');
    expect(formatTripTime({ kind: 'never' })).toBe('No trip');
  });
});
