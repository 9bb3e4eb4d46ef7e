import { describe, expect, it } from 'vitest';
import { ALL_SERIES, DEFAULT_VISIBLE_SERIES, buildChartSeries, decadeTicks, isSeriesKey, toPlotPoints } from './chartSeries';
import { sampleCurveFamily } from './curveSampler';
import { DEFAULT_MOTOR_SETTINGS, toProtectionSettings } from './settings';

const family = sampleCurveFamily(toProtectionSettings(DEFAULT_MOTOR_SETTINGS));

describe('toPlotPoints', () => {
  it('drops points that cannot sit on a log time axis', () => {
    const points = toPlotPoints([
      { current: 100, time: { kind: 'never' } },
      { current: 200, time: { kind: 'trips', seconds: 5 } },
      { current: 300, time: { kind: 'trips', seconds: 0 } },
      { current: 400, time: { kind: 'trips', seconds: 1.5 } },
    ]);
    expect(points).toEqual([
      { current: 200, time: 5 },
      { current: 400, time: 1.5 },
    ]);
  });
});

describe('buildChartSeries', () => {
  it('returns the default curves and threshold lines', () => {
    const series = buildChartSeries(family, DEFAULT_VISIBLE_SERIES, 'NI');
    expect(series.curves.map((c) => c.key)).toEqual(['thermalCold', 'thermalHot', 'motorStart', 'idmt']);
    expect(series.curves[3].label).toBe('IDMT (NI)');
    expect(series.verticals).toHaveLength(1);
    expect(series.verticals[0]).toMatchObject({ key: 'instantaneousOc:vertical', value: 800 });
    expect(series.horizontals).toHaveLength(1);
    expect(series.horizontals[0]).toMatchObject({ key: 'definiteTimeOc:horizontal', value: 1 });
  });

  it('plots the starting trajectory with current on the x axis', () => {
    const series = buildChartSeries(family, ['motorStart'], 'VI');
    const start = series.curves[0];
    expect(start.key).toBe('motorStart');
    // t = 0 is dropped from the log axis
    expect(start.points).toHaveLength(199);
    expect(start.points[0]).toEqual({ current: family.starting.currents[1], time: family.starting.times[1] });
    expect(start.points[198]).toEqual({ current: family.starting.currents[199], time: 10 });
  });

  it('leaves never-trip samples off the thermal curve', () => {
    const series = buildChartSeries(family, ['thermalCold'], 'NI');
    const cold = series.curves[0].points;
    const tripping = family.thermalCold.filter((p) => p.time.kind === 'trips').length;
    expect(cold).toHaveLength(tripping);
    expect(cold.every((p) => Number.isFinite(p.time) && p.time > 0)).toBe(true);
  });

  it('draws every threshold line when all series are selected', () => {
    const series = buildChartSeries(family, ALL_SERIES, 'EI');
    expect(series.verticals.map((l) => l.value)).toEqual([800, 200, 20, 10, 600]);
    expect(series.horizontals.map((l) => l.key)).toEqual([
      'definiteTimeOc:horizontal',
      'earthFault:horizontal',
      'nps:horizontal',
      'lockedRotor:horizontal',
    ]);
    expect(series.currentDomain[0]).toBeCloseTo(10, 10);
    expect(series.currentDomain[1]).toBeCloseTo(10000, 6);
  });

  it('returns nothing to draw when no series is selected', () => {
    const series = buildChartSeries(family, [], 'NI');
    expect(series.curves).toEqual([]);
    expect(series.verticals).toEqual([]);
    expect(series.horizontals).toEqual([]);
    expect(series.timeDomain[0]).toBeCloseTo(0.01, 12);
    expect(series.timeDomain[1]).toBeCloseTo(1000, 9);
  });
});

describe('series helpers', () => {
  it('recognises known series keys', () => {
    expect(isSeriesKey('nps:vertical')).toBe(true);
    expect(isSeriesKey('instantaneousOc:horizontal')).toBe(false);
    expect(isSeriesKey('thermal')).toBe(false);
  });

  it('places a tick on every decade', () => {
    const ticks = decadeTicks([0.01, 1000]);
    expect(ticks).toHaveLength(6);
    expect(ticks[0]).toBeCloseTo(0.01, 12);
    expect(ticks[5]).toBeCloseTo(1000, 9);
  });
});
