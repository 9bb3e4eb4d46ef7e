import type { CurveFamily, IdmtCurve, ThresholdKind, TripCurve } from '../types';
import { tripSeconds } from './protectionCalculations';

export type CurveKey = 'thermalCold' | 'thermalHot' | 'motorStart' | 'idmt';
export type LineKey = `${ThresholdKind}:vertical` | `${ThresholdKind}:horizontal`;
export type SeriesKey = CurveKey | LineKey;

export interface SeriesStyle {
  label: string;
  color: string;
  width: number;
  dash?: string;
}

export interface PlotPoint {
  current: number;
  time: number;
}

export interface PlotCurve extends SeriesStyle {
  key: CurveKey;
  points: PlotPoint[];
}

export interface PlotLine extends SeriesStyle {
  key: LineKey;
  value: number;
}

export interface ChartSeries {
  curves: PlotCurve[];
  verticals: PlotLine[];
  horizontals: PlotLine[];
  currentDomain: [number, number];
  timeDomain: [number, number];
}

const THRESHOLD_COLORS: Record<ThresholdKind, string> = {
  instantaneousOc: '#dc2626',
  definiteTimeOc: '#16a34a',
  earthFault: '#c026d3',
  nps: '#0891b2',
  lockedRotor: '#92400e',
};

export const seriesStyles = (curve: IdmtCurve): Record<SeriesKey, SeriesStyle> => {
  const dashed = '6 4';
  return {
    thermalCold: { label: 'Thermal limit (Cold)', color: '#1e3a8a', width: 3 },
    thermalHot: { label: 'Thermal limit (Hot)', color: '#c2410c', width: 3 },
    motorStart: { label: 'Motor start', color: '#000000', width: 3, dash: dashed },
    idmt: { label: `IDMT (${curve})`, color: '#7e22ce', width: 3, dash: '2 3' },
    'instantaneousOc:vertical': { label: 'Instantaneous OC (vertical)', color: THRESHOLD_COLORS.instantaneousOc, width: 3, dash: dashed },
    'instantaneousOc:horizontal': { label: 'Instantaneous OC (horizontal)', color: THRESHOLD_COLORS.instantaneousOc, width: 3, dash: dashed },
    'definiteTimeOc:vertical': { label: 'Definite-time OC (vertical)', color: THRESHOLD_COLORS.definiteTimeOc, width: 3, dash: dashed },
    'definiteTimeOc:horizontal': { label: 'Definite-time OC (horizontal)', color: THRESHOLD_COLORS.definiteTimeOc, width: 3, dash: dashed },
    'earthFault:vertical': { label: 'Earth Fault (vertical)', color: THRESHOLD_COLORS.earthFault, width: 3, dash: dashed },
    'earthFault:horizontal': { label: 'Earth Fault (horizontal)', color: THRESHOLD_COLORS.earthFault, width: 3, dash: dashed },
    'nps:vertical': { label: 'NPS (vertical)', color: THRESHOLD_COLORS.nps, width: 3, dash: dashed },
    'nps:horizontal': { label: 'NPS (horizontal)', color: THRESHOLD_COLORS.nps, width: 3, dash: dashed },
    'lockedRotor:vertical': { label: 'Locked Rotor Pickup (vertical)', color: THRESHOLD_COLORS.lockedRotor, width: 3, dash: dashed },
    'lockedRotor:horizontal': { label: 'Locked Rotor Max Time (horizontal)', color: THRESHOLD_COLORS.lockedRotor, width: 3, dash: dashed },
  };
};

/**
 * Selectable series in display order. Instantaneous OC has no delay, so it only
 * offers a vertical line.
 */
export const ALL_SERIES: SeriesKey[] = [
  'thermalCold',
  'thermalHot',
  'motorStart',
  'idmt',
  'instantaneousOc:vertical',
  'definiteTimeOc:vertical',
  'definiteTimeOc:horizontal',
  'earthFault:vertical',
  'earthFault:horizontal',
  'nps:vertical',
  'nps:horizontal',
  'lockedRotor:vertical',
  'lockedRotor:horizontal',
];

export const DEFAULT_VISIBLE_SERIES: SeriesKey[] = [
  'thermalCold',
  'thermalHot',
  'motorStart',
  'idmt',
  'instantaneousOc:vertical',
  'definiteTimeOc:horizontal',
];

export const isSeriesKey = (value: string): value is SeriesKey =>
  (ALL_SERIES as string[]).includes(value);

// Finite and positive only, anything else has no place on a log axis
const isPlottable = (p: PlotPoint): boolean =>
  Number.isFinite(p.time) && p.time > 0 && Number.isFinite(p.current) && p.current > 0;

export const toPlotPoints = (curve: TripCurve): PlotPoint[] =>
  curve
    .map((p) => ({ current: p.current, time: tripSeconds(p.time) }))
    .filter(isPlottable);

const decadeFloor = (v: number) => Math.pow(10, Math.floor(Math.log10(v)));
const decadeCeil = (v: number) => Math.pow(10, Math.ceil(Math.log10(v)));

const MIN_TIME_DOMAIN: [number, number] = [0.01, 1000];

const extent = (values: number[], fallback: [number, number]): [number, number] => {
  const finite = values.filter((v) => Number.isFinite(v) && v > 0);
  if (finite.length === 0) return fallback;
  return [decadeFloor(Math.min(...finite)), decadeCeil(Math.max(...finite))];
};

/**
 * Builds plot-ready series for the visible keys. The starting trajectory is
 * indexed by time; it is flipped here so current stays on the x axis.
 */
export const buildChartSeries = (
  family: CurveFamily,
  visible: ReadonlyArray<SeriesKey>,
  idmtCurve: IdmtCurve
): ChartSeries => {
  const styles = seriesStyles(idmtCurve);
  const shown = new Set(visible);

  const startPoints = family.starting.times
    .map((time, i) => ({ current: family.starting.currents[i], time }))
    .filter(isPlottable);

  const allCurves: Array<{ key: CurveKey; points: PlotPoint[] }> = [
    { key: 'thermalCold', points: toPlotPoints(family.thermalCold) },
    { key: 'thermalHot', points: toPlotPoints(family.thermalHot) },
    { key: 'motorStart', points: startPoints },
    { key: 'idmt', points: toPlotPoints(family.idmt) },
  ];

  const curves = allCurves
    .filter((c) => shown.has(c.key))
    .map((c) => ({ ...c, ...styles[c.key] }));

  const verticals: PlotLine[] = [];
  const horizontals: PlotLine[] = [];
  for (const t of family.thresholds) {
    const vKey: LineKey = `${t.kind}:vertical`;
    const hKey: LineKey = `${t.kind}:horizontal`;
    if (shown.has(vKey)) verticals.push({ key: vKey, value: t.currentThreshold, ...styles[vKey] });
    if (t.timeThreshold !== null && shown.has(hKey)) {
      horizontals.push({ key: hKey, value: t.timeThreshold, ...styles[hKey] });
    }
  }

  const currentDomain = extent(
    [...family.currents, ...family.starting.currents, ...verticals.map((l) => l.value)],
    [1, 10]
  );
  const timeDomain = extent(
    [...curves.flatMap((c) => c.points.map((p) => p.time)), ...horizontals.map((l) => l.value), ...MIN_TIME_DOMAIN],
    MIN_TIME_DOMAIN
  );

  return { curves, verticals, horizontals, currentDomain, timeDomain };
};

/** Tick values at every power of ten inside a decade-aligned domain. */
export const decadeTicks = ([min, max]: [number, number]): number[] => {
  const ticks: number[] = [];
  for (let e = Math.round(Math.log10(min)); e <= Math.round(Math.log10(max)); e++) {
    ticks.push(Math.pow(10, e));
  }
  return ticks;
};
