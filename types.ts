export type IdmtCurve = 'NI' | 'VI' | 'EI';

// Raw values as entered in the settings panel (×FLC multiples and % of FLC)
export interface MotorData {
  ratingKw: number;
  voltageV: number;
  fullLoadCurrentA: number;
}

export interface StartingData {
  lockedRotorMultiple: number; // ×FLC
  accelerationTimeS: number;
  startVoltagePct: number; // % of rated
}

export interface ThermalData {
  pickupMultiple: number; // ×FLC
  timeConstantS: number; // τ
  hotFactor: number; // A2, 0 = cold
  npsWeighting: number; // K
  unbalancePct: number; // I2 in %FLC
}

export interface OvercurrentData {
  instantaneousMultiple: number;
  definiteTimeMultiple: number;
  definiteTimeDelayS: number;
}

export interface IdmtData {
  pickupMultiple: number;
  tms: number;
  curve: IdmtCurve;
}

export interface EarthFaultData {
  pickupMultiple: number;
  delayS: number;
}

export interface NpsData {
  pickupPct: number; // %FLC
  delayS: number;
}

export interface LockedRotorData {
  pickupMultiple: number;
  maxTimeS: number;
}

export interface MotorSettings {
  motor: MotorData;
  starting: StartingData;
  thermal: ThermalData;
  overcurrent: OvercurrentData;
  idmt: IdmtData;
  earthFault: EarthFaultData;
  nps: NpsData;
  lockedRotor: LockedRotorData;
}

// Resolved settings: every current is in amperes
export interface ProtectionSettings {
  fullLoadCurrentA: number;
  thermal: {
    pickupA: number;
    timeConstantS: number;
    hotFactor: number;
    npsWeighting: number;
    unbalanceCurrentA: number;
  };
  idmt: {
    pickupA: number;
    tms: number;
    curve: IdmtCurve;
  };
  instantaneousOc: { pickupA: number };
  definiteTimeOc: { pickupA: number; delayS: number };
  earthFault: { pickupA: number; delayS: number };
  nps: { pickupA: number; delayS: number };
  lockedRotor: { pickupA: number; maxTimeS: number };
  starting: {
    lockedRotorCurrentA: number;
    accelerationTimeS: number;
    voltagePct: number;
  };
}

export type TripTime =
  | { readonly kind: 'trips'; readonly seconds: number }
  | { readonly kind: 'never' };

export interface TripPoint {
  readonly current: number;
  readonly time: TripTime;
}

export type TripCurve = ReadonlyArray<TripPoint>;

export interface StartingTrajectory {
  readonly times: ReadonlyArray<number>;
  readonly currents: ReadonlyArray<number>;
}

export type ThresholdKind =
  | 'instantaneousOc'
  | 'definiteTimeOc'
  | 'earthFault'
  | 'nps'
  | 'lockedRotor';

export interface ThresholdLine {
  readonly kind: ThresholdKind;
  readonly label: string;
  readonly currentThreshold: number;
  readonly timeThreshold: number | null; // null = no intentional delay
}

export interface CurveFamily {
  readonly currents: ReadonlyArray<number>;
  readonly thermalCold: TripCurve;
  readonly thermalHot: TripCurve;
  readonly idmt: TripCurve;
  readonly starting: StartingTrajectory;
  readonly thresholds: ReadonlyArray<ThresholdLine>;
}

export interface StartingAssessment {
  startingCurrentA: number;
  accelerationTimeS: number;
  thermalCold: TripTime;
  thermalHot: TripTime;
  idmt: TripTime;
  thermalColdClearsStart: boolean;
  thermalHotClearsStart: boolean;
  idmtClearsStart: boolean;
  lockedRotorClearsStart: boolean;
  instantaneousAboveStart: boolean;
}

export interface SettingsIssue {
  path: string;
  message: string;
}

export type SettingsResolution =
  | { ok: true; settings: ProtectionSettings }
  | { ok: false; issues: SettingsIssue[] };
