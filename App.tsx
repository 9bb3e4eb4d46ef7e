import React, { useState, useEffect, useMemo } from 'react';
import { Activity, Zap, Thermometer, Gauge, ShieldAlert, Settings, AlertTriangle, CheckCircle, Database, FileText, Download, Loader2, Save, FolderOpen, ChevronDown, LineChart as LineChartIcon } from 'lucide-react';
import MotorFeederDiagram from './components/MotorFeederDiagram';
import ProtectionChart from './components/ProtectionChart';
import type { IdmtCurve, MotorSettings, StartingAssessment } from './types';
import { DEFAULT_MOTOR_SETTINGS, resolveProtectionSettings } from './utils/settings';
import { assessStarting, sampleCurveFamily } from './utils/curveSampler';
import { ALL_SERIES, DEFAULT_VISIBLE_SERIES, buildChartSeries, seriesStyles, type SeriesKey } from './utils/chartSeries';
import { formatTripTime, IDMT_CURVES } from './utils/protectionCalculations';
import { listSavedProjects, loadProject, saveProject, type SavedProject } from './utils/projectStorage';
import { exportElementToPdf, reportFileName } from './services/reportExport';
import { getProtectionAssessment } from './services/geminiService';

const App: React.FC = () => {
  // --- State ---
  const [projectName, setProjectName] = useState<string>("Motor Protection - 001");
  const [savedProjects, setSavedProjects] = useState<string[]>([]);

  const [settings, setSettings] = useState<MotorSettings>(DEFAULT_MOTOR_SETTINGS);
  const [visibleSeries, setVisibleSeries] = useState<SeriesKey[]>(DEFAULT_VISIBLE_SERIES);

  const [aiAssessment, setAiAssessment] = useState<string>("");
  const [loadingAi, setLoadingAi] = useState<boolean>(false);
  const [isExporting, setIsExporting] = useState<boolean>(false);

  // --- Effects ---
  useEffect(() => {
    setSavedProjects(listSavedProjects(localStorage));
  }, []);

  const update = <K extends keyof MotorSettings>(group: K, patch: Partial<MotorSettings[K]>) =>
    setSettings((prev) => ({ ...prev, [group]: { ...prev[group], ...patch } }));

  // --- Calculations ---
  const resolution = useMemo(() => resolveProtectionSettings(settings), [settings]);

  const family = useMemo(
    () => (resolution.ok ? sampleCurveFamily(resolution.settings) : null),
    [resolution]
  );

  const startCheck = useMemo(
    () => (resolution.ok ? assessStarting(resolution.settings) : null),
    [resolution]
  );

  const chartSeries = useMemo(
    () => (family ? buildChartSeries(family, visibleSeries, settings.idmt.curve) : null),
    [family, visibleSeries, settings.idmt.curve]
  );

  const styles = seriesStyles(settings.idmt.curve);

  // --- Handlers ---
  const toggleSeries = (key: SeriesKey) =>
    setVisibleSeries((prev) =>
      prev.includes(key) ? prev.filter((k) => k !== key) : ALL_SERIES.filter((k) => k === key || prev.includes(k))
    );

  const handleAiAnalysis = async () => {
    if (!resolution.ok || !startCheck) return;
    setLoadingAi(true);
    const text = await getProtectionAssessment(settings, resolution.settings, startCheck);
    setAiAssessment(text);
    setLoadingAi(false);
  };

  const handleSaveProject = () => {
    if (!projectName.trim()) {
      alert("Please enter a project name.");
      return;
    }
    const dataToSave: SavedProject = { settings, visibleSeries, timestamp: Date.now() };
    try {
      saveProject(localStorage, projectName, dataToSave);
      setSavedProjects(listSavedProjects(localStorage));
      alert(`Project "${projectName}" saved successfully!`);
    } catch (error) {
      console.error("Error saving project", error);
      alert("Failed to save project. Local storage might be full.");
    }
  };

  const handleLoadProject = (e: React.ChangeEvent<HTMLSelectElement>) => {
    const selectedName = e.target.value;
    if (!selectedName) return;

    const data = loadProject(localStorage, selectedName);
    if (!data) {
      alert("Failed to load project data.");
      return;
    }
    setSettings(data.settings);
    setVisibleSeries(data.visibleSeries);
    setProjectName(selectedName);
    setAiAssessment("");
  };

  const handleExportPdf = async () => {
    const element = document.getElementById('app-container');
    if (!element) return;

    setIsExporting(true);
    try {
      await exportElementToPdf(element, reportFileName(projectName));
    } catch (error) {
      console.error("PDF Export failed:", error);
      alert("Failed to export PDF.");
    } finally {
      setIsExporting(false);
    }
  };

  const { motor, starting, thermal, overcurrent, idmt, earthFault, nps, lockedRotor } = settings;

  return (
    <div id="app-container" className="min-h-screen bg-slate-50 text-slate-800 font-sans pb-10">
      {/* Header */}
      <header className="bg-slate-900 text-white shadow-lg sticky top-0 z-50 print:hidden">
        <div className="max-w-7xl mx-auto p-4">
          <div className="flex flex-col xl:flex-row xl:items-center justify-between gap-4">
            <div className="flex items-center gap-3 shrink-0">
              <Zap className="h-6 w-6 text-yellow-400 shrink-0" />
              <div>
                <h1 className="text-xl font-bold tracking-tight leading-none">Induction Motor Protection Curves</h1>
                <span className="text-slate-400 text-xs">Motor: {motor.ratingKw} kW, {motor.voltageV} V</span>
              </div>
            </div>

            <div className="flex-1 flex flex-col md:flex-row items-center gap-3 w-full xl:w-auto xl:justify-end">
              {/* Save/Load Section */}
              <div className="flex items-center gap-2 bg-slate-800 p-1.5 rounded-lg border border-slate-700 w-full md:w-auto">
                <FileText className="w-4 h-4 text-slate-400 ml-2 shrink-0" />
                <input
                  type="text"
                  value={projectName}
                  onChange={(e) => setProjectName(e.target.value)}
                  placeholder="Project Name..."
                  className="bg-transparent border-none text-white text-sm w-full md:w-40 focus:ring-0 placeholder-slate-500"
                />
                <button
                  onClick={handleSaveProject}
                  data-html2canvas-ignore="true"
                  title="Save Project"
                  className="p-1.5 bg-green-600 hover:bg-green-700 rounded text-white transition shrink-0"
                >
                  <Save className="w-4 h-4" />
                </button>
                <div className="flex items-center bg-slate-700 rounded overflow-hidden shrink-0" data-html2canvas-ignore="true">
                  <div className="p-1.5 text-slate-300">
                    <FolderOpen className="w-4 h-4" />
                  </div>
                  <select
                    onChange={handleLoadProject}
                    value=""
                    className="bg-slate-700 text-white text-xs border-none focus:ring-0 w-24 md:w-32 cursor-pointer outline-none py-1.5"
                  >
                    <option value="" disabled>Load...</option>
                    {savedProjects.map(p => (
                      <option key={p} value={p}>{p}</option>
                    ))}
                  </select>
                </div>
              </div>

              <button
                onClick={handleExportPdf}
                disabled={isExporting}
                data-html2canvas-ignore="true"
                className="flex items-center gap-2 bg-blue-600 hover:bg-blue-700 text-white px-4 py-1.5 rounded-md text-sm font-medium transition disabled:opacity-50 whitespace-nowrap"
              >
                {isExporting ? <Loader2 className="w-4 h-4 animate-spin" /> : <Download className="w-4 h-4" />}
                {isExporting ? "..." : "PDF"}
              </button>
            </div>
          </div>
        </div>
      </header>

      <main className="max-w-7xl mx-auto p-4 lg:p-6 grid grid-cols-1 lg:grid-cols-12 gap-6">

        {/* Left Column: Inputs */}
        <div className="lg:col-span-4 space-y-4">
          <Section title="Motor Parameters" icon={<Activity className="w-5 h-5 text-blue-600" />} defaultOpen>
            <InputGroup label="Motor Rating" value={motor.ratingKw} unit="kW" onChange={(v) => update('motor', { ratingKw: v })} />
            <InputGroup label="Voltage" value={motor.voltageV} unit="V" onChange={(v) => update('motor', { voltageV: v })} />
            <InputGroup label="Full Load Current" value={motor.fullLoadCurrentA} unit="A" step={0.1} onChange={(v) => update('motor', { fullLoadCurrentA: v })} />
          </Section>

          <Section title="Motor Starting" icon={<Gauge className="w-5 h-5 text-blue-600" />}>
            <InputGroup label="Locked Rotor Current" value={starting.lockedRotorMultiple} unit="×FLC" step={0.1} onChange={(v) => update('starting', { lockedRotorMultiple: v })} />
            <InputGroup label="Acceleration Time" value={starting.accelerationTimeS} unit="s" onChange={(v) => update('starting', { accelerationTimeS: v })} />
            <InputGroup label="Start Voltage" value={starting.startVoltagePct} unit="%" helper="% of rated voltage" onChange={(v) => update('starting', { startVoltagePct: v })} />
          </Section>

          <Section title="Thermal Model" icon={<Thermometer className="w-5 h-5 text-blue-600" />}>
            <div className="grid grid-cols-2 gap-3">
              <InputGroup label="Thermal Pickup" value={thermal.pickupMultiple} unit="×FLC" step={0.05} onChange={(v) => update('thermal', { pickupMultiple: v })} />
              <InputGroup label="Time Constant τ" value={thermal.timeConstantS} unit="s" onChange={(v) => update('thermal', { timeConstantS: v })} />
              <InputGroup label="Hot Condition A2" value={thermal.hotFactor} unit="" step={0.05} onChange={(v) => update('thermal', { hotFactor: v })} />
              <InputGroup label="NPS Weighting K" value={thermal.npsWeighting} unit="" step={0.1} onChange={(v) => update('thermal', { npsWeighting: v })} />
            </div>
            <InputGroup label="Negative-sequence Unbalance" value={thermal.unbalancePct} unit="%FLC" step={0.5} onChange={(v) => update('thermal', { unbalancePct: v })} />
          </Section>

          <Section title="Overcurrent Protection" icon={<Zap className="w-5 h-5 text-blue-600" />}>
            <InputGroup label="Instantaneous OC" value={overcurrent.instantaneousMultiple} unit="×FLC" step={0.5} onChange={(v) => update('overcurrent', { instantaneousMultiple: v })} />
            <div className="grid grid-cols-2 gap-3">
              <InputGroup label="Definite-time OC" value={overcurrent.definiteTimeMultiple} unit="×FLC" step={0.1} onChange={(v) => update('overcurrent', { definiteTimeMultiple: v })} />
              <InputGroup label="DT Delay" value={overcurrent.definiteTimeDelayS} unit="s" step={0.1} onChange={(v) => update('overcurrent', { definiteTimeDelayS: v })} />
            </div>
          </Section>

          <Section title="IDMT OC Settings" icon={<LineChartIcon className="w-5 h-5 text-blue-600" />}>
            <div className="grid grid-cols-2 gap-3">
              <InputGroup label="IDMT Pickup" value={idmt.pickupMultiple} unit="×FLC" step={0.05} onChange={(v) => update('idmt', { pickupMultiple: v })} />
              <InputGroup label="TMS" value={idmt.tms} unit="" step={0.01} onChange={(v) => update('idmt', { tms: v })} />
            </div>
            <div>
              <label className="block text-xs font-medium text-slate-500 uppercase tracking-wide mb-1">Curve Type</label>
              <select
                value={idmt.curve}
                onChange={(e) => update('idmt', { curve: toIdmtCurve(e.target.value) })}
                className="w-full px-3 py-1.5 text-sm border border-slate-300 rounded focus:ring-2 focus:ring-blue-500 outline-none"
              >
                {IDMT_CURVE_OPTIONS.map((c) => (
                  <option key={c} value={c}>{c} — {IDMT_CURVES[c].label}</option>
                ))}
              </select>
            </div>
          </Section>

          <Section title="Earth Fault / NPS / Locked Rotor" icon={<ShieldAlert className="w-5 h-5 text-blue-600" />}>
            <div className="grid grid-cols-2 gap-3">
              <InputGroup label="EF Pickup" value={earthFault.pickupMultiple} unit="×FLC" step={0.05} onChange={(v) => update('earthFault', { pickupMultiple: v })} />
              <InputGroup label="EF Delay" value={earthFault.delayS} unit="s" step={0.05} onChange={(v) => update('earthFault', { delayS: v })} />
              <InputGroup label="NPS Pickup" value={nps.pickupPct} unit="%FLC" onChange={(v) => update('nps', { pickupPct: v })} />
              <InputGroup label="NPS Delay" value={nps.delayS} unit="s" step={0.05} onChange={(v) => update('nps', { delayS: v })} />
              <InputGroup label="LR Pickup" value={lockedRotor.pickupMultiple} unit="×FLC" step={0.5} onChange={(v) => update('lockedRotor', { pickupMultiple: v })} />
              <InputGroup label="LR Max Time" value={lockedRotor.maxTimeS} unit="s" onChange={(v) => update('lockedRotor', { maxTimeS: v })} />
            </div>
          </Section>
        </div>

        {/* Right Column: Results & Visualization */}
        <div className="lg:col-span-8 space-y-6">

          {!resolution.ok && (
            <div className="bg-red-50 border border-red-200 rounded-xl p-5 text-sm text-red-700">
              <h3 className="font-bold flex items-center gap-2 mb-2">
                <AlertTriangle className="w-5 h-5" /> Settings out of range
              </h3>
              <ul className="list-disc pl-5 space-y-1">
                {resolution.issues.map((issue) => (
                  <li key={issue.path}><span className="font-mono">{issue.path}</span>: {issue.message}</li>
                ))}
              </ul>
            </div>
          )}

          {/* Chart */}
          <div className="bg-white rounded-xl shadow-md border border-slate-200 p-5">
            <div className="flex justify-between items-center mb-3">
              <h3 className="font-bold text-slate-700">Motor Protection Curves</h3>
              <span className="text-xs bg-slate-100 px-2 py-1 rounded text-slate-500">log-log</span>
            </div>

            <div className="mb-4" data-html2canvas-ignore="true">
              <div className="flex items-center justify-between mb-2">
                <span className="text-xs font-bold text-slate-400 uppercase">Display options</span>
                <div className="flex gap-2 text-xs">
                  <button onClick={() => setVisibleSeries([...ALL_SERIES])} className="px-2 py-1 bg-slate-100 hover:bg-slate-200 rounded">Select all</button>
                  <button onClick={() => setVisibleSeries([])} className="px-2 py-1 bg-slate-100 hover:bg-slate-200 rounded">Select none</button>
                </div>
              </div>
              <div className="grid grid-cols-1 sm:grid-cols-2 gap-1 text-xs text-slate-600">
                {ALL_SERIES.map((key) => (
                  <label key={key} className="flex items-center gap-2 cursor-pointer">
                    <input type="checkbox" checked={visibleSeries.includes(key)} onChange={() => toggleSeries(key)} />
                    {styles[key].label}
                  </label>
                ))}
              </div>
            </div>

            {chartSeries ? (
              <ProtectionChart series={chartSeries} title={`${motor.ratingKw} kW, ${motor.voltageV} V`} />
            ) : (
              <div className="bg-slate-50 p-4 rounded-lg text-sm text-slate-500 italic text-center">
                Correct the settings above to draw the curves.
              </div>
            )}
          </div>

          {startCheck && <StartingCheckTable check={startCheck} />}

          <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
            {/* Resolved settings */}
            <div className="bg-white rounded-xl shadow-sm border border-slate-200 p-5 text-sm">
              <h3 className="font-bold text-slate-700 mb-4 flex items-center gap-2">
                <Database className="w-4 h-4" /> Resolved Pickups
              </h3>
              {resolution.ok ? (
                <div className="grid grid-cols-2 gap-y-1 text-slate-600 pl-2 border-l-2 border-blue-200">
                  <span>Thermal: {resolution.settings.thermal.pickupA.toFixed(0)} A</span>
                  <span>I2: {resolution.settings.thermal.unbalanceCurrentA.toFixed(1)} A</span>
                  <span>IDMT: {resolution.settings.idmt.pickupA.toFixed(0)} A</span>
                  <span>Inst. OC: {resolution.settings.instantaneousOc.pickupA.toFixed(0)} A</span>
                  <span>DT OC: {resolution.settings.definiteTimeOc.pickupA.toFixed(0)} A</span>
                  <span>EF: {resolution.settings.earthFault.pickupA.toFixed(1)} A</span>
                  <span>NPS: {resolution.settings.nps.pickupA.toFixed(1)} A</span>
                  <span>LR: {resolution.settings.lockedRotor.pickupA.toFixed(0)} A</span>
                </div>
              ) : (
                <p className="text-slate-400 italic">Unavailable until the settings are valid.</p>
              )}
            </div>

            {/* SLD */}
            <div className="bg-white rounded-xl shadow-sm border border-slate-200 p-5 flex flex-col items-center justify-center">
              <div className="w-full flex justify-between items-center mb-2">
                <h3 className="font-bold text-slate-700">Motor Feeder</h3>
                <span className="text-[10px] text-slate-400">Visualization</span>
              </div>
              <MotorFeederDiagram voltageV={motor.voltageV} ratingKw={motor.ratingKw} />
            </div>
          </div>

          {/* AI Assessment */}
          <div className="bg-gradient-to-br from-indigo-50 to-blue-50 rounded-xl shadow-sm border border-indigo-100 p-6">
            <div className="flex items-start justify-between mb-4">
              <div>
                <h3 className="font-bold text-indigo-900 flex items-center gap-2">
                  <Zap className="w-5 h-5" /> AI Engineering Assessment
                </h3>
                <p className="text-sm text-indigo-700 mt-1">
                  Get a review of the protection settings against the motor starting profile.
                </p>
              </div>
              <button
                onClick={handleAiAnalysis}
                disabled={loadingAi || !resolution.ok}
                data-html2canvas-ignore="true"
                className="px-4 py-2 bg-indigo-600 hover:bg-indigo-700 text-white rounded-lg text-sm font-medium transition flex items-center gap-2 disabled:opacity-50"
              >
                {loadingAi ? 'Analyzing...' : 'Run Assessment'}
              </button>
            </div>

            {aiAssessment ? (
              <div className="bg-white p-4 rounded-lg border border-indigo-100 text-sm text-slate-700 prose prose-sm max-w-none">
                <pre className="whitespace-pre-wrap font-sans">{aiAssessment}</pre>
              </div>
            ) : (
              <div className="bg-white/50 p-4 rounded-lg border border-indigo-50 text-sm text-slate-500 italic text-center">
                Click the button above to generate a review of the protection settings.
              </div>
            )}
          </div>
        </div>
      </main>
    </div>
  );
};

// --- Helper Components ---

const IDMT_CURVE_OPTIONS: IdmtCurve[] = ['NI', 'VI', 'EI'];

const toIdmtCurve = (value: string): IdmtCurve =>
  IDMT_CURVE_OPTIONS.find((c) => c === value) ?? 'NI';

const Section: React.FC<{
  title: string;
  icon: React.ReactNode;
  defaultOpen?: boolean;
  children: React.ReactNode;
}> = ({ title, icon, defaultOpen = false, children }) => {
  const [open, setOpen] = useState(defaultOpen);
  return (
    <div className="bg-white rounded-xl shadow-sm border border-slate-200 p-5">
      <button onClick={() => setOpen(!open)} className="w-full flex items-center justify-between font-semibold text-slate-700">
        <span className="flex items-center gap-2">{icon} {title}</span>
        <ChevronDown className={`w-4 h-4 text-slate-400 transition-transform ${open ? 'rotate-180' : ''}`} />
      </button>
      {open && <div className="space-y-4 mt-4 pt-2 border-t">{children}</div>}
    </div>
  );
};

const CheckRow: React.FC<{ label: string; value: string; ok: boolean }> = ({ label, value, ok }) => (
  <tr className="hover:bg-slate-50/50">
    <td className="px-6 py-3 font-medium text-slate-700">{label}</td>
    <td className="px-6 py-3 font-mono">{value}</td>
    <td className="px-6 py-3">
      {ok ? (
        <span className="flex items-center gap-1 text-green-700"><CheckCircle className="w-4 h-4" /> OK</span>
      ) : (
        <span className="flex items-center gap-1 text-red-600 font-bold"><AlertTriangle className="w-4 h-4" /> Trips during start</span>
      )}
    </td>
  </tr>
);

const StartingCheckTable: React.FC<{ check: StartingAssessment }> = ({ check }) => (
  <div className="bg-white rounded-xl shadow-md border border-slate-200 overflow-hidden">
    <div className="p-4 bg-slate-800 text-white flex justify-between items-center">
      <h3 className="font-bold flex items-center gap-2">
        <Settings className="w-5 h-5 text-green-400" /> Starting Check
      </h3>
      <span className="text-xs bg-slate-700 px-2 py-1 rounded text-slate-300">
        {check.startingCurrentA.toFixed(0)} A for {check.accelerationTimeS} s
      </span>
    </div>
    <div className="overflow-x-auto">
      <table className="w-full text-sm text-left">
        <thead className="text-xs text-slate-500 uppercase bg-slate-50 border-b border-slate-200">
          <tr>
            <th className="px-6 py-3 font-semibold">Function</th>
            <th className="px-6 py-3">At Starting Current</th>
            <th className="px-6 py-3">Result</th>
          </tr>
        </thead>
        <tbody className="divide-y divide-slate-100">
          <CheckRow label="Thermal (Cold)" value={formatTripTime(check.thermalCold)} ok={check.thermalColdClearsStart} />
          <CheckRow label="Thermal (Hot)" value={formatTripTime(check.thermalHot)} ok={check.thermalHotClearsStart} />
          <CheckRow label="IDMT" value={formatTripTime(check.idmt)} ok={check.idmtClearsStart} />
          <CheckRow label="Locked Rotor Max Time" value={check.lockedRotorClearsStart ? 'Above t_acc' : 'Below t_acc'} ok={check.lockedRotorClearsStart} />
          <CheckRow label="Instantaneous OC" value={check.instantaneousAboveStart ? 'Above I_start' : 'Below I_start'} ok={check.instantaneousAboveStart} />
        </tbody>
      </table>
    </div>
  </div>
);

const InputGroup: React.FC<{
  label: string;
  value: number;
  unit: string;
  step?: number;
  helper?: string;
  onChange: (val: number) => void;
}> = ({ label, value, unit, step = 1, helper, onChange }) => (
  <div>
    <label className="block text-xs font-medium text-slate-500 uppercase tracking-wide mb-1 truncate" title={label}>{label}</label>
    <div className="relative">
      <input
        type="number"
        step={step}
        value={value}
        onChange={(e) => onChange(parseFloat(e.target.value) || 0)}
        className="w-full pl-3 pr-12 py-1.5 text-sm border border-slate-300 rounded focus:ring-2 focus:ring-blue-500 focus:border-blue-500 outline-none transition text-slate-800"
      />
      <span className="absolute right-2 top-1.5 text-slate-400 text-xs pointer-events-none">{unit}</span>
    </div>
    {helper && <p className="text-[10px] text-slate-400 mt-0.5">{helper}</p>}
  </div>
);

export default App;
