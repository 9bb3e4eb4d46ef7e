import React from 'react';

// ANSI device numbers of the functions drawn on the chart
const RELAY_FUNCTIONS = ['49', '50', '51', '50N', '46', '48'];

const MotorFeederDiagram: React.FC<{ voltageV: number; ratingKw: number }> = ({ voltageV, ratingKw }) => {
  return (
    <div className="w-full flex justify-center py-6 bg-white rounded-lg shadow-sm border border-slate-200">
      <svg width="360" height="300" viewBox="0 0 360 300" className="w-full max-w-sm">
        <defs>
          <marker id="trip-arrow" markerWidth="10" markerHeight="10" refX="9" refY="3" orient="auto" markerUnits="strokeWidth">
            <path d="M0,0 L0,6 L9,3 z" fill="#dc2626" />
          </marker>
        </defs>

        {/* Supply busbar */}
        <line x1="60" y1="25" x2="220" y2="25" stroke="#334155" strokeWidth="4" />
        <text x="140" y="15" textAnchor="middle" className="text-xs font-bold fill-slate-700">{voltageV} V BUS</text>

        {/* Feeder breaker */}
        <line x1="140" y1="25" x2="140" y2="55" stroke="#334155" strokeWidth="2" />
        <rect x="128" y="55" width="24" height="24" stroke="#334155" fill="white" strokeWidth="2" />
        <text x="160" y="71" className="text-xs fill-slate-500">CB</text>

        {/* Contactor */}
        <line x1="140" y1="79" x2="140" y2="100" stroke="#334155" strokeWidth="2" />
        <line x1="130" y1="100" x2="150" y2="100" stroke="#334155" strokeWidth="2" />
        <line x1="130" y1="112" x2="150" y2="112" stroke="#334155" strokeWidth="2" />
        <text x="160" y="110" className="text-xs fill-slate-500">Contactor</text>

        {/* Current transformer */}
        <line x1="140" y1="112" x2="140" y2="200" stroke="#334155" strokeWidth="2" />
        <circle cx="140" cy="150" r="10" stroke="#334155" fill="none" strokeWidth="2" />
        <text x="100" y="154" textAnchor="end" className="text-xs fill-slate-500">CT</text>
        <line x1="150" y1="150" x2="200" y2="150" stroke="#64748b" strokeWidth="1" strokeDasharray="3 2" />

        {/* Protection relay */}
        <rect x="200" y="120" width="120" height="60" rx="4" stroke="#1d4ed8" fill="#eff6ff" strokeWidth="2" />
        <text x="260" y="137" textAnchor="middle" className="text-xs font-bold fill-blue-700">Motor Relay</text>
        <text x="260" y="153" textAnchor="middle" className="text-[10px] fill-slate-600">{RELAY_FUNCTIONS.slice(0, 3).join(' / ')}</text>
        <text x="260" y="167" textAnchor="middle" className="text-[10px] fill-slate-600">{RELAY_FUNCTIONS.slice(3).join(' / ')}</text>

        {/* Trip path back to the breaker */}
        <path d="M260,120 L260,67 L156,67" stroke="#dc2626" strokeWidth="1" fill="none" strokeDasharray="4 3" markerEnd="url(#trip-arrow)" />

        {/* Motor */}
        <circle cx="140" cy="230" r="28" stroke="#334155" fill="white" strokeWidth="2" />
        <text x="140" y="236" textAnchor="middle" className="text-lg font-bold fill-slate-700">M</text>
        <text x="140" y="282" textAnchor="middle" className="text-xs fill-slate-500">{ratingKw} kW induction motor</text>
      </svg>
    </div>
  );
};

export default MotorFeederDiagram;
