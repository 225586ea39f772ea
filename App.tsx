import React from 'react';
import { useStreamflowExplorer } from './hooks/useStreamflowExplorer';
import GaugeMap from './components/GaugeMap';
import GaugePanel from './components/GaugePanel';
import { APP_TITLE, PAGE_HEADING } from './constants';
import { Activity, Droplets, Radio } from 'lucide-react';

const App: React.FC = () => {
  const { status, mapView, fragment, error, selectGauge } = useStreamflowExplorer();

  const getStatusColor = () => {
    if (status === 'Ready') return 'bg-emerald-500 shadow-[0_0_10px_rgba(16,185,129,0.5)]';
    if (status === 'Error') return 'bg-red-500 shadow-[0_0_10px_rgba(239,68,68,0.5)]';
    return 'bg-amber-500 animate-pulse shadow-[0_0_10px_rgba(245,158,11,0.5)]';
  };

  return (
    <div className="min-h-screen flex flex-col">
      {/* Header */}
      <header className="sticky top-0 z-50 backdrop-blur-xl bg-slate-950/80 border-b border-white/5 shadow-lg">
        <div className="px-4 sm:px-6 lg:px-8 h-16 flex items-center justify-between">
          <div className="flex items-center gap-4">
            <div className="bg-gradient-to-br from-cyan-500/20 to-blue-500/10 p-2 rounded-xl border border-white/10">
              <Droplets className="h-5 w-5 text-cyan-400" />
            </div>
            <div>
              <h1 className="text-xl font-bold text-white tracking-tight">{PAGE_HEADING}</h1>
              <p className="text-[10px] text-slate-400 font-mono uppercase tracking-[0.2em]">{APP_TITLE}</p>
            </div>
          </div>

          <div className="flex items-center gap-3 bg-slate-900/80 px-3 py-1.5 rounded-full border border-white/10 shadow-inner">
            <div className={`h-2 w-2 rounded-full ${getStatusColor()}`} />
            <span className="text-[10px] font-mono font-bold text-slate-300 uppercase tracking-widest">{status}</span>
          </div>
        </div>
      </header>

      {/* Map (left) and gauge panel (right) */}
      <main className="flex flex-row" style={{ height: '90vh' }}>
        <section className="p-2.5" style={{ width: '60%' }}>
          {mapView ? (
            <GaugeMap view={mapView} onSelect={selectGauge} />
          ) : (
            <div className="flex flex-col items-center justify-center h-full border border-white/5 rounded-2xl bg-slate-900/30">
              {status === 'Error' ? (
                <Activity className="h-12 w-12 text-red-400" />
              ) : (
                <Radio className="h-12 w-12 text-cyan-400 animate-pulse" />
              )}
              <p className="mt-4 text-slate-500 font-mono text-xs uppercase tracking-widest">{status}</p>
            </div>
          )}
        </section>

        <aside className="p-2.5 overflow-auto" style={{ width: '40%', height: '90vh' }}>
          <div id="gauge-plot-output" className="h-full bg-slate-900/40 border border-white/10 rounded-2xl p-4">
            <GaugePanel fragment={fragment} status={status} error={error} />
          </div>
        </aside>
      </main>
    </div>
  );
};

export default App;
