import React from 'react';
import type { MapView } from '../types';

interface MapLegendProps {
    legend: MapView['legend'];
}

const MapLegend: React.FC<MapLegendProps> = ({ legend }) => (
    <div
        className="absolute z-10 bg-slate-900/85 border border-white/10 rounded-lg px-3 py-2 backdrop-blur-sm shadow-xl"
        style={{ left: `${legend.x * 100}%`, bottom: `${legend.y * 100}%` }}
    >
        <p className="text-[10px] font-mono text-slate-400 uppercase tracking-widest mb-1">NSE</p>
        <ul className="space-y-1">
            {legend.items.map(item => (
                <li key={item.category} className="flex items-center gap-2 text-xs text-slate-200">
                    <span className="h-2.5 w-2.5 rounded-full" style={{ backgroundColor: item.color }} />
                    <span>{item.label}</span>
                    <span className="ml-auto pl-3 font-mono text-slate-500">{item.count}</span>
                </li>
            ))}
        </ul>
    </div>
);

export default MapLegend;
