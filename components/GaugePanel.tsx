import React from 'react';
import { AlertTriangle, Loader2, MousePointerClick } from 'lucide-react';
import type { LoadStatus, PanelFragment } from '../types';

interface GaugePanelProps {
    fragment: PanelFragment | null;
    status: LoadStatus;
    error: string | null;
}

const GaugePanel: React.FC<GaugePanelProps> = ({ fragment, status, error }) => {
    if (error) {
        return (
            <div className="flex flex-col items-center justify-center h-full text-center gap-3">
                <AlertTriangle className="h-10 w-10 text-red-400" />
                <p className="text-sm text-slate-400">Failed to reach the server: {error}</p>
            </div>
        );
    }

    if (!fragment) {
        return (
            <div className="flex items-center justify-center h-full">
                <Loader2 className="h-10 w-10 animate-spin text-cyan-500" />
            </div>
        );
    }

    return (
        <div className="relative">
            {status === 'Loading plot...' && (
                <div className="absolute top-2 right-2">
                    <Loader2 className="h-5 w-5 animate-spin text-cyan-400" />
                </div>
            )}

            {fragment.kind === 'placeholder' && (
                <div className="flex items-center gap-3 text-slate-400 p-4">
                    <MousePointerClick className="h-5 w-5 text-cyan-400" />
                    <span>{fragment.text}</span>
                </div>
            )}

            {fragment.kind === 'image' && (
                <img src={fragment.src} alt={fragment.alt} className="w-full h-auto rounded-lg bg-white" />
            )}

            {fragment.kind === 'error' && (
                <div className="flex items-start gap-3 p-4 rounded-lg border border-red-500/20 bg-red-950/20 text-red-300 text-sm">
                    <AlertTriangle className="h-5 w-5 shrink-0" />
                    <span>{fragment.text}</span>
                </div>
            )}
        </div>
    );
};

export default GaugePanel;
