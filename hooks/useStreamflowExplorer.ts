
import { useState, useEffect, useCallback, useRef } from 'react';
import { apiClient } from '../services/apiClient';
import { buildClickEvent } from '../services/mapInteraction';
import type { LoadStatus, MapPoint, MapView, PanelFragment } from '../types';

export const useStreamflowExplorer = () => {
    const [status, setStatus] = useState<LoadStatus>('Initializing...');
    const [mapView, setMapView] = useState<MapView | null>(null);
    const [fragment, setFragment] = useState<PanelFragment | null>(null);
    const [error, setError] = useState<string | null>(null);

    // Only the latest click may write to the panel.
    const requestRef = useRef<number>(0);

    const requestFragment = useCallback(async (point: MapPoint | null) => {
        const requestId = ++requestRef.current;
        setStatus(point ? 'Loading plot...' : 'Initializing...');
        setError(null);

        try {
            const next = await apiClient.sendMapClick(point ? buildClickEvent(point) : null);
            if (requestId !== requestRef.current) return;
            setFragment(next);
            setStatus('Ready');
        } catch (e) {
            if (requestId !== requestRef.current) return;
            const errorMessage = e instanceof Error ? e.message : 'An unknown error occurred.';
            console.error('[PANEL] Request failed:', errorMessage);
            setError(errorMessage);
            setStatus('Error');
        }
    }, []);

    useEffect(() => {
        let mounted = true;

        const initialize = async () => {
            const view = await apiClient.getMapView();
            if (!mounted) return;
            setMapView(view);
            await requestFragment(null);
        };

        initialize().catch(err => {
            if (!mounted) return;
            const errorMessage = err instanceof Error ? err.message : String(err);
            console.error('[APP] CRITICAL: Initialization failed:', errorMessage);
            setError(errorMessage);
            setStatus('Error');
        });

        return () => {
            mounted = false;
        };
    }, [requestFragment]);

    const selectGauge = useCallback((point: MapPoint) => {
        void requestFragment(point);
    }, [requestFragment]);

    return { status, mapView, fragment, error, selectGauge };
};
