
import type { ClickEvent, MapView, PanelFragment } from '../types';

const API_BASE = '/api';

export const apiClient = {
    async getMapView(): Promise<MapView> {
        const res = await fetch(`${API_BASE}/map-view`);
        if (!res.ok) throw new Error(`API Error: ${res.status}`);
        return res.json();
    },

    async sendMapClick(clickData: ClickEvent | null): Promise<PanelFragment> {
        const res = await fetch(`${API_BASE}/interactions/map-click`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ clickData })
        });
        if (!res.ok) throw new Error(`API Error: ${res.status}`);
        return res.json();
    }
};
