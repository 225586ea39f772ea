
import type { ClickEvent, MapPoint, MapView } from '../types';

/**
 * Resolves a rendered map feature back to its point. maplibre only hands back
 * flat feature properties, so points are addressed by their index.
 */
export function pointForFeature(view: Pick<MapView, 'points'>, properties: unknown): MapPoint | null {
    if (typeof properties !== 'object' || properties === null || !('index' in properties)) return null;
    const index = Number(properties.index);
    if (!Number.isInteger(index) || index < 0 || index >= view.points.length) return null;
    return view.points[index];
}

// Same payload shape the server reads: hover metadata of the clicked point, gauge id first.
export const buildClickEvent = (point: MapPoint): ClickEvent => ({
    points: [{ customdata: [...point.customdata] }]
});

export const formatHover = (point: MapPoint): string => {
    const [gaugeId, nse] = point.customdata;
    return `Gauge ${gaugeId} · NSE ${nse === null ? 'n/a' : nse.toFixed(3)}`;
};
