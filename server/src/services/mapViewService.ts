import type { FeatureCollection, Point } from 'geojson';
import { CATEGORY_COLORS, CATEGORY_LABELS, MAP_ZOOM, MARKER_SIZE, NSE_CATEGORIES } from '../constants';
import type { MapView, StationRecord } from '../types';
import { summarizeCategories } from './stationService';

const mean = (values: number[]): number =>
    values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Builds the gauge map once at startup. Markers sit at `lat`/`long`; the
 * view is centered on the mean of the `latitude`/`longitude` columns.
 */
export function buildMapView(stations: readonly StationRecord[]): Readonly<MapView> {
    const counts = summarizeCategories(stations);

    const view: MapView = {
        points: stations.map(s => ({
            lat: s.lat,
            lon: s.long,
            color: CATEGORY_COLORS[s.category],
            category: s.category,
            customdata: [s.gauge_id, Number.isFinite(s.nse) ? s.nse : null]
        })),
        center: {
            lat: mean(stations.map(s => s.latitude)),
            lon: mean(stations.map(s => s.longitude))
        },
        zoom: MAP_ZOOM,
        markerSize: MARKER_SIZE,
        tileStyle: 'open-street-map',
        margin: { r: 0, t: 30, l: 0, b: 0 },
        legend: {
            anchor: 'bottom-left',
            x: 0.01,
            y: 0.01,
            items: NSE_CATEGORIES.map(category => ({
                category,
                label: CATEGORY_LABELS[category],
                color: CATEGORY_COLORS[category],
                count: counts[category]
            }))
        }
    };

    return Object.freeze(view);
}

export interface GaugeFeatureProperties {
    index: number;
    gauge_id: string;
    nse: number | null;
    color: string;
}

export function toFeatureCollection(view: Pick<MapView, 'points'>): FeatureCollection<Point, GaugeFeatureProperties> {
    return {
        type: 'FeatureCollection',
        features: view.points.map((p, index) => ({
            type: 'Feature',
            geometry: { type: 'Point', coordinates: [p.lon, p.lat] },
            properties: { index, gauge_id: p.customdata[0], nse: p.customdata[1], color: p.color }
        }))
    };
}
