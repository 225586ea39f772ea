import { describe, expect, it } from 'vitest';
import { buildMapView, toFeatureCollection } from './mapViewService';
import type { StationRecord } from '../types';

const stations: StationRecord[] = [
    { gauge_id: 'G-001', lat: 45, long: -75, latitude: 45.1, longitude: -75.1, nse: 0.9, category: 'Very Good' },
    { gauge_id: 'G-002', lat: 50, long: -100, latitude: 50.3, longitude: -100.3, nse: 0.5, category: 'Not Satisfactory' },
    { gauge_id: 'G-003', lat: 55, long: -110, latitude: 55.2, longitude: -110.2, nse: 0.75, category: 'Good' }
];

const PALETTE = ['red', 'yellow', 'lightgreen', 'green'];

describe('buildMapView', () => {
    const view = buildMapView(stations);

    it('draws one point per station at lat/long', () => {
        expect(view.points).toHaveLength(stations.length);
        expect(view.points.map(p => [p.lat, p.lon])).toEqual([[45, -75], [50, -100], [55, -110]]);
    });

    it('colors points from the fixed palette by category', () => {
        expect(view.points.map(p => p.color)).toEqual(['green', 'red', 'lightgreen']);
        view.points.forEach(p => expect(PALETTE).toContain(p.color));
    });

    it('attaches gauge id and raw score as hover metadata', () => {
        expect(view.points[1].customdata).toEqual(['G-002', 0.5]);
    });

    it('centers on the mean of the latitude/longitude columns', () => {
        expect(view.center.lat).toBeCloseTo(50.2, 10);
        expect(view.center.lon).toBeCloseTo(-95.2, 10);
    });

    it('uses fixed zoom, marker size, tiles and a bottom-left legend', () => {
        expect(view.zoom).toBe(3);
        expect(view.markerSize).toBe(10);
        expect(view.tileStyle).toBe('open-street-map');
        expect(view.margin).toEqual({ r: 0, t: 30, l: 0, b: 0 });
        expect(view.legend.anchor).toBe('bottom-left');
        expect(view.legend.items.map(i => [i.label, i.color, i.count])).toEqual([
            ['Not Satisfactory: NSE < 0.5', 'red', 1],
            ['Satisfactory: NSE = 0.5-0.7', 'yellow', 0],
            ['Good: NSE = 0.7-0.8', 'lightgreen', 1],
            ['Very Good: NSE > 0.8', 'green', 1]
        ]);
    });

    it('sends a missing score as null hover metadata', () => {
        const unscored = buildMapView([
            { gauge_id: 'G-009', lat: 40, long: -80, latitude: 40, longitude: -80, nse: Number.NaN, category: 'Not Satisfactory' }
        ]);
        expect(unscored.points[0]).toMatchObject({ color: 'red', customdata: ['G-009', null] });
    });

    it('is frozen', () => {
        expect(Object.isFrozen(view)).toBe(true);
    });

    it('handles an empty station table', () => {
        const empty = buildMapView([]);
        expect(empty.points).toEqual([]);
        expect(empty.center).toEqual({ lat: 0, lon: 0 });
    });
});

describe('toFeatureCollection', () => {
    it('emits GeoJSON points in lon/lat order with an index back-reference', () => {
        const collection = toFeatureCollection(buildMapView(stations));

        expect(collection.features).toHaveLength(3);
        expect(collection.features[2]).toEqual({
            type: 'Feature',
            geometry: { type: 'Point', coordinates: [-110, 55] },
            properties: { index: 2, gauge_id: 'G-003', nse: 0.75, color: 'lightgreen' }
        });
    });
});
