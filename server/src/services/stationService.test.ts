import { describe, expect, it } from 'vitest';
import { classifyNse, prepareStations, summarizeCategories } from './stationService';
import type { RawStationRow } from './remoteFetcher';

const row = (gauge_id: string, nse: number): RawStationRow => ({
    gauge_id,
    lat: 45,
    long: -75,
    latitude: 45,
    longitude: -75,
    casr_daymet_era5_NSE: nse
});

describe('classifyNse', () => {
    it.each([
        [-3.2, 'Not Satisfactory'],
        [0, 'Not Satisfactory'],
        [0.5, 'Not Satisfactory'],
        [0.5000001, 'Satisfactory'],
        [0.6, 'Satisfactory'],
        [0.7, 'Satisfactory'],
        [0.71, 'Good'],
        [0.8, 'Good'],
        [0.81, 'Very Good'],
        [1, 'Very Good']
    ])('classifies %s as %s', (score, expected) => {
        expect(classifyNse(score)).toBe(expected);
    });

    it('puts a missing score in the lowest bucket', () => {
        expect(classifyNse(Number.NaN)).toBe('Not Satisfactory');
    });
});

describe('prepareStations', () => {
    it('keeps row order and ids while adding the category', () => {
        const prepared = prepareStations([row('G-3', 0.85), row('G-1', 0.2), row('G-2', 0.7)]);

        expect(prepared.map(s => s.gauge_id)).toEqual(['G-3', 'G-1', 'G-2']);
        expect(prepared.map(s => s.category)).toEqual(['Very Good', 'Not Satisfactory', 'Satisfactory']);
        expect(prepared[0]).toEqual({
            gauge_id: 'G-3',
            lat: 45,
            long: -75,
            latitude: 45,
            longitude: -75,
            nse: 0.85,
            category: 'Very Good'
        });
    });

    it('returns an empty table for no rows', () => {
        expect(prepareStations([])).toEqual([]);
    });
});

describe('summarizeCategories', () => {
    it('counts every category, including empty ones', () => {
        const counts = summarizeCategories(prepareStations([row('a', 0.9), row('b', 0.95), row('c', 0.1)]));
        expect(counts).toEqual({ 'Not Satisfactory': 1, 'Satisfactory': 0, 'Good': 0, 'Very Good': 2 });
    });
});
