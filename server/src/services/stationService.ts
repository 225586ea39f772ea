import { NSE_THRESHOLDS, SCORE_FIELD } from '../constants';
import type { NseCategory, StationRecord } from '../types';
import type { RawStationRow } from './remoteFetcher';

/**
 * Buckets a Nash-Sutcliffe efficiency score. Each upper bound is inclusive,
 * so 0.5, 0.7 and 0.8 land in the lower category. NaN falls through to
 * "Not Satisfactory".
 */
export function classifyNse(score: number): NseCategory {
    if (score > NSE_THRESHOLDS.veryGood) return 'Very Good';
    if (score > NSE_THRESHOLDS.good) return 'Good';
    if (score > NSE_THRESHOLDS.satisfactory) return 'Satisfactory';
    return 'Not Satisfactory';
}

export function prepareStations(rows: readonly RawStationRow[]): StationRecord[] {
    return rows.map(row => ({
        gauge_id: row.gauge_id,
        lat: row.lat,
        long: row.long,
        latitude: row.latitude,
        longitude: row.longitude,
        nse: row[SCORE_FIELD],
        category: classifyNse(row[SCORE_FIELD])
    }));
}

export function summarizeCategories(stations: readonly StationRecord[]): Record<NseCategory, number> {
    const counts: Record<NseCategory, number> = { 'Not Satisfactory': 0, 'Satisfactory': 0, 'Good': 0, 'Very Good': 0 };
    stations.forEach(s => {
        counts[s.category] += 1;
    });
    return counts;
}
