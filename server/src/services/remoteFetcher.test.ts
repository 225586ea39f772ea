import { beforeAll, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { fetchResource, loadDatasets, resourceUrl, setLogger, stationTableSchema } from './remoteFetcher';
import { RemoteFetchError } from '../errors';
import { prepareStations } from './stationService';

const config = {
    dataUrlTemplate: 'https://data.test/files/{id}',
    stationsResourceId: 'stations-test',
    resultsResourceId: 'results-test'
};

const stationRows = [
    { gauge_id: 'G-001', lat: 45, long: -75, latitude: 45, longitude: -75, casr_daymet_era5_NSE: 0.62, extra: 'ignored' },
    { gauge_id: 2002, lat: 50, long: -100, latitude: 50, longitude: -100, casr_daymet_era5_NSE: 0.91 }
];

const results = {
    'G-001': { '1D': { date: ['2020-01-01'], flow_mm_d_obs: [1.2], flow_mm_d_sim: [1.1] } }
};

const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const fakeFetch = (routes: Record<string, () => Response>) => {
    const calls: string[] = [];
    const impl = async (url: string) => {
        calls.push(url);
        const route = routes[url];
        if (!route) return new Response('missing', { status: 404 });
        return route();
    };
    return { impl, calls };
};

beforeAll(() => {
    setLogger(() => undefined);
});

describe('resourceUrl', () => {
    it('substitutes the resource id into the template', () => {
        expect(resourceUrl(config, 'abc 1')).toBe('https://data.test/files/abc%201');
    });
});

describe('fetchResource', () => {
    const url = 'https://data.test/files/x';
    const schema = z.object({ value: z.number() });

    it('returns the parsed body', async () => {
        const { impl } = fakeFetch({ [url]: () => jsonResponse({ value: 3 }) });
        await expect(fetchResource(url, schema, impl)).resolves.toEqual({ value: 3 });
    });

    it('rejects on a non-success status', async () => {
        const { impl } = fakeFetch({ [url]: () => jsonResponse({}, 503) });
        const error = await fetchResource(url, schema, impl).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RemoteFetchError);
        expect(error).toMatchObject({ status: 503, url, message: `HTTP 503 from ${url}` });
    });

    it('rejects a body that is not JSON', async () => {
        const { impl } = fakeFetch({ [url]: () => new Response('not json{', { status: 200 }) });
        await expect(fetchResource(url, schema, impl)).rejects.toThrow(`Response from ${url} is not valid JSON`);
    });

    it('rejects a body that does not match the schema', async () => {
        const { impl } = fakeFetch({ [url]: () => jsonResponse({ value: 'three' }) });
        await expect(fetchResource(url, schema, impl)).rejects.toThrow(`Unexpected data from ${url} at value`);
    });

    it('wraps transport failures', async () => {
        const impl = async () => {
            throw new Error('connection refused');
        };
        await expect(fetchResource(url, schema, impl)).rejects.toThrow(`Request to ${url} failed: connection refused`);
    });
});

describe('stationTableSchema', () => {
    it('reports the row and column of a missing score', () => {
        const parsed = stationTableSchema.safeParse([{ gauge_id: 'a', lat: 1, long: 2, latitude: 1, longitude: 2 }]);
        expect(parsed.success).toBe(false);
        if (!parsed.success) expect(parsed.error.issues[0].path).toEqual([0, 'casr_daymet_era5_NSE']);
    });
});

describe('loadDatasets', () => {
    it('fetches both resources and indexes results by gauge id', async () => {
        const { impl, calls } = fakeFetch({
            'https://data.test/files/stations-test': () => jsonResponse(stationRows),
            'https://data.test/files/results-test': () => jsonResponse(results)
        });

        const datasets = await loadDatasets(config, impl);

        expect(calls.sort()).toEqual(['https://data.test/files/results-test', 'https://data.test/files/stations-test']);
        expect(datasets.stations.map(s => s.gauge_id)).toEqual(['G-001', '2002']);
        expect(datasets.stations[0]).not.toHaveProperty('extra');
        expect(datasets.results.size).toBe(1);
        expect(datasets.results.get('G-001')).toEqual(results['G-001']);
    });

    it('keeps a station without a score and puts it in the lowest category', async () => {
        const { impl } = fakeFetch({
            'https://data.test/files/stations-test': () => jsonResponse([
                stationRows[0],
                { gauge_id: 'G-003', lat: 52, long: -90, latitude: 52, longitude: -90, casr_daymet_era5_NSE: null }
            ]),
            'https://data.test/files/results-test': () => jsonResponse(results)
        });

        const { stations } = await loadDatasets(config, impl);

        expect(stations).toHaveLength(2);
        expect(Number.isNaN(stations[1].casr_daymet_era5_NSE)).toBe(true);
        expect(prepareStations(stations).map(s => s.category)).toEqual(['Satisfactory', 'Not Satisfactory']);
    });

    it('fails when either resource cannot be fetched', async () => {
        const { impl } = fakeFetch({
            'https://data.test/files/stations-test': () => jsonResponse(stationRows)
        });

        await expect(loadDatasets(config, impl)).rejects.toBeInstanceOf(RemoteFetchError);
    });

    it('fails when the results resource is not an object', async () => {
        const { impl } = fakeFetch({
            'https://data.test/files/stations-test': () => jsonResponse(stationRows),
            'https://data.test/files/results-test': () => jsonResponse([1, 2, 3])
        });

        await expect(loadDatasets(config, impl)).rejects.toThrow('Unexpected data from https://data.test/files/results-test');
    });
});
